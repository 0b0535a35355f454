/**
 * Error taxonomy shared by the command fifo path and the RPC session.
 */

export type CodctlErrorCode =
  | 'CONFIGURATION'
  | 'USAGE'
  | 'TRANSPORT_DELIVERY'
  | 'DAEMON_COMMAND'
  | 'CLIENT_TRANSPORT'
  | 'TIMEOUT';

export class CodctlError extends Error {
  constructor(readonly code: CodctlErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Invalid or unreadable configuration. Fatal before any session starts. */
export class ConfigurationError extends CodctlError {
  constructor(message: string, code: CodctlErrorCode = 'CONFIGURATION') {
    super(code, message);
  }
}

/** Bad command line: unknown command, wrong arguments, invalid disc id. */
export class UsageError extends ConfigurationError {
  constructor(message: string) {
    super(message, 'USAGE');
  }
}

export type DeliveryFailure = 'NoListener' | 'NoSuchTarget' | 'IoError';

/** The command fifo could not take the command. Never retried. */
export class TransportDeliveryError extends CodctlError {
  constructor(readonly reason: DeliveryFailure, readonly target: string, message: string) {
    super('TRANSPORT_DELIVERY', message);
  }
}

/** The daemon understood the request and rejected it. */
export class DaemonCommandError extends CodctlError {
  constructor(message: string, readonly method?: string) {
    super('DAEMON_COMMAND', message);
  }
}

/** The RPC layer could not deliver a request or make sense of a reply. */
export class ClientTransportError extends CodctlError {
  constructor(message: string) {
    super('CLIENT_TRANSPORT', message);
  }
}

export const TIMEOUT_MESSAGE = 'timeout waiting for response';

export class ResponseTimeoutError extends CodctlError {
  constructor(readonly timeoutMs: number) {
    super('TIMEOUT', TIMEOUT_MESSAGE);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

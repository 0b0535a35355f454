import logger from '../utils/logger';
import { formatUpdate, type Reporter } from '../utils/reporter';
import { CLIENT_VERSION } from '../version';
import type { CodctlConfig } from '../config/configStore';
import { UsageError } from '../control/errors';
import { sendFifoCommand } from '../control/fifoSender';
import ControlSession, { type SessionResult } from '../control/session';
import RpcChannel from '../transport/rpcChannel';
import StateChannel from '../transport/stateChannel';
import { STATE_CATEGORIES, type RpcTransport, type StateFeed } from '../transport/types';
import { COMMAND_TABLE, type Command } from './commandTable';

/** Builds the daemon channels for one session. */
export interface TransportFactory {
  rpc(config: CodctlConfig): RpcTransport;
  feed(config: CodctlConfig): StateFeed;
}

export const webSocketTransports: TransportFactory = {
  rpc: (config) => new RpcChannel(config.player.rpcUrl, config.player.reconnectDelayMs),
  feed: (config) => new StateChannel(config.player.stateUrl, config.player.reconnectDelayMs),
};

export interface RunOptions {
  config: CodctlConfig;
  reporter: Reporter;
  /** Response timeout in seconds; falls back to the config. */
  timeout?: number;
  quiet?: boolean;
  follow?: boolean;
  /** Deliver over the command fifo instead of RPC. */
  fifo?: boolean;
  transports?: TransportFactory;
  /** Aborting ends a running session as interrupted. */
  signal?: AbortSignal;
}

/**
 * Delivers one command, either over the command fifo or in an RPC session.
 */
export async function runCommand(command: Command, options: RunOptions): Promise<SessionResult> {
  if (options.follow && command.name !== 'state') {
    throw new UsageError(`--follow only applies to state, not ${command.name}`);
  }

  if (options.fifo) {
    if (COMMAND_TABLE[command.name].needsResponse) {
      throw new UsageError(`${command.name} needs a response and cannot be sent over the command fifo`);
    }
    if (options.follow) throw new UsageError('--follow cannot be combined with --fifo');
    await sendFifoCommand(options.config.player.commandFifo, command);
    return { outcome: 'completed', exitCode: 0 };
  }

  const transports = options.transports ?? webSocketTransports;
  const timeout = options.timeout ?? options.config.client.timeout;
  const session = new ControlSession({
    rpc: transports.rpc(options.config),
    feed: options.follow ? transports.feed(options.config) : undefined,
    reporter: options.reporter,
    timeoutMs: timeout === undefined ? undefined : Math.round(timeout * 1000),
    quiet: options.quiet,
  });

  if (command.name === 'version') {
    options.reporter.print(`codctl ${CLIENT_VERSION}`);
  }
  session.call(command);
  if (options.follow) {
    session.follow(STATE_CATEGORIES, (category, data) => options.reporter.print(formatUpdate(category, data)));
  }

  const onAbort = () => session.interrupt();
  if (options.signal?.aborted) onAbort();
  options.signal?.addEventListener('abort', onAbort, { once: true });
  try {
    const result = await session.run();
    logger.debug(`[Commands] ${command.name} finished: ${result.outcome}`);
    return result;
  } finally {
    options.signal?.removeEventListener('abort', onAbort);
  }
}

import { ClientTransportError, DaemonCommandError } from './errors';

export type ClassifiedError =
  | { kind: 'daemon'; error: DaemonCommandError }
  | { kind: 'transport'; error: ClientTransportError };

/**
 * Sorts a failure into daemon-reported or transport-level.
 * Anything else is a defect and is rethrown untouched.
 */
export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof DaemonCommandError) return { kind: 'daemon', error };
  if (error instanceof ClientTransportError) return { kind: 'transport', error };
  throw error;
}

/** Whether each error class ends the session. */
export interface ErrorPolicy {
  stopOnDaemonError: boolean;
  stopOnTransportError: boolean;
}

export const DEFAULT_ERROR_POLICY: Readonly<ErrorPolicy> = Object.freeze({
  stopOnDaemonError: true,
  stopOnTransportError: false,
});

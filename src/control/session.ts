import logger from '../utils/logger';
import { formatPayload, type Reporter } from '../utils/reporter';
import type { Command } from '../commands/commandTable';
import type { RpcTransport, StateCategory, StateFeed } from '../transport/types';
import { classifyError, DEFAULT_ERROR_POLICY, type ClassifiedError, type ErrorPolicy } from './errorClassifier';
import { CodctlError, ResponseTimeoutError, TIMEOUT_MESSAGE } from './errors';
import PendingCallRegistry, { type ResponseContinuation } from './pendingCalls';
import SessionLoop from './sessionLoop';
import StateSubscription, { type StateContinuations } from './stateSubscription';

export type SessionOutcome = 'completed' | 'daemon-error' | 'transport-error' | 'timeout' | 'interrupted';

/** What a finished session hands back to the command line. */
export interface SessionResult {
  outcome: SessionOutcome;
  exitCode: number;
  error?: CodctlError;
}

export interface SessionOptions {
  rpc: RpcTransport;
  /** Required when the session follows the state feed. */
  feed?: StateFeed;
  reporter: Reporter;
  timeoutMs?: number;
  /** Suppress printing of responses. Errors are always printed. */
  quiet?: boolean;
  policy?: Partial<ErrorPolicy>;
}

export type UpdateHandler = (category: StateCategory, data: unknown) => void;

export const EXIT_INTERRUPTED = 130;

/**
 * One client run: any number of RPC calls, at most one state subscription and at most
 * one timeout, all driven by a single {@link SessionLoop}.
 *
 * The session ends on the first daemon error, on timeout, on {@link interrupt}, or once
 * every call has been answered and nothing is being followed.
 */
export default class ControlSession {
  private readonly loop = new SessionLoop<SessionResult>();
  private readonly calls: PendingCallRegistry;
  private readonly policy: ErrorPolicy;
  private subscription?: StateSubscription;
  private lastError?: ClassifiedError;

  constructor(private readonly options: SessionOptions) {
    this.policy = { ...DEFAULT_ERROR_POLICY, ...options.policy };
    this.calls = new PendingCallRegistry(options.rpc, this.loop.defer);

    options.rpc.open({
      reply: (reply) => this.loop.run(() => {
        this.calls.handleReply(reply);
      }),
      error: (error) => this.loop.run(() => this.handleError(error)),
      disconnect: (error) => this.loop.run(() => this.calls.failSent(error)),
    });

    this.loop.onStop(() => {
      this.calls.clear();
      this.subscription?.close();
      options.feed?.close();
      options.rpc.close();
    });
  }

  get pendingCalls(): number {
    return this.calls.size;
  }

  /** Dispatches `command`; its response is printed unless the session is quiet. */
  call(command: Command, onResponse?: ResponseContinuation): number {
    return this.calls.dispatch(
      command,
      (result) => {
        if (!this.options.quiet) {
          const text = formatPayload(result);
          if (text) this.options.reporter.print(text);
        }
        onResponse?.(result);
        this.stopIfIdle();
      },
      (error) => this.handleError(error),
    );
  }

  /** Follows the state feed until the session ends. */
  follow(categories: readonly StateCategory[], onUpdate: UpdateHandler): void {
    const feed = this.options.feed;
    if (!feed) throw new Error('session has no state feed to follow');

    const continuations: StateContinuations = {};
    for (const category of categories) {
      continuations[category] = (data) => onUpdate(category, data);
    }
    this.subscription = new StateSubscription(
      feed,
      (error) => this.handleError(error),
      this.loop.defer,
    );
    this.subscription.subscribe(categories, continuations);
  }

  /** Runs the session until one of its completion paths stops it. */
  run(): Promise<SessionResult> {
    const done = this.loop.start();
    if (this.options.timeoutMs !== undefined) {
      const timeoutMs = this.options.timeoutMs;
      this.loop.setTimeout(timeoutMs, () => {
        this.options.reporter.error(TIMEOUT_MESSAGE);
        this.loop.stop({ outcome: 'timeout', exitCode: 1, error: new ResponseTimeoutError(timeoutMs) });
      });
    }
    this.loop.run(() => this.stopIfIdle());
    return done;
  }

  interrupt(): void {
    logger.debug('[Session] Interrupted');
    this.loop.stop({ outcome: 'interrupted', exitCode: EXIT_INTERRUPTED });
  }

  private handleError(error: unknown): void {
    const classified = classifyError(error);
    this.lastError = classified;

    if (classified.kind === 'daemon') {
      this.options.reporter.error(`error: ${classified.error.message}`);
      if (this.policy.stopOnDaemonError) {
        this.loop.stop({ outcome: 'daemon-error', exitCode: 1, error: classified.error });
      } else {
        this.stopIfIdle();
      }
      return;
    }

    this.options.reporter.error(`transport error: ${classified.error.message}`);
    if (this.policy.stopOnTransportError) {
      this.loop.stop({ outcome: 'transport-error', exitCode: 1, error: classified.error });
    } else if (!this.loop.hasTimeout) {
      this.stopIfIdle();
    }
  }

  private stopIfIdle(): void {
    if (this.calls.size > 0 || this.subscription?.isActive) return;

    if (!this.lastError) {
      this.loop.stop({ outcome: 'completed', exitCode: 0 });
      return;
    }
    const outcome = this.lastError.kind === 'daemon' ? 'daemon-error' : 'transport-error';
    this.loop.stop({ outcome, exitCode: 1, error: this.lastError.error });
  }
}

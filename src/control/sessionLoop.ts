import logger from '../utils/logger';

export enum LoopState {
  IDLE = 'idle',
  RUNNING = 'running',
  STOPPED = 'stopped',
}

/** Schedules a callback onto the session loop. */
export type Defer = (fn: () => void) => void;

export const runNow: Defer = (fn) => fn();

/** Longest delay Node's timers accept; anything larger fires after 1ms. */
export const MAX_TIMER_MS = 2 ** 31 - 1;
export const MAX_TIMEOUT_SECONDS = Math.floor(MAX_TIMER_MS / 1000);

/**
 * Cooperative driver for one client session, layered on Node's event loop.
 *
 * Every I/O completion, subscription delivery and the timeout run through {@link run},
 * so nothing executes once {@link stop} has been called. {@link start} settles with the
 * value handed to `stop`, or rejects when a callback throws.
 */
export default class SessionLoop<R> {
  private state = LoopState.IDLE;
  private timer?: NodeJS.Timeout;
  private stopHooks: Array<() => void> = [];
  private settled = false;
  private readonly resolveDone: (result: R) => void;
  private readonly rejectDone: (error: unknown) => void;
  private readonly done: Promise<R>;

  constructor() {
    let resolveDone: (result: R) => void = () => undefined;
    let rejectDone: (error: unknown) => void = () => undefined;
    this.done = new Promise<R>((resolve, reject) => {
      resolveDone = resolve;
      rejectDone = reject;
    });
    this.resolveDone = resolveDone;
    this.rejectDone = rejectDone;
  }

  get current(): LoopState {
    return this.state;
  }

  get hasTimeout(): boolean {
    return this.timer !== undefined;
  }

  start(): Promise<R> {
    if (this.state === LoopState.IDLE) {
      this.state = LoopState.RUNNING;
      logger.debug('[SessionLoop] Running');
    }
    return this.done;
  }

  /** Runs `fn` on the loop unless the loop has stopped. */
  run(fn: () => void): void {
    if (this.state === LoopState.STOPPED) return;
    try {
      fn();
    } catch (error) {
      this.fail(error);
    }
  }

  readonly defer: Defer = (fn) => this.run(fn);

  /** Arms the session's single timeout. */
  setTimeout(ms: number, onTimeout: () => void): void {
    if (this.timer) throw new Error('session timeout already armed');
    if (ms > MAX_TIMER_MS) throw new RangeError(`session timeout of ${ms}ms exceeds ${MAX_TIMER_MS}ms`);
    if (this.state === LoopState.STOPPED) return;
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.run(onTimeout);
    }, ms);
  }

  /** Registers teardown work that runs exactly once when the loop stops. */
  onStop(hook: () => void): void {
    this.stopHooks.push(hook);
  }

  stop(result: R): void {
    if (!this.halt() || this.settled) return;
    this.settled = true;
    this.resolveDone(result);
  }

  private fail(error: unknown): void {
    this.halt();
    if (this.settled) return;
    this.settled = true;
    this.rejectDone(error);
  }

  private halt(): boolean {
    if (this.state === LoopState.STOPPED) return false;
    this.state = LoopState.STOPPED;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    logger.debug('[SessionLoop] Stopped');
    const hooks = this.stopHooks;
    this.stopHooks = [];
    hooks.forEach((hook) => hook());
    return true;
  }
}

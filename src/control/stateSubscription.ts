import logger from '../utils/logger';
import type { ClientTransportError } from './errors';
import type { PublishMessage, StateCategory, StateFeed } from '../transport/types';
import { runNow, type Defer } from './sessionLoop';

export type StateContinuation = (data: unknown) => void;
export type StateContinuations = Partial<Record<StateCategory, StateContinuation>>;

/**
 * Follows the daemon's state publisher for a set of categories.
 * Every message is surfaced, in arrival order, until {@link close}.
 */
export default class StateSubscription {
  private categories = new Set<StateCategory>();
  private continuations: StateContinuations = {};
  private active = false;

  constructor(
    private readonly feed: StateFeed,
    private readonly onTransportError: (error: ClientTransportError) => void,
    private readonly defer: Defer = runNow,
  ) {}

  get isActive(): boolean {
    return this.active;
  }

  subscribe(categories: Iterable<StateCategory>, continuations: StateContinuations): void {
    if (this.active) throw new Error('state subscription already active');

    this.categories = new Set(categories);
    for (const category of this.categories) {
      if (!continuations[category]) throw new Error(`no continuation for state category ${category}`);
    }
    this.continuations = { ...continuations };
    this.active = true;
    logger.debug(`[StateSubscription] Following ${[...this.categories].join(', ')}`);

    this.feed.open({
      message: (message) => this.defer(() => this.deliver(message)),
      error: (error) => this.defer(() => {
        if (this.active) this.onTransportError(error);
      }),
    });
  }

  close(): void {
    if (!this.active) return;
    this.active = false;
    this.feed.close();
  }

  private deliver(message: PublishMessage): void {
    if (!this.active) return;
    if (!this.categories.has(message.category)) {
      logger.debug(`[StateSubscription] Ignoring ${message.category} update`);
      return;
    }
    this.continuations[message.category]?.(message.data);
  }
}

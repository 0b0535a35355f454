import logger from '../utils/logger';
import type { Command } from '../commands/commandTable';
import type { RpcReply, RpcTransport } from '../transport/types';
import { ClientTransportError, DaemonCommandError } from './errors';
import { runNow, type Defer } from './sessionLoop';

export type ResponseContinuation = (result: unknown) => void;
export type ErrorContinuation = (error: DaemonCommandError | ClientTransportError) => void;

interface PendingCall {
  id: number;
  command: Command;
  onResponse: ResponseContinuation;
  onError: ErrorContinuation;
  createdAt: number;
  sent: boolean;
}

/**
 * In-flight RPC calls keyed by correlation id.
 *
 * An entry is removed before its continuation runs, so each call completes at most once
 * no matter how many replies carry its id.
 */
export default class PendingCallRegistry {
  private nextId = 0;
  private readonly pending = new Map<number, PendingCall>();

  constructor(
    private readonly transport: Pick<RpcTransport, 'send'>,
    private readonly defer: Defer = runNow,
  ) {}

  get size(): number {
    return this.pending.size;
  }

  has(id: number): boolean {
    return this.pending.has(id);
  }

  /** Sends `command` and records its continuations. Returns the correlation id. */
  dispatch(command: Command, onResponse: ResponseContinuation, onError: ErrorContinuation): number {
    const id = ++this.nextId;
    this.pending.set(id, { id, command, onResponse, onError, createdAt: Date.now(), sent: false });
    logger.debug(`[PendingCalls] Dispatching #${id} ${command.name} ${command.args.join(' ')}`.trimEnd());

    this.transport.send({ id, method: command.name, args: [...command.args] }, (error) =>
      this.defer(() => {
        if (error) {
          const call = this.take(id);
          call?.onError(new ClientTransportError(`failed to send ${command.name}: ${error.message}`));
          return;
        }
        const call = this.pending.get(id);
        if (call) call.sent = true;
      }),
    );
    return id;
  }

  /** Completes the call a reply belongs to. Replies for unknown ids are dropped. */
  handleReply(reply: RpcReply): boolean {
    const call = this.take(reply.id);
    if (!call) {
      logger.debug(`[PendingCalls] Dropping reply for unknown call #${reply.id}`);
      return false;
    }

    logger.debug(`[PendingCalls] #${call.id} ${call.command.name} answered after ${Date.now() - call.createdAt}ms`);
    if ('error' in reply) {
      call.onError(new DaemonCommandError(reply.error.message, call.command.name));
    } else {
      call.onResponse(reply.result);
    }
    return true;
  }

  /** Fails every call whose request already went out, e.g. after the connection dropped. */
  failSent(error: ClientTransportError): void {
    const sent = [...this.pending.values()].filter((call) => call.sent);
    for (const call of sent) {
      if (this.take(call.id)) call.onError(error);
    }
  }

  /** Forgets every call without running any continuation. */
  clear(): void {
    this.pending.clear();
  }

  private take(id: number): PendingCall | undefined {
    const call = this.pending.get(id);
    if (call) this.pending.delete(id);
    return call;
  }
}

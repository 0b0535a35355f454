import logger from '../utils/logger';
import { ClientTransportError } from '../control/errors';
import WebSocketChannel from './webSocketChannel';
import { decodeReply, encodeRequest } from './frames';
import type { RpcListener, RpcReply, RpcRequest, RpcTransport, SendCallback } from './types';

interface OutboundFrame {
  id: number;
  frame: string;
  onSent: SendCallback;
}

/**
 * Websocket RPC channel to the player daemon.
 * Requests issued before the socket is up wait in the outbox and go out once it opens.
 * They are written once and never resent. A failed connection attempt fails every
 * request still waiting in the outbox.
 */
export default class RpcChannel extends WebSocketChannel implements RpcTransport {
  private listener?: RpcListener;
  private outbox: OutboundFrame[] = [];

  constructor(url: string, reconnectDelayMs?: number) {
    super(url, 'RpcChannel', reconnectDelayMs);
  }

  open(listener: RpcListener): void {
    this.listener = listener;
    this.connect();
  }

  send(request: RpcRequest, onSent: SendCallback): void {
    const outbound = { id: request.id, frame: encodeRequest(request), onSent };
    if (this.connected) {
      this.write(outbound);
      return;
    }
    logger.debug(`[RpcChannel] Queueing call #${request.id} until ${this.url} is reachable`);
    this.outbox.push(outbound);
    this.connect();
  }

  close(): void {
    this.outbox = [];
    this.listener = undefined;
    super.close();
  }

  protected onConnected(): void {
    const queued = this.outbox;
    this.outbox = [];
    queued.forEach((outbound) => this.write(outbound));
  }

  protected onDisconnected(): void {
    this.listener?.disconnect(new ClientTransportError(`connection to ${this.url} lost`));
  }

  protected onConnectFailed(reason: string): void {
    const queued = this.outbox;
    if (queued.length === 0) return;
    this.outbox = [];
    logger.debug(`[RpcChannel] Failing ${queued.length} queued call(s): ${reason}`);
    queued.forEach((outbound) => outbound.onSent(new Error(reason)));
  }

  protected handleFrame(raw: string): void {
    let reply: RpcReply;
    try {
      reply = decodeReply(raw);
    } catch (error) {
      if (error instanceof ClientTransportError) {
        this.listener?.error(error);
        return;
      }
      throw error;
    }
    this.listener?.reply(reply);
  }

  private write(outbound: OutboundFrame): void {
    const ws = this.ws;
    if (!ws) {
      outbound.onSent(new Error('socket is not open'));
      return;
    }
    logger.debug(`[RpcChannel] -> call #${outbound.id}`);
    ws.send(outbound.frame, (error) => outbound.onSent(error ?? undefined));
  }
}

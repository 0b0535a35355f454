import { ClientTransportError } from '../control/errors';
import WebSocketChannel from './webSocketChannel';
import { decodePublish } from './frames';
import type { FeedListener, PublishMessage, StateFeed } from './types';

/**
 * Websocket subscriber for the daemon's state publisher.
 * Frames are handed on one at a time, in the order they arrive. The first failed attempt
 * of each outage is reported; retries continue quietly.
 */
export default class StateChannel extends WebSocketChannel implements StateFeed {
  private listener?: FeedListener;
  private outageReported = false;

  constructor(url: string, reconnectDelayMs?: number) {
    super(url, 'StateChannel', reconnectDelayMs);
  }

  open(listener: FeedListener): void {
    this.listener = listener;
    this.connect();
  }

  close(): void {
    this.listener = undefined;
    super.close();
  }

  protected onConnected(): void {
    this.outageReported = false;
  }

  protected onConnectFailed(reason: string): void {
    if (this.outageReported) return;
    this.outageReported = true;
    this.listener?.error(new ClientTransportError(reason));
  }

  protected handleFrame(raw: string): void {
    let message: PublishMessage;
    try {
      message = decodePublish(raw);
    } catch (error) {
      if (error instanceof ClientTransportError) {
        this.listener?.error(error);
        return;
      }
      throw error;
    }
    this.listener?.message(message);
  }
}

import WebSocket from 'ws';
import logger from '../utils/logger';
import { ConnectionState } from './types';

/**
 * Websocket connection that reconnects with a fixed delay until it is closed.
 * Subclasses handle the frames and decide what a failed connection attempt means;
 * this class only deals with connection lifecycle.
 */
export default abstract class WebSocketChannel {
  protected ws?: WebSocket;
  protected state: ConnectionState = ConnectionState.DISCONNECTED;
  private reconnectTimer?: NodeJS.Timeout;
  private closed = false;
  private lastError?: Error;

  constructor(
    protected readonly url: string,
    protected readonly label: string,
    private readonly reconnectDelayMs = 1000,
  ) {}

  protected abstract handleFrame(raw: string): void;

  protected onConnected(): void {}

  protected onDisconnected(): void {}

  /** Called after every attempt that closed before the socket opened. */
  protected onConnectFailed(_reason: string): void {}

  /** Opens the websocket unless it is already open, opening or closed for good. */
  protected connect(): void {
    if (this.closed || this.state !== ConnectionState.DISCONNECTED) return;

    this.state = ConnectionState.CONNECTING;
    const ws = new WebSocket(this.url);
    this.ws = ws;

    ws.on('open', () => {
      this.state = ConnectionState.CONNECTED;
      this.lastError = undefined;
      logger.debug(`[${this.label}] Connected to ${this.url}`);
      this.onConnected();
    });

    ws.on('message', (data) => this.handleFrame(data.toString()));

    ws.on('error', (err) => {
      this.lastError = err;
      logger.debug(`[${this.label}] Connection error: ${err.message}`);
    });

    ws.on('close', () => {
      const wasConnected = this.state === ConnectionState.CONNECTED;
      this.state = ConnectionState.DISCONNECTED;
      this.ws = undefined;
      if (this.closed) return;

      if (wasConnected) {
        logger.warn(`[${this.label}] Connection to ${this.url} closed`);
        this.onDisconnected();
      } else {
        const reason = this.lastError?.message ?? 'connection closed';
        this.lastError = undefined;
        this.onConnectFailed(`cannot connect to ${this.url}: ${reason}`);
      }
      if (!this.closed) this.scheduleReconnect();
    });
  }

  protected get connected(): boolean {
    return this.state === ConnectionState.CONNECTED && this.ws?.readyState === WebSocket.OPEN;
  }

  /** Tears the connection down for good. */
  close(): void {
    this.closed = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = undefined;
    }
    const ws = this.ws;
    this.ws = undefined;
    this.state = ConnectionState.DISCONNECTED;
    if (ws) {
      ws.removeAllListeners('message');
      ws.terminate();
    }
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer || this.closed) return;

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined;
      this.connect();
    }, this.reconnectDelayMs);
  }
}

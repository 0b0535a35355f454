import type { ClientTransportError } from '../control/errors';

/** Wire format for outbound RPC requests sent to the player daemon. */
export interface RpcRequest {
  id: number;
  method: string;
  args: string[];
}

/** Successful RPC payload from the daemon. */
export interface RpcSuccessReply {
  id: number;
  result: unknown;
}

/** Rejection reported by the daemon. */
export interface RpcErrorReply {
  id: number;
  error: {
    message: string;
    type?: string;
  };
}

export type RpcReply = RpcSuccessReply | RpcErrorReply;

/** Categories published on the state feed. */
export const STATE_CATEGORIES = ['state', 'rip_state', 'disc'] as const;

export type StateCategory = (typeof STATE_CATEGORIES)[number];

/** One update from the daemon's state publisher. */
export interface PublishMessage {
  category: StateCategory;
  data: unknown;
}

/** Connection state for the websocket channels. */
export enum ConnectionState {
  DISCONNECTED = 0,
  CONNECTING = 1,
  CONNECTED = 2,
}

export type SendCallback = (error?: Error) => void;

export interface RpcListener {
  reply(reply: RpcReply): void;
  /** A frame that could not be decoded. */
  error(error: ClientTransportError): void;
  /** The connection carrying already-sent requests went away. */
  disconnect(error: ClientTransportError): void;
}

/** Request/response channel to the daemon. */
export interface RpcTransport {
  open(listener: RpcListener): void;
  send(request: RpcRequest, onSent: SendCallback): void;
  close(): void;
}

export interface FeedListener {
  message(message: PublishMessage): void;
  error(error: ClientTransportError): void;
}

/** Publish channel carrying state change notifications. */
export interface StateFeed {
  open(listener: FeedListener): void;
  close(): void;
}

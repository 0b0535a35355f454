import { ClientTransportError } from '../control/errors';
import { STATE_CATEGORIES } from './types';
import type { PublishMessage, RpcReply, RpcRequest, StateCategory } from './types';

/**
 * JSON framing for the websocket channels.
 */

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseFrame(raw: string, channel: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ClientTransportError(`malformed ${channel} frame: not JSON`);
  }
  if (!isRecord(parsed)) {
    throw new ClientTransportError(`malformed ${channel} frame: expected an object`);
  }
  return parsed;
}

export function encodeRequest(request: RpcRequest): string {
  return JSON.stringify(request);
}

export function decodeReply(raw: string): RpcReply {
  const frame = parseFrame(raw, 'reply');
  const id = frame.id;
  if (typeof id !== 'number' || !Number.isInteger(id)) {
    throw new ClientTransportError('malformed reply frame: missing call id');
  }

  if ('error' in frame) {
    const error = frame.error;
    if (typeof error === 'string') return { id, error: { message: error } };
    if (isRecord(error) && typeof error.message === 'string') {
      return {
        id,
        error: {
          message: error.message,
          type: typeof error.type === 'string' ? error.type : undefined,
        },
      };
    }
    throw new ClientTransportError(`malformed reply frame for call #${id}: unreadable error`);
  }

  if (!('result' in frame)) {
    throw new ClientTransportError(`malformed reply frame for call #${id}: no result or error`);
  }
  return { id, result: frame.result };
}

export function isStateCategory(value: unknown): value is StateCategory {
  return STATE_CATEGORIES.some((category) => category === value);
}

export function decodePublish(raw: string): PublishMessage {
  const frame = parseFrame(raw, 'state');
  if (!isStateCategory(frame.category)) {
    throw new ClientTransportError(`malformed state frame: unknown category ${JSON.stringify(frame.category)}`);
  }
  return { category: frame.category, data: frame.data };
}

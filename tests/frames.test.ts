import assert from 'node:assert/strict';

import { ClientTransportError } from '../src/control/errors';
import { decodePublish, decodeReply, encodeRequest } from '../src/transport/frames';

function rejectsAs(message: string) {
  return (error: unknown) => error instanceof ClientTransportError && error.message === message;
}

export function runFrameTests() {
  assert.equal(
    encodeRequest({ id: 3, method: 'radio', args: ['P1'] }),
    '{"id":3,"method":"radio","args":["P1"]}',
  );

  assert.deepEqual(decodeReply('{"id":1,"result":"Playing"}'), { id: 1, result: 'Playing' });
  assert.deepEqual(decodeReply('{"id":2,"result":null}'), { id: 2, result: null });
  assert.deepEqual(decodeReply('{"id":4,"error":"no disc"}'), { id: 4, error: { message: 'no disc' } });
  assert.deepEqual(
    decodeReply('{"id":5,"error":{"message":"invalid state transition","type":"CommandError"}}'),
    { id: 5, error: { message: 'invalid state transition', type: 'CommandError' } },
  );

  assert.throws(() => decodeReply('not json'), rejectsAs('malformed reply frame: not JSON'));
  assert.throws(() => decodeReply('[1,2]'), rejectsAs('malformed reply frame: expected an object'));
  assert.throws(() => decodeReply('{"result":"x"}'), rejectsAs('malformed reply frame: missing call id'));
  assert.throws(() => decodeReply('{"id":6}'), rejectsAs('malformed reply frame for call #6: no result or error'));
  assert.throws(() => decodeReply('{"id":7,"error":{}}'), rejectsAs('malformed reply frame for call #7: unreadable error'));

  assert.deepEqual(decodePublish('{"category":"rip_state","data":{"progress":40}}'), {
    category: 'rip_state',
    data: { progress: 40 },
  });
  assert.throws(() => decodePublish('{"category":"volume","data":3}'), rejectsAs('malformed state frame: unknown category "volume"'));
}

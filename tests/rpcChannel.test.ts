import assert from 'node:assert/strict';
import { once } from 'node:events';
import WebSocket, { WebSocketServer } from 'ws';

import { buildCommand } from '../src/commands/commandTable';
import ControlSession from '../src/control/session';
import RpcChannel from '../src/transport/rpcChannel';
import StateChannel from '../src/transport/stateChannel';
import type { PublishMessage, RpcListener, RpcReply } from '../src/transport/types';
import { MemoryReporter, delay } from './fakes';

interface TestServer {
  server: WebSocketServer;
  port: number;
  sockets: WebSocket[];
  received: string[];
}

async function startServer(): Promise<TestServer> {
  const server = new WebSocketServer({ host: '127.0.0.1', port: 0 });
  await once(server, 'listening');
  const address = server.address();
  if (typeof address === 'string') throw new Error(`unexpected server address ${address}`);

  const sockets: WebSocket[] = [];
  const received: string[] = [];
  server.on('connection', (socket) => {
    sockets.push(socket);
    socket.on('message', (data) => received.push(data.toString()));
  });
  return { server, port: address.port, sockets, received };
}

async function stopServer({ server }: TestServer): Promise<void> {
  server.clients.forEach((client) => client.terminate());
  await new Promise<void>((resolve) => server.close(() => resolve()));
}

/** A port on which nothing is listening. */
async function closedPort(): Promise<number> {
  const test = await startServer();
  await stopServer(test);
  return test.port;
}

async function waitFor(check: () => boolean, what: string): Promise<void> {
  const deadline = Date.now() + 2000;
  while (!check()) {
    if (Date.now() > deadline) throw new Error(`timed out waiting for ${what}`);
    await delay(5);
  }
}

function recordingListener() {
  const replies: RpcReply[] = [];
  const errors: string[] = [];
  const disconnects: string[] = [];
  const listener: RpcListener = {
    reply: (reply) => replies.push(reply),
    error: (error) => errors.push(error.message),
    disconnect: (error) => disconnects.push(error.message),
  };
  return { listener, replies, errors, disconnects };
}

async function rpcChannelLifecycle() {
  const test = await startServer();
  const url = `ws://127.0.0.1:${test.port}/rpc`;
  const channel = new RpcChannel(url, 10);
  const { listener, replies, errors, disconnects } = recordingListener();
  const sendResults: Array<Error | undefined> = [];

  try {
    channel.open(listener);
    channel.send({ id: 1, method: 'play', args: [] }, (error) => sendResults.push(error));

    await waitFor(() => test.received.length === 1 && sendResults.length === 1, 'queued request');
    assert.deepEqual(JSON.parse(test.received[0]), { id: 1, method: 'play', args: [] });
    assert.deepEqual<Array<Error | undefined>>(sendResults, [undefined]);

    test.sockets[0].send(JSON.stringify({ id: 1, result: 'Playing' }));
    await waitFor(() => replies.length === 1, 'reply');
    assert.deepEqual(replies, [{ id: 1, result: 'Playing' }]);

    test.sockets[0].send('garbage');
    await waitFor(() => errors.length === 1, 'frame error');
    assert.deepEqual(errors, ['malformed reply frame: not JSON']);

    test.sockets[0].terminate();
    await waitFor(() => disconnects.length === 1, 'disconnect');
    assert.deepEqual(disconnects, [`connection to ${url} lost`]);

    await waitFor(() => test.sockets.length === 2, 'reconnect');
    await delay(30);
    assert.equal(test.received.length, 1);

    channel.send({ id: 2, method: 'stop', args: [] }, (error) => sendResults.push(error));
    await waitFor(() => test.received.length === 2, 'request after reconnect');
    assert.deepEqual(JSON.parse(test.received[1]), { id: 2, method: 'stop', args: [] });

    channel.close();
    await delay(50);
    assert.equal(test.sockets.length, 2);
  } finally {
    channel.close();
    await stopServer(test);
  }
}

async function stateChannelDeliversInOrder() {
  const test = await startServer();
  const channel = new StateChannel(`ws://127.0.0.1:${test.port}/state`, 10);
  const messages: PublishMessage[] = [];
  const errors: string[] = [];

  try {
    test.server.on('connection', (socket) => {
      socket.send(JSON.stringify({ category: 'state', data: 'PLAY' }));
      socket.send(JSON.stringify({ category: 'volume', data: 3 }));
      socket.send(JSON.stringify({ category: 'disc', data: { title: 'Test Disc' } }));
    });
    channel.open({
      message: (message) => messages.push(message),
      error: (error) => errors.push(error.message),
    });

    await waitFor(() => messages.length === 2, 'publish frames');
    assert.deepEqual(messages, [
      { category: 'state', data: 'PLAY' },
      { category: 'disc', data: { title: 'Test Disc' } },
    ]);
    assert.deepEqual(errors, ['malformed state frame: unknown category "volume"']);
  } finally {
    channel.close();
    await stopServer(test);
  }
}

async function stateChannelReportsOutageOnce() {
  const port = await closedPort();
  const url = `ws://127.0.0.1:${port}/state`;
  const channel = new StateChannel(url, 10);
  const errors: string[] = [];

  try {
    channel.open({ message: () => undefined, error: (error) => errors.push(error.message) });
    await waitFor(() => errors.length === 1, 'connect failure');
    await delay(60);
    assert.deepEqual(errors, [`cannot connect to ${url}: connect ECONNREFUSED 127.0.0.1:${port}`]);
  } finally {
    channel.close();
  }
}

async function unreachableDaemonEndsSessionWithoutTimeout() {
  const port = await closedPort();
  const url = `ws://127.0.0.1:${port}/rpc`;
  const rpc = new RpcChannel(url, 10);
  const reporter = new MemoryReporter();
  const session = new ControlSession({ rpc, reporter });

  session.call(buildCommand('play'));
  const result = await session.run();

  assert.equal(result.outcome, 'transport-error');
  assert.equal(result.exitCode, 1);
  assert.deepEqual(reporter.errors, [
    `transport error: failed to send play: cannot connect to ${url}: connect ECONNREFUSED 127.0.0.1:${port}`,
  ]);
  assert.deepEqual(reporter.lines, []);
  assert.equal(session.pendingCalls, 0);
}

async function unreachableDaemonIsReportedBeforeTimeout() {
  const port = await closedPort();
  const url = `ws://127.0.0.1:${port}/rpc`;
  const reporter = new MemoryReporter();
  const session = new ControlSession({ rpc: new RpcChannel(url, 10), reporter, timeoutMs: 100 });

  session.call(buildCommand('next'));
  const result = await session.run();

  assert.equal(result.outcome, 'timeout');
  assert.deepEqual(reporter.errors, [
    `transport error: failed to send next: cannot connect to ${url}: connect ECONNREFUSED 127.0.0.1:${port}`,
    'timeout waiting for response',
  ]);
}

export async function runRpcChannelTests() {
  await rpcChannelLifecycle();
  await stateChannelDeliversInOrder();
  await stateChannelReportsOutageOnce();
  await unreachableDaemonEndsSessionWithoutTimeout();
  await unreachableDaemonIsReportedBeforeTimeout();
}

import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { buildCommand } from '../src/commands/commandTable';
import { TransportDeliveryError } from '../src/control/errors';
import { sendFifoCommand, type FifoOpener } from '../src/control/fifoSender';

function failingOpener(code: string, message: string): FifoOpener {
  return {
    open: async () => {
      throw errnoError(code, message);
    },
  };
}

function errnoError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

/** Opener whose handle fails the given steps and records whether it was closed. */
function faultyHandleOpener(faults: { write?: Error; close?: Error }) {
  const handle = {
    closed: false,
    write: async (_data: string) => {
      if (faults.write) throw faults.write;
    },
    close: async () => {
      handle.closed = true;
      if (faults.close) throw faults.close;
    },
  };
  const opener: FifoOpener = { open: async () => handle };
  return { opener, handle };
}

function deliveryFailure(reason: string, message: string) {
  return (error: unknown) =>
    error instanceof TransportDeliveryError && error.reason === reason && error.message === message;
}

export async function runFifoSenderTests() {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'codctl-fifo-'));
  try {
    const target = path.join(dir, 'cmd.fifo');
    fs.writeFileSync(target, '');

    await sendFifoCommand(target, buildCommand('play_pause'));
    assert.equal(fs.readFileSync(target, 'utf8'), 'play_pause\n');

    fs.writeFileSync(target, '');
    await sendFifoCommand(target, buildCommand('radio', ['P2']));
    assert.equal(fs.readFileSync(target, 'utf8'), 'radio P2\n');

    const missing = path.join(dir, 'missing.fifo');
    await assert.rejects(
      sendFifoCommand(missing, buildCommand('stop')),
      deliveryFailure('NoSuchTarget', `no such command fifo: ${missing}`),
    );

    // A real fifo needs mkfifo(1) through child_process, so the ENXIO that a
    // non-blocking open reports when no reader is attached is injected instead.
    await assert.rejects(
      sendFifoCommand('/run/player.fifo', buildCommand('stop'), failingOpener('ENXIO', 'ENXIO: no such device or address')),
      deliveryFailure('NoListener', 'no player listening on /run/player.fifo'),
    );

    await assert.rejects(
      sendFifoCommand('/run/player.fifo', buildCommand('stop'), failingOpener('EACCES', 'EACCES: permission denied')),
      deliveryFailure('IoError', '/run/player.fifo: EACCES: permission denied'),
    );

    const writeAndClose = faultyHandleOpener({
      write: errnoError('EPIPE', 'EPIPE: broken pipe, write'),
      close: errnoError('EBADF', 'EBADF: bad file descriptor, close'),
    });
    await assert.rejects(
      sendFifoCommand('/run/player.fifo', buildCommand('next'), writeAndClose.opener),
      deliveryFailure('IoError', '/run/player.fifo: EPIPE: broken pipe, write'),
    );
    assert.equal(writeAndClose.handle.closed, true);

    const closeOnly = faultyHandleOpener({ close: errnoError('EIO', 'EIO: i/o error, close') });
    await assert.rejects(
      sendFifoCommand('/run/player.fifo', buildCommand('next'), closeOnly.opener),
      deliveryFailure('IoError', '/run/player.fifo: EIO: i/o error, close'),
    );
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

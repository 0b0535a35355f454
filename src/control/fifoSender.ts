import fs from 'fs';
import logger from '../utils/logger';
import { formatCommandLine, type Command } from '../commands/commandTable';
import { TransportDeliveryError, errorMessage } from './errors';

/** The part of a `fs.promises` file handle the sender uses. */
export interface FifoHandle {
  write(data: string): Promise<unknown>;
  close(): Promise<void>;
}

export interface FifoOpener {
  open(path: string, flags: number): Promise<FifoHandle>;
}

function errnoCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

function deliveryError(error: unknown, fifoPath: string): TransportDeliveryError {
  switch (errnoCode(error)) {
    case 'ENXIO':
      return new TransportDeliveryError('NoListener', fifoPath, `no player listening on ${fifoPath}`);
    case 'ENOENT':
      return new TransportDeliveryError('NoSuchTarget', fifoPath, `no such command fifo: ${fifoPath}`);
    default:
      return new TransportDeliveryError('IoError', fifoPath, `${fifoPath}: ${errorMessage(error)}`);
  }
}

/**
 * Writes one command line to the player's command fifo and returns.
 * The fifo is opened non-blocking, so a missing reader fails at once instead of waiting.
 */
export async function sendFifoCommand(
  fifoPath: string,
  command: Command,
  opener: FifoOpener = fs.promises,
): Promise<void> {
  let handle: FifoHandle;
  try {
    handle = await opener.open(fifoPath, fs.constants.O_WRONLY | fs.constants.O_NONBLOCK);
  } catch (error) {
    throw deliveryError(error, fifoPath);
  }

  const line = `${formatCommandLine(command)}\n`;
  let failure: TransportDeliveryError | undefined;
  try {
    await handle.write(line);
    logger.debug(`[FifoSender] Wrote ${JSON.stringify(line)} to ${fifoPath}`);
  } catch (error) {
    failure = deliveryError(error, fifoPath);
  }

  // A failed write is the error to report, even when closing fails too.
  try {
    await handle.close();
  } catch (error) {
    if (!failure) failure = deliveryError(error, fifoPath);
  }
  if (failure) throw failure;
}

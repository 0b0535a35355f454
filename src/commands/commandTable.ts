import logger from '../utils/logger';
import { UsageError } from '../control/errors';
import { bucketForDbId, dbToDiscId, discToDbId, filenameBase, isValidDbId, isValidDiscId } from '../db/discId';

/**
 * Command vocabulary understood by the player daemon.
 */

export const COMMAND_NAMES = [
  'state',
  'source',
  'disc',
  'radio',
  'play',
  'pause',
  'play_pause',
  'next',
  'prev',
  'stop',
  'eject',
  'ejected',
  'quit',
  'version',
] as const;

export type CommandName = (typeof COMMAND_NAMES)[number];

export interface CommandSpec {
  description: string;
  /** Only meaningful with a reply, so never sent over the command fifo. */
  needsResponse: boolean;
  argument?: { name: string; description: string };
}

export const COMMAND_TABLE: Readonly<Record<CommandName, CommandSpec>> = Object.freeze({
  state: { description: 'print the current player state', needsResponse: true },
  source: { description: 'print the current source', needsResponse: true },
  disc: {
    description: 'switch to the disc source',
    needsResponse: false,
    argument: { name: 'id', description: 'MusicBrainz disc ID or database ID to play' },
  },
  radio: {
    description: 'switch to the radio source',
    needsResponse: false,
    argument: { name: 'station', description: 'station to tune in' },
  },
  play: { description: 'start or resume playback', needsResponse: false },
  pause: { description: 'pause playback', needsResponse: false },
  play_pause: { description: 'toggle between play and pause', needsResponse: false },
  next: { description: 'skip to the next track', needsResponse: false },
  prev: { description: 'go back to the previous track', needsResponse: false },
  stop: { description: 'stop playback', needsResponse: false },
  eject: { description: 'stop playback and eject the disc', needsResponse: false },
  ejected: { description: 'tell the player the disc has been ejected', needsResponse: false },
  quit: { description: 'shut the player down', needsResponse: false },
  version: { description: 'print client and player versions', needsResponse: true },
});

/** One command as sent to the daemon. Frozen once built. */
export interface Command {
  readonly name: CommandName;
  readonly args: readonly string[];
}

export function isCommandName(value: string): value is CommandName {
  return COMMAND_NAMES.some((name) => name === value);
}

/**
 * Validates `name` and `args` and produces the command to send.
 * @throws UsageError on an unknown command, surplus arguments or an invalid disc id.
 */
export function buildCommand(name: string, args: readonly string[] = []): Command {
  if (!isCommandName(name)) throw new UsageError(`unknown command: ${name}`);

  const spec = COMMAND_TABLE[name];
  const maxArgs = spec.argument ? 1 : 0;
  if (args.length > maxArgs) {
    throw new UsageError(`${name}: expected at most ${maxArgs} argument${maxArgs === 1 ? '' : 's'}, got ${args.length}`);
  }

  const normalized = name === 'disc' ? args.map(normalizeDiscArgument) : [...args];
  return Object.freeze({ name, args: Object.freeze(normalized) });
}

/**
 * Accepts a MusicBrainz disc ID as is and translates a database ID into one.
 */
export function normalizeDiscArgument(id: string): string {
  if (isValidDiscId(id)) {
    logDiscLocation(discToDbId(id), id);
    return id;
  }
  if (isValidDbId(id)) {
    const dbId = id.toLowerCase();
    const discId = dbToDiscId(dbId);
    logDiscLocation(dbId, discId);
    return discId;
  }
  throw new UsageError(`invalid disc or db id: ${id}`);
}

/** The line sent over the command fifo. */
export function formatCommandLine(command: Command): string {
  return [command.name, ...command.args].join(' ');
}

function logDiscLocation(dbId: string, discId: string): void {
  logger.debug(`[Commands] Disc ${discId} is stored as ${bucketForDbId(dbId)}/${dbId}/${filenameBase(dbId)}.*`);
}

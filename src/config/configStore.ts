import fs from 'fs';
import { ConfigurationError, errorMessage } from '../control/errors';
import { isLogLevel } from '../utils/logger';
import { MAX_TIMEOUT_SECONDS, MAX_TIMER_MS } from '../control/sessionLoop';

/**
 * Loads the client configuration from disk and translates raw JSON into runtime-safe structures.
 */

export interface PlayerConfig {
  /** Named pipe the player reads fire-and-forget commands from. */
  commandFifo: string;
  rpcUrl: string;
  stateUrl: string;
  reconnectDelayMs: number;
}

export interface ClientConfig {
  /** Default response timeout in seconds. */
  timeout?: number;
}

export interface LoggingConfig {
  consoleLevel: string;
  file?: string;
}

export interface CodctlConfig {
  player: PlayerConfig;
  client: ClientConfig;
  logging: LoggingConfig;
}

export const DEFAULT_CONFIG_FILE = '/etc/codctl.json';

export function configFilePath(explicit?: string): string {
  return explicit || process.env.CODCTL_CONFIG || DEFAULT_CONFIG_FILE;
}

/**
 * Produces a fully populated config with the player's stock endpoints.
 */
export function defaultConfig(): CodctlConfig {
  return {
    player: {
      commandFifo: '/var/run/codplayer.fifo',
      rpcUrl: 'ws://localhost:7101/rpc',
      stateUrl: 'ws://localhost:7101/state',
      reconnectDelayMs: 1000,
    },
    client: {},
    logging: { consoleLevel: 'warn' },
  };
}

/**
 * Reads the config file. A missing file is only tolerated at the default location.
 * @throws ConfigurationError when the file is unreadable, not JSON, or holds invalid values.
 */
export function loadConfig(explicitPath?: string): CodctlConfig {
  const file = configFilePath(explicitPath);
  const isDefault = !explicitPath && !process.env.CODCTL_CONFIG;

  if (!fs.existsSync(file)) {
    if (isDefault) return defaultConfig();
    throw new ConfigurationError(`${file}: no such config file`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`${file}: ${errorMessage(error)}`);
  }
  return normalizeConfig(parsed, file);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string, source: string): Record<string, unknown> {
  const value = raw[key];
  if (value === undefined) return {};
  if (!isRecord(value)) throw new ConfigurationError(`${source}: ${key} must be an object`);
  return value;
}

function readString(raw: Record<string, unknown>, key: string, fallback: string, source: string): string {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string' || !value.trim()) {
    throw new ConfigurationError(`${source}: ${key} must be a non-empty string`);
  }
  return value.trim();
}

function readWebSocketUrl(raw: Record<string, unknown>, key: string, fallback: string, source: string): string {
  const value = readString(raw, key, fallback, source);
  if (!/^wss?:\/\/\S+$/.test(value)) {
    throw new ConfigurationError(`${source}: ${key} must be a ws:// or wss:// URL, got ${value}`);
  }
  return value;
}

function readPositiveNumber(
  raw: Record<string, unknown>,
  key: string,
  max: number,
  source: string,
): number | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${source}: ${key} must be a positive number`);
  }
  if (value > max) {
    throw new ConfigurationError(`${source}: ${key} must be at most ${max}`);
  }
  return value;
}

/**
 * Merges a parsed config payload with defaults, rejecting values the client cannot use.
 */
export function normalizeConfig(raw: unknown, source = 'config'): CodctlConfig {
  if (!isRecord(raw)) throw new ConfigurationError(`${source}: expected a JSON object`);
  const defaults = defaultConfig();

  const player = section(raw, 'player', source);
  const client = section(raw, 'client', source);
  const logging = section(raw, 'logging', source);

  const consoleLevel = readString(logging, 'consoleLevel', defaults.logging.consoleLevel, source);
  if (!isLogLevel(consoleLevel)) {
    throw new ConfigurationError(`${source}: unknown log level ${consoleLevel}`);
  }
  const timeout = readPositiveNumber(client, 'timeout', MAX_TIMEOUT_SECONDS, source);
  const file = logging.file === undefined ? undefined : readString(logging, 'file', '', source);

  return {
    player: {
      commandFifo: readString(player, 'commandFifo', defaults.player.commandFifo, source),
      rpcUrl: readWebSocketUrl(player, 'rpcUrl', defaults.player.rpcUrl, source),
      stateUrl: readWebSocketUrl(player, 'stateUrl', defaults.player.stateUrl, source),
      reconnectDelayMs: readPositiveNumber(player, 'reconnectDelayMs', MAX_TIMER_MS, source) ?? defaults.player.reconnectDelayMs,
    },
    client: timeout === undefined ? {} : { timeout },
    logging: file === undefined ? { consoleLevel } : { consoleLevel, file },
  };
}

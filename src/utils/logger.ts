import winston, { Logger } from 'winston';

/**
 * Winston-based diagnostics logger for codctl.
 * Everything goes to stderr so that stdout only ever carries daemon responses and state updates.
 */
interface CodctlLogger extends Logger {
  setConsoleLogLevel(level: string): void;
  addFileLog(filename: string, level?: string): void;
}

export const LOG_LEVELS: Record<string, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export function isLogLevel(level: string): boolean {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, level);
}

/**
 * Unified formatter that tags each entry with a timestamp and level.
 */
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  winston.format.printf((info) => `[${info.timestamp}][${info.level}]${info.message}`),
);

const initialConsoleLevel = process.env.CODCTL_LOG_LEVEL && isLogLevel(process.env.CODCTL_LOG_LEVEL)
  ? process.env.CODCTL_LOG_LEVEL
  : 'warn';

const consoleTransport = new winston.transports.Console({
  level: initialConsoleLevel,
  stderrLevels: Object.keys(LOG_LEVELS),
});

const logger = winston.createLogger({
  level: 'debug',
  levels: LOG_LEVELS,
  format: logFormat,
  transports: [consoleTransport],
}) as unknown as CodctlLogger;

/**
 * Updates the console transport's level. An explicit CODCTL_LOG_LEVEL always wins.
 */
logger.setConsoleLogLevel = (level: string) => {
  if (process.env.CODCTL_LOG_LEVEL && isLogLevel(process.env.CODCTL_LOG_LEVEL)) return;
  consoleTransport.level = level;
};

const fileLogs = new Set<string>();

/**
 * Attaches a file transport, once per filename.
 */
logger.addFileLog = (filename: string, level = 'debug') => {
  if (fileLogs.has(filename)) return;
  fileLogs.add(filename);
  logger.add(new winston.transports.File({ filename, level }));
};

export default logger;

import type { JsonifibleObject } from '#json';

/** logging levels in order of severity from lowest to highest */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/** formats log messages */
export type Log = (
  level: LogLevel,
  message: string,
  meta?: JsonifibleObject,
) => void;

/** severity rank of each level, higher is more severe */
const LOG_LEVEL_RANK: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

/**
 * checks whether a string names a log level
 * @param value candidate level name
 * @returns true if value is a known log level
 */
export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_RANK, value);
}

/**
 * wraps a log function so that entries below a minimum level are dropped
 * @param log log function receiving the retained entries
 * @param minimum lowest level that is forwarded
 * @returns filtered log function
 */
export function filterLog(log: Log, minimum: LogLevel): Log {
  const threshold = LOG_LEVEL_RANK[minimum];

  return (level, message, meta) => {
    if (LOG_LEVEL_RANK[level] >= threshold) {
      log(level, message, meta);
    }
  };
}

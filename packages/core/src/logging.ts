import type { JsonifibleObject } from '#json';

/** logging levels in order of severity from lowest to highest */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/** formats log messages */
export type Log = (
  level: LogLevel,
  message: string,
  meta?: JsonifibleObject,
) => void;

const LOG_LEVEL_SEVERITY: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

/**
 * checks whether an arbitrary string names a log level
 * @param value candidate level name
 * @returns true if the value is a known log level
 */
export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_SEVERITY, value);
}

/**
 * wraps a log function so that entries below a minimum level are dropped
 * @param log underlying log function
 * @param minimum lowest level that still reaches the underlying log
 * @returns filtered log function
 */
export function filterLog(log: Log, minimum: LogLevel): Log {
  const threshold = LOG_LEVEL_SEVERITY[minimum];

  return (level, message, meta) => {
    if (LOG_LEVEL_SEVERITY[level] >= threshold) {
      log(level, message, meta);
    }
  };
}

/**
 * @module logger
 * Console-backed {@link Logger} with a `[scope]` prefix and a level threshold.
 *
 * The threshold comes from the `level` option, else from the
 * `REVERSIBLE_LOG_LEVEL` environment variable, else `warn`.
 */

import type { LogLevel, Logger } from '@reversible/types';

/** Environment variable read for the default threshold. */
export const LOG_LEVEL_ENV = 'REVERSIBLE_LOG_LEVEL';

/** Threshold used when neither the option nor the environment set one. */
export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

type WritableLevel = Exclude<LogLevel, 'silent'>;

/** Where formatted lines go. Defaults to the console method of the same name. */
export type LogSink = (level: WritableLevel, line: string, details: unknown[]) => void;

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
}

const consoleSink: LogSink = (level, line, details) => {
  console[level](line, ...details);
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

/** Threshold from the environment, or the default when unset or unrecognised. */
export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  return raw && isLogLevel(raw) ? raw : DEFAULT_LOG_LEVEL;
}

/**
 * Create a logger whose lines read `[scope] message`.
 *
 * @example
 * const log = createLogger('history', { level: 'debug' });
 * log.debug('merged', command.description);
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? levelFromEnv()];
  const sink = options.sink ?? consoleSink;
  const write = (level: WritableLevel, message: string, details: unknown[]): void => {
    if (LEVEL_RANK[level] < threshold) return;
    sink(level, `[${scope}] ${message}`, details);
  };

  return {
    debug: (message, ...details) => write('debug', message, details),
    info: (message, ...details) => write('info', message, details),
    warn: (message, ...details) => write('warn', message, details),
    error: (message, ...details) => write('error', message, details),
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * @module logger
 * Logging contract shared by every package.
 */

/** Severity threshold; `silent` disables output. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** Minimal structured logger. */
export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

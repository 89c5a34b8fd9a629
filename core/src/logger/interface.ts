/**
 * Logger Interface
 * @module logger/interface
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Lowest level first */
export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * One log call. Extra arguments carry structured values, typically the
 * CnftError being reported.
 */
export type LogMethod = (message: string, ...args: unknown[]) => void;

/**
 * Sink for SDK diagnostics. Pass one as `logger` in the SDK config to route
 * output into an application logger.
 */
export interface ILogger {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
}

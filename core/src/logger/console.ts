/**
 * Console Logger
 * @module logger/console
 */

import { isCnftError } from '../errors/base.js';
import { LOG_LEVELS, type ILogger, type LogLevel } from './interface.js';

export interface ConsoleLoggerOptions {
  /** Prepended to every line. Default `[cNFT]` */
  prefix?: string;
  /** Calls below this level are dropped. Default `info` */
  level?: LogLevel;
}

/**
 * Writes `<prefix> <LEVEL> <message>` through the matching console method.
 * CnftError arguments are flattened to their code, retryability and context.
 */
export class ConsoleLogger implements ILogger {
  readonly prefix: string;
  readonly level: LogLevel;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.prefix = options.prefix ?? '[cNFT]';
    this.level = options.level ?? 'info';
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  debug(message: string, ...args: unknown[]): void {
    this.write('debug', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', message, args);
  }

  private write(level: LogLevel, message: string, args: unknown[]): void {
    if (!this.isEnabled(level)) return;
    console[level](`${this.prefix} ${level.toUpperCase()} ${message}`, ...args.map(toLogValue));
  }
}

function toLogValue(arg: unknown): unknown {
  if (!isCnftError(arg)) return arg;
  return {
    code: arg.code,
    retryable: arg.retryable,
    context: arg.context,
    ...(arg.cause ? { cause: arg.cause.message } : {}),
  };
}

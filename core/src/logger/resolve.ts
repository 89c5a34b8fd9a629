import type { ILogger } from './interface.js';
import { ConsoleLogger } from './console.js';
import { NoopLogger } from './noop.js';

/**
 * Explicit `logger` wins; `debug` alone gives a console logger at debug level.
 */
export function resolveLogger(options: { logger?: ILogger; debug?: boolean }): ILogger {
  if (options.logger) return options.logger;
  if (options.debug) return new ConsoleLogger({ level: 'debug' });
  return new NoopLogger();
}

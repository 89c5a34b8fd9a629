import type { ILogger, LogMethod } from './interface.js';

const discard: LogMethod = () => undefined;

/** Used when neither `logger` nor `debug` is configured */
export class NoopLogger implements ILogger {
  readonly debug = discard;
  readonly info = discard;
  readonly warn = discard;
  readonly error = discard;
}

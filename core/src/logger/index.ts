/**
 * cNFT SDK Logger
 * @module logger
 */

export { LOG_LEVELS, type ILogger, type LogLevel, type LogMethod } from './interface.js';
export type { ConsoleLoggerOptions } from './console.js';
export { NoopLogger } from './noop.js';
export { ConsoleLogger } from './console.js';
export { resolveLogger } from './resolve.js';

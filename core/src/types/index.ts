/**
 * cNFT SDK Types
 * @module types
 */

export type { CnftConfig, ResolvedCnftConfig } from './config.js';

export type {
  CnftEventType,
  CnftEventPayloads,
  CnftEventHandler,
} from './events.js';

export type { Result } from './result.js';
export { ok, err } from './result.js';

/**
 * cNFT SDK Utilities
 * @module utils
 */

export { toBase64, arraysEqual } from './conversions.js';
export { BASE58_PATTERN, isBase58, isNonEmptyString } from './validation.js';

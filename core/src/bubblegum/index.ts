/**
 * Bubblegum helpers
 * @module bubblegum
 */

export {
  BUBBLEGUM_PROGRAM_ID,
  SPL_ACCOUNT_COMPRESSION_PROGRAM_ID,
  SPL_NOOP_PROGRAM_ID,
  HASH_LENGTH,
} from './constants.js';
export {
  deriveTreeConfigAddress,
  decodeHash,
  decodeProofPath,
  toProofAccountMetas,
} from './accounts.js';

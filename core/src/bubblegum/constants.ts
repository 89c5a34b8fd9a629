/**
 * Bubblegum program constants
 * @module bubblegum/constants
 */

import { PublicKey } from '@solana/web3.js';

/** Metaplex Bubblegum program */
export const BUBBLEGUM_PROGRAM_ID = new PublicKey('BGUMAp9Gq7iTEuizy4pqaxsTyUCBK68MDfK752saRPUY');

/** SPL account compression program */
export const SPL_ACCOUNT_COMPRESSION_PROGRAM_ID = new PublicKey('cmtDvXumGCrqC1Age74AVPhSRVXJMd8PJS91L8KbNCK');

/** SPL noop (log wrapper) program */
export const SPL_NOOP_PROGRAM_ID = new PublicKey('noopb9bkMVfRPU8AsbpTUg8AQkHtKwMYZiFUjNRtMmV');

/** Length of every Merkle node hash, root and leaf field */
export const HASH_LENGTH = 32;

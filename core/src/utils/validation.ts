/**
 * Input Validation
 * @module utils/validation
 */

/**
 * Base58 alphabet: digits and letters without 0, O, I and l
 */
export const BASE58_PATTERN = /^[1-9A-HJ-NP-Za-km-z]+$/;

export function isBase58(value: string): boolean {
  return BASE58_PATTERN.test(value);
}

export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim() !== '';
}

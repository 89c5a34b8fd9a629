/**
 * Result Types
 * @module types/result
 */

/**
 * Outcome of an operation: a value, or a classified error. Never both.
 */
export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

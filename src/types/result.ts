/**
 * Result type for expected failures
 * Core logic returns Ok/Err values instead of throwing for conditions the
 * caller is meant to handle (invalid plans, duplicate outcomes, I/O errors).
 */

/**
 * A successful result holding a value of type T
 */
export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

/**
 * A failed result holding an error of type E
 */
export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

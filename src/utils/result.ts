/**
 * Result Type Pattern
 * @module utils/result
 *
 * Ok/Err values for per-item failures that the caller decides how to handle,
 * such as one malformed line in a trace that may be skipped.
 *
 * @example
 * ```typescript
 * import { ok, err, Result, isOk } from './result.js';
 *
 * function parseSize(text: string): Result<number, string> {
 *   const value = Number(text);
 *   return Number.isInteger(value) ? ok(value) : err(`not an integer: ${text}`);
 * }
 * ```
 */

// ============================================================================
// Result Type Definition
// ============================================================================

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E = Error> = Ok<T> | Err<E>;

// ============================================================================
// Constructors
// ============================================================================

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

// ============================================================================
// Type Guards
// ============================================================================

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.ok === true;
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return result.ok === false;
}

// ============================================================================
// Unwrap Functions
// ============================================================================

/**
 * Unwrap the value from a Result, throwing if it's an error
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (isOk(result)) {
    return result.value;
  }
  throw result.error instanceof Error
    ? result.error
    : new Error(String(result.error));
}

/**
 * Collect all Ok values, or return the first Err
 */
export function collect<T, E>(results: Iterable<Result<T, E>>): Result<T[], E> {
  const values: T[] = [];
  for (const result of results) {
    if (isErr(result)) {
      return result;
    }
    values.push(result.value);
  }
  return ok(values);
}

/**
 * Result - success-or-failure return value returned by the parse entry points.
 *
 * @example
 * ```typescript
 * const result = parseIpv4('10.0.0.1');
 * if (result.ok) {
 *   console.log(result.value.toString());
 * } else {
 *   console.log(result.error.message); // 'invalid IPv4 address syntax'
 * }
 * ```
 */

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
  readonly error?: never;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
  readonly value?: never;
}

export type Result<T, E = Error> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

/**
 * Returns the value, or throws the carried error
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw result.error;
}

/**
 * Returns the value, or null on failure
 */
export function toNullable<T, E>(result: Result<T, E>): T | null {
  return result.ok ? result.value : null;
}

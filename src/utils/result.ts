/**
 * Constructors for Result<T, E>.
 *
 * @module result
 */

import { Ok as OkType, Err as ErrType } from '../types/result';

/**
 * Wrap a success value.
 *
 * @param value - The success value
 * @returns Ok<T> result
 *
 * @example
 * ```typescript
 * Ok('a@b.co')
 * // => { ok: true, value: 'a@b.co' }
 * ```
 */
export function Ok<T>(value: T): OkType<T> {
  return { ok: true, value };
}

/**
 * Wrap a failure. For a converted chain the error is the whole error list.
 *
 * @param error - The error value
 * @returns Err<E> result
 *
 * @example
 * ```typescript
 * Err(['No email present'])
 * // => { ok: false, error: ['No email present'] }
 * ```
 */
export function Err<E>(error: E): ErrType<E> {
  return { ok: false, error };
}

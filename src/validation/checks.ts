/**
 * Field checks built on `applyCheck()`.
 *
 * Every check takes the running result last, so checks compose by nesting or
 * through `pipe()`.
 *
 * @module checks
 */

import { isDeepStrictEqual } from 'node:util';
import { Accessor, ValidationResult } from '../types/validation';
import { applyCheck } from './chain';

/**
 * Fail when the field is the empty string.
 *
 * @example
 * ```typescript
 * validatePresenceOf((u: User) => u.email, 'No email present', begin({ email: '' }))
 * // => { valid: false, value: { email: '' }, errors: ['No email present'] }
 * ```
 */
export function validatePresenceOf<V, E>(
  accessor: Accessor<V>,
  errorMessage: E,
  current: ValidationResult<V, E>
): ValidationResult<V, E> {
  return applyCheck((value: V) => accessor(value) === '', errorMessage, current);
}

/**
 * Fail when the field is shorter than `minLength` characters.
 *
 * Length is `String.prototype.length` (UTF-16 code units), the same count
 * `equals(n, s.length, ...)` sees. This is a minimum; for an exact length,
 * compare with `equals()`.
 */
export function validateLengthOf<V, E>(
  accessor: Accessor<V>,
  minLength: number,
  errorMessage: E,
  current: ValidationResult<V, E>
): ValidationResult<V, E> {
  return applyCheck(
    (value: V) => accessor(value).length < minLength,
    errorMessage,
    current
  );
}

/**
 * Fail when the field is longer than `maxLength` characters.
 */
export function validateMaxLengthOf<V, E>(
  accessor: Accessor<V>,
  maxLength: number,
  errorMessage: E,
  current: ValidationResult<V, E>
): ValidationResult<V, E> {
  return applyCheck(
    (value: V) => accessor(value).length > maxLength,
    errorMessage,
    current
  );
}

/**
 * Fail when `left` and `right` differ.
 *
 * Arrays, plain objects, maps and sets compare by structure; primitives by
 * value. `NaN` equals `NaN`, and a top-level `0` equals `-0`. The operands do not come from
 * the carried value; callers usually derive one from it and pass a constant
 * as the other.
 *
 * @example
 * ```typescript
 * equals(8, user.password.length, 'Password must be 8 characters', result)
 * equals([user.role, user.team], ['admin', 'ops'], 'Not an ops admin', result)
 * ```
 */
export function equals<T, V, E>(
  left: T,
  right: T,
  errorMessage: E,
  current: ValidationResult<V, E>
): ValidationResult<V, E> {
  const same = left === right || isDeepStrictEqual(left, right);
  return applyCheck(() => !same, errorMessage, current);
}

/**
 * Fail when the field contains no match for `pattern`.
 *
 * Matches anywhere in the string count; anchor the pattern with `^`/`$` to
 * require a full match. The pattern's `lastIndex` is neither read nor changed,
 * so global and sticky patterns can be reused across chains.
 *
 * @example
 * ```typescript
 * validateMatchOf((u: User) => u.email, /@/, 'Email must contain @', result)
 * ```
 */
export function validateMatchOf<V, E>(
  accessor: Accessor<V>,
  pattern: RegExp,
  errorMessage: E,
  current: ValidationResult<V, E>
): ValidationResult<V, E> {
  return applyCheck(
    (value: V) => !new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, '')).test(accessor(value)),
    errorMessage,
    current
  );
}

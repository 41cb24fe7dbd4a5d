/**
 * Core of the validation chain: result constructors and the combinator every
 * check is built on.
 *
 * A chain starts with `begin(value)` and is threaded through checks that each
 * take the running result as their last argument. Failures accumulate in
 * detection order and a failed chain never becomes valid again.
 *
 * @module chain
 */

import {
  FailurePredicate,
  Invalid as InvalidType,
  NonEmptyArray,
  Step,
  Valid as ValidType,
  ValidationResult,
} from '../types/validation';

/**
 * Create the valid variant.
 *
 * @example
 * ```typescript
 * Valid({ email: 'a@b.co' })
 * // => { valid: true, value: { email: 'a@b.co' } }
 * ```
 */
export function Valid<V>(value: V): ValidType<V> {
  return { valid: true, value };
}

/**
 * Create the invalid variant. The error list is copied.
 *
 * @example
 * ```typescript
 * Invalid({ email: '' }, ['No email present'])
 * // => { valid: false, value: { email: '' }, errors: ['No email present'] }
 * ```
 */
export function Invalid<V, E>(value: V, errors: NonEmptyArray<E>): InvalidType<V, E> {
  const [first, ...rest] = errors;
  return { valid: false, value, errors: [first, ...rest] };
}

/**
 * Start a chain.
 */
export function begin<V, E = string>(value: V): ValidationResult<V, E> {
  return Valid(value);
}

/**
 * Apply one check to the running result.
 *
 * The predicate runs against the carried value whether or not earlier checks
 * failed. When it returns true, `errorMessage` is appended to the errors;
 * otherwise `current` is returned as is.
 *
 * @param failsWhen - Returns true when the value should be rejected
 * @param errorMessage - Recorded when the check fails
 * @param current - The running result
 *
 * @example
 * ```typescript
 * const result = applyCheck((n: number) => n < 0, 'negative', begin(-1));
 * // => { valid: false, value: -1, errors: ['negative'] }
 * ```
 */
export function applyCheck<V, E>(
  failsWhen: FailurePredicate<V>,
  errorMessage: E,
  current: ValidationResult<V, E>
): ValidationResult<V, E> {
  if (!failsWhen(current.value)) {
    return current;
  }

  if (current.valid) {
    return Invalid(current.value, [errorMessage]);
  }

  return Invalid(current.value, [...current.errors, errorMessage]);
}

/**
 * Thread a result through steps, left to right.
 *
 * @example
 * ```typescript
 * pipe(
 *   begin<Login>(login),
 *   (r) => validatePresenceOf((l) => l.email, 'No email present', r),
 *   (r) => validateLengthOf((l) => l.password, 8, 'Password too short', r)
 * );
 * ```
 */
export function pipe<V, E>(
  start: ValidationResult<V, E>,
  ...steps: ReadonlyArray<Step<V, E>>
): ValidationResult<V, E> {
  return steps.reduce<ValidationResult<V, E>>((current, step) => step(current), start);
}

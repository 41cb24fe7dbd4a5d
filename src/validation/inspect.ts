/**
 * Reading a finished chain.
 *
 * @module inspect
 */

import { FormatOptions, FormatOptionsSchema } from '../config';
import { ValidationFailedError } from '../errors';
import { defaultLogger, Logger } from '../logger';
import { Result } from '../types/result';
import { Invalid, Valid, ValidationResult } from '../types/validation';
import { Err, Ok } from '../utils/result';

/**
 * Type guard to check if a chain is still valid.
 *
 * @param result - The result to check
 * @returns true if no check has failed
 *
 * @example
 * ```typescript
 * const result = validatePresenceOf((u: User) => u.email, 'No email present', begin(user));
 * if (isValid(result)) {
 *   save(result.value);
 * }
 * ```
 */
export function isValid<V, E>(result: ValidationResult<V, E>): result is Valid<V> {
  return result.valid === true;
}

/**
 * Type guard to check if any check has failed.
 *
 * @param result - The result to check
 * @returns true if the result carries errors
 *
 * @example
 * ```typescript
 * if (isInvalid(result)) {
 *   console.error(result.errors); // TypeScript knows result.errors exists
 * }
 * ```
 */
export function isInvalid<V, E>(result: ValidationResult<V, E>): result is Invalid<V, E> {
  return result.valid === false;
}

/**
 * Errors collected so far, in detection order. Empty for a valid result.
 */
export function errorsOf<V, E>(result: ValidationResult<V, E>): readonly E[] {
  return result.valid ? [] : result.errors;
}

/**
 * Convert to a `Result`, with the full error list as the error.
 *
 * @example
 * ```typescript
 * toResult(begin(42))                 // => { ok: true, value: 42 }
 * toResult(Invalid(0, ['too small'])) // => { ok: false, error: ['too small'] }
 * ```
 */
export function toResult<V, E>(result: ValidationResult<V, E>): Result<V, readonly E[]> {
  return result.valid ? Ok(result.value) : Err(result.errors);
}

/**
 * Join the error messages into a single line.
 *
 * A valid result formats as the empty string. Non-string errors are passed
 * through `String()`.
 *
 * @throws ZodError when `options` has the wrong shape
 *
 * @example
 * ```typescript
 * formatErrors(result, { prefix: 'Signup rejected: ' })
 * // => 'Signup rejected: No email present, Password too short'
 * ```
 */
export function formatErrors<V, E>(
  result: ValidationResult<V, E>,
  options: Partial<FormatOptions> = {}
): string {
  const config = FormatOptionsSchema.parse(options);
  if (result.valid) {
    return '';
  }

  return config.prefix + result.errors.map((error) => String(error)).join(config.separator);
}

/**
 * Return the carried value, or throw `ValidationFailedError` if any check
 * failed.
 */
export function assertValid<V, E>(result: ValidationResult<V, E>): V {
  if (result.valid) {
    return result.value;
  }

  throw new ValidationFailedError(result.errors, `Validation failed: ${formatErrors(result)}`);
}

/**
 * Pass-through step that logs a warning when the chain is invalid.
 *
 * @example
 * ```typescript
 * pipe(begin(user), checkEmail, checkPassword, (r) => logInvalid(r));
 * // [validation-chain] Validation failed: No email present
 * ```
 */
export function logInvalid<V, E>(
  current: ValidationResult<V, E>,
  logger: Logger = defaultLogger
): ValidationResult<V, E> {
  if (!current.valid) {
    logger.warn(`Validation failed: ${formatErrors(current)}`);
  }
  return current;
}

/**
 * Types for the validation chain.
 *
 * @module validation-types
 */

/**
 * No check has failed yet.
 */
export interface Valid<V> {
  readonly valid: true;
  readonly value: V;
}

/**
 * At least one check has failed.
 *
 * `errors` holds every failure in the order it was detected.
 */
export interface Invalid<V, E> {
  readonly valid: false;
  readonly value: V;
  readonly errors: NonEmptyArray<E>;
}

/**
 * Outcome of threading a value through zero or more checks.
 *
 * Narrow on `valid` to reach `errors`.
 *
 * @example
 * ```typescript
 * const result = validatePresenceOf((u: User) => u.email, 'No email present', begin(user));
 * if (!result.valid) {
 *   console.log(result.errors); // ['No email present']
 * }
 * ```
 */
export type ValidationResult<V, E> = Valid<V> | Invalid<V, E>;

export type NonEmptyArray<T> = readonly [T, ...T[]];

/**
 * Predicate that returns true when the value should be rejected.
 */
export type FailurePredicate<V> = (value: V) => boolean;

/**
 * Projects the string field a check looks at.
 */
export type Accessor<V> = (value: V) => string;

/**
 * One step of a chain, as taken by `pipe()`.
 */
export type Step<V, E> = (current: ValidationResult<V, E>) => ValidationResult<V, E>;

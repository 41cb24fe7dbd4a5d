/**
 * Result<T, E> type for reporting a single outcome.
 *
 * A validation chain reports every failure it saw; a `Result` reports one
 * outcome. `toResult()` converts the former into the latter for code that
 * already speaks `Result`.
 *
 * @example
 * ```typescript
 * const parsed: Result<number, string> = Number.isNaN(n) ? Err('not a number') : Ok(n);
 * ```
 */

/**
 * Success variant of Result<T, E>
 */
export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

/**
 * Failure variant of Result<T, E>
 */
export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E> = Ok<T> | Err<E>;

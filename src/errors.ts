/**
 * Thrown by `assertValid()` when a chain ended invalid.
 *
 * Checks themselves never throw; this error exists for callers that want to
 * leave the result type at a boundary.
 */
export class ValidationFailedError<E = unknown> extends Error {
  readonly code = 'VALIDATION_FAILED';

  constructor(
    public readonly errors: readonly E[],
    message: string
  ) {
    super(message);
    this.name = 'ValidationFailedError';
  }
}

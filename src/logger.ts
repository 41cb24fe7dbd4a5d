/**
 * Sink for the warnings written by `logInvalid()`.
 */
export interface Logger {
  warn(message: string): void;
}

const PREFIX = '[validation-chain]';

/**
 * Writes to `console.warn`, prefixed with `[validation-chain]`.
 *
 * @example
 * ```typescript
 * defaultLogger.warn('Validation failed: No email present');
 * // [validation-chain] Validation failed: No email present
 * ```
 */
export const defaultLogger: Logger = {
  warn(message: string): void {
    console.warn(`${PREFIX} ${message}`);
  },
};

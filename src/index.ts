export type {
  Valid as ValidResult,
  Invalid as InvalidResult,
  ValidationResult,
  NonEmptyArray,
  FailurePredicate,
  Accessor,
  Step,
} from './types/validation';
export type { Result, Ok as OkResult, Err as ErrResult } from './types/result';

export { Valid, Invalid, begin, applyCheck, pipe } from './validation/chain';
export {
  validatePresenceOf,
  validateLengthOf,
  validateMaxLengthOf,
  equals,
  validateMatchOf,
} from './validation/checks';
export {
  isValid,
  isInvalid,
  errorsOf,
  toResult,
  formatErrors,
  assertValid,
  logInvalid,
} from './validation/inspect';

export { Ok, Err } from './utils/result';

export type { FormatOptions } from './config';
export { FormatOptionsSchema } from './config';

export { ValidationFailedError } from './errors';

export type { Logger } from './logger';
export { defaultLogger } from './logger';

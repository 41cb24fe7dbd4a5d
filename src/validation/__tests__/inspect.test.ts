/**
 * Unit tests for reading finished chains.
 */

import { ZodError } from 'zod';
import { ValidationFailedError } from '../../errors';
import { Logger } from '../../logger';
import { begin, Invalid, pipe } from '../chain';
import { validatePresenceOf } from '../checks';
import {
  assertValid,
  errorsOf,
  formatErrors,
  isInvalid,
  isValid,
  logInvalid,
  toResult,
} from '../inspect';

describe('inspect', () => {
  const failed = Invalid({ email: '' }, ['No email present', 'Email too short']);

  describe('isValid / isInvalid', () => {
    it('should narrow on the variant', () => {
      expect(isValid(begin(1))).toBe(true);
      expect(isInvalid(begin(1))).toBe(false);
      expect(isValid(failed)).toBe(false);
      expect(isInvalid(failed)).toBe(true);
    });
  });

  describe('errorsOf', () => {
    it('should return an empty list for a valid result', () => {
      expect(errorsOf(begin(1))).toEqual([]);
    });

    it('should return errors in detection order', () => {
      expect(errorsOf(failed)).toEqual(['No email present', 'Email too short']);
    });
  });

  describe('toResult', () => {
    it('should map valid to ok', () => {
      expect(toResult(begin(42))).toEqual({ ok: true, value: 42 });
    });

    it('should map invalid to err with the full error list', () => {
      expect(toResult(failed)).toEqual({ ok: false, error: ['No email present', 'Email too short'] });
    });
  });

  describe('formatErrors', () => {
    it('should format a valid result as the empty string', () => {
      expect(formatErrors(begin(1), { prefix: 'Rejected: ' })).toBe('');
    });

    it('should join errors with the default separator', () => {
      expect(formatErrors(failed)).toBe('No email present, Email too short');
    });

    it('should apply prefix and separator', () => {
      expect(formatErrors(failed, { prefix: 'Rejected: ', separator: '; ' })).toBe(
        'Rejected: No email present; Email too short'
      );
    });

    it('should stringify non-string errors', () => {
      expect(formatErrors(Invalid(0, [404, 500]))).toBe('404, 500');
    });

    it('should reject options of the wrong type for a valid result', () => {
      const bad = JSON.parse('{"separator": 1}');
      expect(() => formatErrors(begin(1), bad)).toThrow(ZodError);
    });

    it('should reject options of the wrong type for an invalid result', () => {
      const bad = JSON.parse('{"prefix": false}');
      expect(() => formatErrors(failed, bad)).toThrow(ZodError);
    });
  });

  describe('assertValid', () => {
    it('should return the carried value when valid', () => {
      const user = { email: 'a@b.co' };
      expect(assertValid(begin(user))).toBe(user);
    });

    it('should throw ValidationFailedError carrying the errors when invalid', () => {
      let caught: unknown;
      try {
        assertValid(failed);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ValidationFailedError);
      if (caught instanceof ValidationFailedError) {
        expect(caught.code).toBe('VALIDATION_FAILED');
        expect(caught.errors).toEqual(['No email present', 'Email too short']);
        expect(caught.message).toBe('Validation failed: No email present, Email too short');
      }
    });
  });

  describe('logInvalid', () => {
    function createLogger(): Logger & { warn: jest.Mock } {
      return { warn: jest.fn() };
    }

    it('should pass the result through unchanged', () => {
      const logger = createLogger();
      const start = begin(1);

      expect(logInvalid(start, logger)).toBe(start);
      expect(logInvalid(failed, logger)).toBe(failed);
    });

    it('should not log a valid result', () => {
      const logger = createLogger();
      logInvalid(begin(1), logger);

      expect(logger.warn).not.toHaveBeenCalled();
    });

    it('should log one line for an invalid result', () => {
      const logger = createLogger();
      pipe(
        begin<{ email: string }, string>({ email: '' }),
        (r) => validatePresenceOf((u) => u.email, 'No email present', r),
        (r) => logInvalid(r, logger)
      );

      expect(logger.warn).toHaveBeenCalledTimes(1);
      expect(logger.warn).toHaveBeenCalledWith('Validation failed: No email present');
    });

    it('should write to console.warn with the library prefix by default', () => {
      const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      logInvalid(failed);

      expect(warn).toHaveBeenCalledWith('[validation-chain] Validation failed: No email present, Email too short');
      warn.mockRestore();
    });
  });
});

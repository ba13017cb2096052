/**
 * Postal-code key generation tests
 */

import { describe, it, expect } from 'vitest';
import {
  buildPostalKeys,
  formatPostalKey,
  parsePostalBound,
  validatePostalRange,
} from '../../../addresses/postal-range.js';
import { RangeValidationError } from '../../../core/errors.js';

describe('formatPostalKey', () => {
  it('zero-pads to six digits', () => {
    expect(formatPostalKey(1)).toBe('000001');
    expect(formatPostalKey(18956)).toBe('018956');
    expect(formatPostalKey(999999)).toBe('999999');
  });
});

describe('buildPostalKeys', () => {
  it('covers the closed range in ascending order', () => {
    expect(buildPostalKeys(98, 102)).toEqual(['000098', '000099', '000100', '000101', '000102']);
  });

  it('returns a single key when start equals end', () => {
    expect(buildPostalKeys(0, 0)).toEqual(['000000']);
  });

  it('rejects start greater than end', () => {
    expect(() => buildPostalKeys(5, 4)).toThrow(RangeValidationError);
  });
});

describe('validatePostalRange', () => {
  it('rejects bounds outside six digits', () => {
    expect(() => validatePostalRange(0, 1_000_000)).toThrow(
      'end must be an integer between 0 and 999999, got 1000000'
    );
    expect(() => validatePostalRange(-1, 10)).toThrow(RangeValidationError);
  });

  it('rejects non-integer bounds', () => {
    expect(() => validatePostalRange(1.5, 10)).toThrow(
      'start must be an integer between 0 and 999999, got 1.5'
    );
  });

  it('carries both bounds on the error', () => {
    try {
      validatePostalRange(9, 3);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(RangeValidationError);
      if (error instanceof RangeValidationError) {
        expect(error.start).toBe(9);
        expect(error.end).toBe(3);
        expect(error.message).toBe('start (9) must be <= end (3)');
      }
    }
  });
});

describe('parsePostalBound', () => {
  it('accepts padded and unpadded digits', () => {
    expect(parsePostalBound('018956', 'start')).toBe(18956);
    expect(parsePostalBound(' 42 ', 'end')).toBe(42);
  });

  it('rejects anything but one to six digits', () => {
    expect(() => parsePostalBound('1e3', 'start')).toThrow('start must be 1-6 digits, got "1e3"');
    expect(() => parsePostalBound('1234567', 'end')).toThrow(RangeValidationError);
    expect(() => parsePostalBound('', 'end')).toThrow(RangeValidationError);
  });
});

/**
 * Postal-code key generation
 *
 * Keys are six-digit, zero-padded strings over a closed numeric range.
 */

import type { PostalKey } from '../core/types.js';
import { RangeValidationError } from '../core/errors.js';

export const POSTAL_KEY_WIDTH = 6;
export const MAX_POSTAL_CODE = 999_999;

export function formatPostalKey(code: number): PostalKey {
  return String(code).padStart(POSTAL_KEY_WIDTH, '0');
}

/**
 * @throws RangeValidationError if either bound is not an integer in [0, 999999] or start > end
 */
export function validatePostalRange(start: number, end: number): void {
  for (const [label, value] of [['start', start], ['end', end]] as const) {
    if (!Number.isInteger(value) || value < 0 || value > MAX_POSTAL_CODE) {
      throw new RangeValidationError(
        `${label} must be an integer between 0 and ${MAX_POSTAL_CODE}, got ${value}`,
        start,
        end
      );
    }
  }

  if (start > end) {
    throw new RangeValidationError(`start (${start}) must be <= end (${end})`, start, end);
  }
}

export function buildPostalKeys(start: number, end: number): PostalKey[] {
  validatePostalRange(start, end);

  const keys: PostalKey[] = [];
  for (let code = start; code <= end; code++) {
    keys.push(formatPostalKey(code));
  }
  return keys;
}

/**
 * Parse a CLI bound ("18956" or "018956") into a number
 *
 * @throws RangeValidationError for anything but plain digits
 */
export function parsePostalBound(raw: string, label: 'start' | 'end'): number {
  const trimmed = raw.trim();
  if (!/^\d{1,6}$/.test(trimmed)) {
    throw new RangeValidationError(`${label} must be 1-6 digits, got "${raw}"`, NaN, NaN);
  }
  return Number.parseInt(trimmed, 10);
}

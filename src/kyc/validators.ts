/**
 * ID number validators and sanitizers
 *
 * Format well-formedness only: digit count and the optional leading-digit
 * rule. No check-digit validation.
 */

import type { EngineConfig } from '../core/config.js';

export const ID_DIGITS_REGEX = /^\d+$/;
export const LEADING_ZERO_OR_ONE_REGEX = /^[01]/;

export function stripNonDigits(value: string | null | undefined): string {
  if (!value) return '';
  return value.replace(/\D/g, '');
}

/**
 * Checks a digits-only string against the configured ID format.
 */
export function hasWellFormedIdDigits(
  digits: string,
  config: Pick<EngineConfig, 'idDigits' | 'rejectLeadingZeroOrOne'>
): boolean {
  if (!ID_DIGITS_REGEX.test(digits) || digits.length !== config.idDigits) return false;
  if (config.rejectLeadingZeroOrOne && LEADING_ZERO_OR_ONE_REGEX.test(digits)) return false;
  return true;
}

/**
 * Sanitizes a free-form ID value (spaces, dashes, stray characters).
 * Returns the digits if well-formed, or null.
 */
export function sanitizeIdNumber(
  value: string | null | undefined,
  config: Pick<EngineConfig, 'idDigits' | 'rejectLeadingZeroOrOne'>
): string | null {
  const digits = stripNonDigits(value);
  return hasWellFormedIdDigits(digits, config) ? digits : null;
}

/**
 * Masks all but the last `visibleEnd` characters.
 */
export function maskString(str: string | null, visibleEnd: number = 4): string {
  if (!str) return 'N/A';
  if (str.length <= visibleEnd) return str;
  return '*'.repeat(str.length - visibleEnd) + str.slice(-visibleEnd);
}

/**
 * Match engine
 *
 * Compares each extracted field with the caller's expected value. The three
 * comparisons are independent; none is skipped because another failed.
 */

import { compareNames } from '../core/canonicalizer.js';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../core/config.js';
import {
  formatCanonicalDate,
  isSameCanonicalDate,
  tryNormalizeDate,
  type CanonicalDate,
  type DateNormalizeOptions,
} from '../core/dateNormalizer.js';
import type { Extraction, FieldMatch } from './types.js';
import { sanitizeIdNumber } from './validators.js';

/**
 * Order-insensitive name similarity in [0, 1].
 */
export function nameSimilarity(extracted: string, expected: string): number {
  return compareNames(extracted, expected).score;
}

export function matchName(
  extracted: Extraction<string>,
  expected: string,
  config: Pick<EngineConfig, 'nameThreshold'> = DEFAULT_ENGINE_CONFIG
): FieldMatch {
  if (extracted.status === 'absent') {
    return { field: 'name', matched: false, similarityScore: 0, extractedValue: null, expectedValue: expected };
  }

  const similarityScore = nameSimilarity(extracted.value, expected);
  return {
    field: 'name',
    matched: similarityScore >= config.nameThreshold,
    similarityScore,
    extractedValue: extracted.value,
    expectedValue: expected,
  };
}

/**
 * Exact canonical-date equality. Either side failing to normalize is a
 * mismatch with score 0.
 */
export function matchDob(
  extracted: Extraction<CanonicalDate>,
  expected: string,
  options: DateNormalizeOptions = {}
): FieldMatch {
  const extractedValue = extracted.status === 'found' ? formatCanonicalDate(extracted.value) : null;
  const expectedDate = tryNormalizeDate(expected, options);
  const matched = extracted.status === 'found' && expectedDate !== null && isSameCanonicalDate(extracted.value, expectedDate);

  return {
    field: 'dob',
    matched,
    similarityScore: matched ? 1 : 0,
    extractedValue,
    expectedValue: expected,
  };
}

/**
 * Digit-only equality; both sides must be well-formed IDs.
 */
export function matchIdNumber(
  extracted: Extraction<string>,
  expected: string,
  config: Pick<EngineConfig, 'idDigits' | 'rejectLeadingZeroOrOne'> = DEFAULT_ENGINE_CONFIG
): FieldMatch {
  const extractedDigits = extracted.status === 'found' ? sanitizeIdNumber(extracted.value, config) : null;
  const expectedDigits = sanitizeIdNumber(expected, config);
  const matched = extractedDigits !== null && extractedDigits === expectedDigits;

  return {
    field: 'idNumber',
    matched,
    similarityScore: matched ? 1 : 0,
    extractedValue: extracted.status === 'found' ? extracted.value : null,
    expectedValue: expected,
  };
}

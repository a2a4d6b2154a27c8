/**
 * Verification entry point
 *
 * verify(rawOcrText, reference, asOf) → VerificationReport
 *
 * Pure and synchronous: identical inputs give an identical report. Inputs are
 * validated before any work; a malformed input aborts with InvalidInputError
 * and no partial report is produced.
 */

import { z } from 'zod';
import { deriveAgeProfile } from '../core/ageCalculator.js';
import { DEFAULT_ENGINE_CONFIG, EngineConfigSchema, type EngineConfig } from '../core/config.js';
import { canonicalDateFromJsDate } from '../core/dateNormalizer.js';
import { InvalidInputError } from '../core/errors.js';
import { extractFieldsFromVariants } from '../extractors/fieldExtractor.js';
import { ReferenceFileZodSchema } from '../schemas/referenceRecord.js';
import { parseInput } from '../utils/parseInput.js';
import { matchDob, matchIdNumber, matchName } from './matchEngine.js';
import { buildVerificationReport } from './reportBuilder.js';
import { isFound, type ExtractedFields, type OcrTextVariant, type RawText, type ReferenceRecordInput, type VerificationReport } from './types.js';

const VerifyInputSchema = z.object({
  texts: z.array(z.string({ invalid_type_error: 'OCR text must be a string' })),
  // Accepts `aadhaar` as an alias of `idNumber`, like reference files.
  reference: ReferenceFileZodSchema,
  asOf: z.date({ invalid_type_error: 'asOf must be a valid Date' }),
  config: EngineConfigSchema,
});

export interface VerificationDetails {
  report: VerificationReport;
  fields: ExtractedFields;
  /** Normalized OCR text, passes separated by "---" */
  normalizedText: string;
}

/**
 * Full pipeline over one or more OCR passes, returning the intermediate
 * extraction alongside the report.
 */
export function verifyWithDetails(
  texts: readonly RawText[],
  reference: ReferenceRecordInput,
  asOf: Date = new Date(),
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): VerificationDetails {
  const input = parseInput(VerifyInputSchema, { texts, reference, asOf, config }, 'verification input');
  const asOfDate = canonicalDateFromJsDate(input.asOf);
  if (!asOfDate) {
    throw new InvalidInputError('asOf must be a valid Date');
  }

  const { fields, normalizedText } = extractFieldsFromVariants(input.texts, { config: input.config, asOf: asOfDate });

  const name = matchName(fields.name, input.reference.name, input.config);
  const dob = matchDob(fields.dob, input.reference.dob, { referenceYear: asOfDate.year });
  const idNumber = matchIdNumber(fields.idNumber, input.reference.idNumber, input.config);

  // Extracted DOBs are never after asOf, so this cannot throw.
  const age = isFound(fields.dob) ? deriveAgeProfile(fields.dob.value, asOfDate, input.config.teenPolicy) : null;

  return {
    report: buildVerificationReport({ name, dob, idNumber }, age),
    fields,
    normalizedText,
  };
}

export function verify(
  rawOcrText: RawText,
  reference: ReferenceRecordInput,
  asOf: Date = new Date(),
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): VerificationReport {
  if (typeof rawOcrText !== 'string') {
    throw new InvalidInputError('OCR text must be a string');
  }
  return verifyWithDetails([rawOcrText], reference, asOf, config).report;
}

/**
 * Verifies against several OCR passes of the same document, in priority
 * order; each field comes from the first pass that yields it.
 */
export function verifyVariants(
  variants: readonly (RawText | OcrTextVariant)[],
  reference: ReferenceRecordInput,
  asOf: Date = new Date(),
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): VerificationReport {
  const texts = variants.map((variant) => (typeof variant === 'string' ? variant : variant.text));
  return verifyWithDetails(texts, reference, asOf, config).report;
}

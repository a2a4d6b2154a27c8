/**
 * Field extraction pipeline
 *
 * Normalizes OCR text and runs the extractors in declaration order
 * (DOB, ID number, name). Each accepted span is claimed so a later extractor
 * cannot assign the same characters to another field.
 */

import { normalizeOcrText } from '../core/textNormalizer.js';
import { compareCanonicalDates, tryNormalizeDate, type CanonicalDate } from '../core/dateNormalizer.js';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../core/config.js';
import { absent, type ExtractedFields, type Extraction, type RawText, type TextSpan } from '../kyc/types.js';
import type { CascadeHit } from './patternCascade.js';
import { extractDob } from './dobExtractor.js';
import { extractIdNumber } from './idNumberExtractor.js';
import { extractName } from './nameExtractor.js';

export interface ExtractOptions {
  config?: EngineConfig;
  /** Dates after this day (or in a later year) are not accepted as a DOB. */
  asOf?: CanonicalDate;
}

export interface FieldExtractionResult {
  fields: ExtractedFields;
  normalizedText: string;
}

function fromHit<T>(hit: CascadeHit<T>, variantIndex: number): Extraction<T> {
  return {
    status: 'found',
    value: hit.value,
    raw: hit.raw,
    patternId: hit.patternId,
    span: hit.span,
    variantIndex,
  };
}

function toDobExtraction(
  hit: CascadeHit<string> | null,
  asOf: CanonicalDate | undefined,
  variantIndex: number
): Extraction<CanonicalDate> {
  if (!hit) return absent('no_pattern_matched');

  const date = tryNormalizeDate(hit.value, asOf ? { referenceYear: asOf.year } : {});
  if (!date) return absent('unparseable_date', hit.raw);
  if (asOf && compareCanonicalDates(date, asOf) > 0) return absent('after_as_of', hit.raw);

  return fromHit({ ...hit, value: date }, variantIndex);
}

export function extractFields(rawText: RawText, options: ExtractOptions = {}, variantIndex = 0): FieldExtractionResult {
  const config = options.config ?? DEFAULT_ENGINE_CONFIG;
  const text = normalizeOcrText(rawText);
  const claimed: TextSpan[] = [];

  const dobHit = extractDob(text);
  if (dobHit) claimed.push(dobHit.span);

  const idHit = extractIdNumber(text, { claimed, config });
  if (idHit) claimed.push(idHit.span);

  const nameHit = extractName(text, { claimed, dobSpan: dobHit?.span ?? null });

  return {
    fields: {
      name: nameHit ? fromHit(nameHit, variantIndex) : absent('no_pattern_matched'),
      dob: toDobExtraction(dobHit, options.asOf, variantIndex),
      idNumber: idHit ? fromHit(idHit, variantIndex) : absent('no_pattern_matched'),
    },
    normalizedText: text,
  };
}

function firstFound<T>(candidates: Extraction<T>[]): Extraction<T> {
  return candidates.find((c) => c.status === 'found') ?? candidates[0] ?? absent('no_pattern_matched');
}

/**
 * Runs extraction over several OCR passes of the same document. Each field is
 * taken from the first pass that yields it.
 */
export function extractFieldsFromVariants(
  texts: readonly RawText[],
  options: ExtractOptions = {}
): FieldExtractionResult {
  const results = texts.map((text, index) => extractFields(text, options, index));

  return {
    fields: {
      name: firstFound(results.map((r) => r.fields.name)),
      dob: firstFound(results.map((r) => r.fields.dob)),
      idNumber: firstFound(results.map((r) => r.fields.idNumber)),
    },
    normalizedText: results.map((r) => r.normalizedText).join('\n---\n'),
  };
}

/**
 * Verification Domain Types
 *
 * Data structures shared by the extractors, the match engine and the report
 * builder. Extraction results use a tagged option (`Extraction<T>`) so an
 * absent field is an explicit state rather than a null sentinel.
 */

import type { CanonicalDate } from '../core/dateNormalizer.js';

export type { CanonicalDate };

/** Raw OCR output; no structure guaranteed. */
export type RawText = string;

/**
 * One OCR pass over the document. The engine only reads `text`; `confidence`
 * and `source` are carried for diagnostics.
 */
export type OcrTextVariant = {
  text: RawText;
  confidence?: number | null;
  source?: string | null;
};

/** Character offsets into the normalized OCR text, end exclusive. */
export type TextSpan = {
  start: number;
  end: number;
};

export type AbsentReason = 'no_pattern_matched' | 'unparseable_date' | 'after_as_of';

export type Extraction<T> =
  | {
      status: 'found';
      value: T;
      /** Raw matched text before normalization */
      raw: string;
      patternId: string;
      span: TextSpan;
      /** Index of the OCR variant the value came from */
      variantIndex: number;
    }
  | {
      status: 'absent';
      reason: AbsentReason;
      raw?: string;
    };

export type ExtractedFields = {
  name: Extraction<string>;
  dob: Extraction<CanonicalDate>;
  idNumber: Extraction<string>;
};

/**
 * Caller-supplied expected values. Read-only to the engine.
 */
export type ReferenceRecord = {
  name: string;
  dob: string;
  idNumber: string;
};

/** What callers may pass; `aadhaar` is an alias of `idNumber`. */
export type ReferenceRecordInput = Omit<ReferenceRecord, 'idNumber'> & {
  idNumber?: string;
  aadhaar?: string;
};

export type FieldName = 'name' | 'dob' | 'idNumber';

export type FieldMatch = {
  field: FieldName;
  matched: boolean;
  /** 0..1; exact fields score 0 or 1 */
  similarityScore: number;
  extractedValue: string | null;
  expectedValue: string;
};

export type VerificationReport = {
  readonly name: Readonly<FieldMatch>;
  readonly dob: Readonly<FieldMatch>;
  readonly idNumber: Readonly<FieldMatch>;
  readonly allMatch: boolean;
  readonly ageYears: number | null;
  readonly isTeen: boolean | null;
  /** Values as found on the document (dob as YYYY-MM-DD) */
  readonly extracted: Readonly<{
    name: string | null;
    dob: string | null;
    idNumber: string | null;
  }>;
};

export function isFound<T>(extraction: Extraction<T>): extraction is Extract<Extraction<T>, { status: 'found' }> {
  return extraction.status === 'found';
}

export function absent<T>(reason: AbsentReason, raw?: string): Extraction<T> {
  return raw === undefined ? { status: 'absent', reason } : { status: 'absent', reason, raw };
}

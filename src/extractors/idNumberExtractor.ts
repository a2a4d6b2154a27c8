import type { FieldPattern, CascadeHit } from './patternCascade.js';
import { overlapsAny, runCascade, spansAdjacentOnLine } from './patternCascade.js';
import { hasWellFormedIdDigits, stripNonDigits } from '../kyc/validators.js';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../core/config.js';
import type { TextSpan } from '../kyc/types.js';

const ID_GROUPS = String.raw`\d{4}[ \-]?\d{4}[ \-]?\d{4}`;
const ID_LABEL = String.raw`(?:Aadhaar|Aadhar|UID|आधार)(?:[^\S\n]*(?:Number|No\.?))?`;

export interface IdExtractOptions {
  /** Spans already taken by the DOB extractor */
  claimed?: readonly TextSpan[];
  config?: Pick<EngineConfig, 'idDigits' | 'rejectLeadingZeroOrOne'>;
}

export function buildIdPatterns(
  config: Pick<EngineConfig, 'idDigits' | 'rejectLeadingZeroOrOne'> = DEFAULT_ENGINE_CONFIG
): FieldPattern<string>[] {
  const toDigits = (raw: string) => {
    const digits = stripNonDigits(raw);
    return hasWellFormedIdDigits(digits, config) ? digits : null;
  };

  return [
    {
      id: 'id_labeled',
      description: 'Aadhaar / UID label followed by three 4-digit groups',
      regex: new RegExp(
        String.raw`(?<![A-Za-z])${ID_LABEL}[^\S\n]*[:\-]?[^\S\n]*(${ID_GROUPS})(?![ \-]?\d)`,
        'i'
      ),
      transform: toDigits,
    },
    {
      id: 'id_grouped',
      description: 'three 4-digit groups not touching other digits',
      regex: new RegExp(String.raw`(?<!\d[ \-]?)(${ID_GROUPS})(?![ \-]?\d)`),
      transform: toDigits,
    },
  ];
}

export const ID_PATTERNS: readonly FieldPattern<string>[] = buildIdPatterns();

/**
 * Finds the ID number and returns its digits only. Candidates overlapping a
 * claimed span, or sitting right next to one on the same line, are skipped so
 * the digits of a birth year are never assigned to two fields.
 */
export function extractIdNumber(text: string, options: IdExtractOptions = {}): CascadeHit<string> | null {
  const claimed = options.claimed ?? [];
  const patterns = options.config ? buildIdPatterns(options.config) : ID_PATTERNS;

  return runCascade(text, patterns, {
    isBlocked: (span) =>
      overlapsAny(span, claimed) || claimed.some((other) => spansAdjacentOnLine(span, other, text)),
  });
}

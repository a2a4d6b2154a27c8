import type { FieldPattern, CascadeHit, PatternContext } from './patternCascade.js';
import { matchesAnyPattern, overlapsAny, runCascade, trimNoise } from './patternCascade.js';
import { DOB_PATTERNS } from './dobExtractor.js';
import { ID_PATTERNS } from './idNumberExtractor.js';
import type { TextSpan } from '../kyc/types.js';

export const MAX_NAME_LENGTH = 40;

const NAME_VALUE = String.raw`(\p{L}[\p{L}\p{M}.'\- ]*)`;

// Titles are not part of the name compared against the reference.
const HONORIFIC_PREFIX = /^(?:Mrs|Mr|Ms|Miss|Shri|Smt|Km|Kumari|Dr)\.?\s+/i;

// A name value ends where the next field label starts.
const NAME_STOP =
  /\b(?:DOB|D\.O\.B|Date|Birth|Year|Gender|Sex|Male|Female|Aadhaar|Aadhar|UID|VID|Address|Father|Mother|Husband|S\/O|D\/O|W\/O|C\/O)\b/i;

// "Father's Name: ..." and similar belong to someone else.
const RELATION_CONTEXT = /(?:father|mother|husband|guardian|spouse)/i;

// Card boilerplate that looks like a name line to the fallback heuristic.
const BOILERPLATE = new Set([
  'government', 'india', 'unique', 'identification', 'authority', 'aadhaar', 'aadhar',
  'male', 'female', 'dob', 'birth', 'date', 'year', 'address', 'enrolment', 'enrollment',
  'help', 'www', 'card', 'republic', 'signature', 'valid', 'issue', 'issued', 'download',
  'father', 'mother', 'vid', 'uid', 'mera', 'pehchaan', 'identity', 'of',
]);

/**
 * Cuts a captured run at the next label and trims it. Returns null when what
 * is left cannot be a name.
 */
export function cleanNameValue(raw: string): string | null {
  const stop = raw.search(NAME_STOP);
  const value = trimNoise(stop >= 0 ? raw.slice(0, stop) : raw)
    .replace(/\s+/g, ' ')
    .replace(HONORIFIC_PREFIX, '');

  if (!value || value.length > MAX_NAME_LENGTH) return null;
  if (!/\p{L}{2,}/u.test(value)) return null;
  return value;
}

const labeledValue = (raw: string, context: PatternContext) =>
  RELATION_CONTEXT.test(context.linePrefix) ? null : cleanNameValue(raw);

export const NAME_PATTERNS: readonly FieldPattern<string>[] = [
  {
    id: 'name_labeled',
    description: 'Name / Full Name / नाम label followed by letters',
    regex: new RegExp(
      String.raw`(?<!\p{L})(?:Full[^\S\n]+Name|Name|नाम)[^\S\n]*[:\-]?[^\S\n]*${NAME_VALUE}`,
      'iu'
    ),
    transform: labeledValue,
  },
  {
    id: 'name_addressed_to',
    description: '"To <name>" at the start of a line (letters)',
    regex: new RegExp(String.raw`^(?:To|TO)[^\S\n]+${NAME_VALUE}`, 'mu'),
    transform: (raw) => cleanNameValue(raw),
  },
  {
    id: 'name_honorific',
    description: 'Mr / Mrs / Ms / Shri / Smt / Km prefix',
    regex: new RegExp(String.raw`(?<!\p{L})(?:Mrs|Mr|Ms|Shri|Smt|Km)\.?[^\S\n]+${NAME_VALUE}`, 'iu'),
    transform: (raw) => cleanNameValue(raw),
  },
];

export interface NameExtractOptions {
  claimed?: readonly TextSpan[];
  /** Span of the extracted DOB; the line right above it is favoured. */
  dobSpan?: TextSpan | null;
}

const ALPHA_TOKEN = /^\p{L}[\p{L}\p{M}.'\-]*$/u;

/**
 * Fallback heuristic: the line made mostly of alphabetic tokens, excluding
 * lines with DOB or ID shapes and card boilerplate. Ties go to the earliest.
 */
export function pickNameLikeLine(text: string, options: NameExtractOptions = {}): CascadeHit<string> | null {
  const claimed = options.claimed ?? [];
  let best: { hit: CascadeHit<string>; score: number } | null = null;

  let offset = 0;
  for (const line of text.split('\n')) {
    const span: TextSpan = { start: offset, end: offset + line.length };
    const nextLineStart = span.end + 1;
    offset = nextLineStart;

    if (overlapsAny(span, claimed) || /\d/.test(line)) continue;
    if (matchesAnyPattern(line, DOB_PATTERNS) || matchesAnyPattern(line, ID_PATTERNS)) continue;

    const tokens = line.split(' ').filter((t) => t.length > 0);
    if (tokens.length < 2 || tokens.length > 5) continue;

    const alphaTokens = tokens.filter((t) => ALPHA_TOKEN.test(t));
    if (alphaTokens.length < 2) continue;
    if (alphaTokens.some((t) => BOILERPLATE.has(t.toLowerCase().replace(/[^a-z]/g, '')))) continue;

    const ratio = alphaTokens.length / tokens.length;
    if (ratio < 0.75) continue;

    const value = cleanNameValue(alphaTokens.join(' '));
    if (!value) continue;

    const dobSpan = options.dobSpan;
    const directlyAboveDob =
      dobSpan !== null && dobSpan !== undefined && dobSpan.start >= nextLineStart &&
      !text.slice(nextLineStart, dobSpan.start).includes('\n');
    const score = ratio + (directlyAboveDob ? 0.5 : 0);

    if (!best || score > best.score) {
      best = { hit: { value, raw: line, patternId: 'name_fallback_line', span }, score };
    }
  }
  return best ? best.hit : null;
}

export function extractName(text: string, options: NameExtractOptions = {}): CascadeHit<string> | null {
  const claimed = options.claimed ?? [];
  return (
    runCascade(text, NAME_PATTERNS, { isBlocked: (span) => overlapsAny(span, claimed) }) ??
    pickNameLikeLine(text, options)
  );
}

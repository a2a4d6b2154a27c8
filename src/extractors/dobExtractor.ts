import type { FieldPattern, CascadeHit, CascadeOptions } from './patternCascade.js';
import { runCascade, trimNoise } from './patternCascade.js';

const MONTH = String.raw`(?:jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)[a-z]*\.?`;
const DAY_FIRST = String.raw`\d{1,2}[/\-. ]\d{1,2}[/\-. ]\d{4}`;
const YEAR_FIRST = String.raw`\d{4}[/\-.]\d{1,2}[/\-.]\d{1,2}`;
const DAY_MONTH_NAME = String.raw`\d{1,2}(?:st|nd|rd|th)?[ \-/]?${MONTH}[ \-/,]*\d{4}`;
const MONTH_NAME_DAY = String.raw`${MONTH} ?\d{1,2}(?:st|nd|rd|th)?,? ?\d{4}`;

const DOB_LABEL = String.raw`(?:Date\s*of\s*Birth|D\.?O\.?B\.?|Birth\s*Date|जन्म\s*तिथि)(?:\s*/\s*D\.?O\.?B\.?)?`;

// Unlabeled dates on lines like "Issue Date: 07/01/2016" are document dates, not birth dates.
const NON_BIRTH_CONTEXT = /(?:issue|download|print|generat|valid|expir|enrol)/i;

const keepRaw = (raw: string) => trimNoise(raw) || null;

const unlabeled = (raw: string, context: { linePrefix: string }) =>
  NON_BIRTH_CONTEXT.test(context.linePrefix) ? null : keepRaw(raw);

export const DOB_PATTERNS: readonly FieldPattern<string>[] = [
  {
    id: 'dob_labeled',
    description: 'DOB / Date of Birth label followed by any date shape',
    regex: new RegExp(
      String.raw`(?<![A-Za-z])${DOB_LABEL}[^\S\n]*[:\-]?[^\S\n]*(${DAY_FIRST}|${YEAR_FIRST}|${DAY_MONTH_NAME}|${MONTH_NAME_DAY})(?!\d)`,
      'i'
    ),
    transform: keepRaw,
  },
  {
    id: 'dob_day_first',
    description: 'dd/mm/yyyy, dd-mm-yyyy or space separated',
    regex: new RegExp(String.raw`(?<!\d)(${DAY_FIRST})(?!\d)`),
    transform: unlabeled,
  },
  {
    id: 'dob_year_first',
    description: 'yyyy-mm-dd',
    regex: new RegExp(String.raw`(?<!\d)(${YEAR_FIRST})(?!\d)`),
    transform: unlabeled,
  },
  {
    id: 'dob_day_month_name',
    description: '15 Aug 1995',
    regex: new RegExp(String.raw`(?<![\dA-Za-z])(${DAY_MONTH_NAME})(?!\d)`, 'i'),
    transform: unlabeled,
  },
  {
    id: 'dob_month_name_day',
    description: 'Aug 15, 1995',
    regex: new RegExp(String.raw`(?<![A-Za-z])(${MONTH_NAME_DAY})(?!\d)`, 'i'),
    transform: unlabeled,
  },
];

/**
 * Finds the raw date-of-birth string. No calendar validation happens here.
 */
export function extractDob(text: string, options: CascadeOptions = {}): CascadeHit<string> | null {
  return runCascade(text, DOB_PATTERNS, options);
}

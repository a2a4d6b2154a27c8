/**
 * OCR text normalization
 *
 * Cleans raw OCR output before pattern search: folds compatibility characters,
 * drops stray glyphs, collapses whitespace per line and re-joins field labels
 * that OCR split from their values.
 */

// Field labels that may appear alone on a line, with their value on the next one.
const LABEL_ONLY_LINES: RegExp[] = [
  /^(?:full\s+)?name$/i,
  /^नाम$/,
  /^(?:dob|d\.o\.b\.?|date\s+of\s+birth(?:\s*\/\s*dob)?|birth\s*date)$/i,
  /^जन्म\s*तिथि(?:\s*\/\s*dob)?$/i,
  /^(?:aadhaar|aadhar|uid)(?:\s+(?:number|no\.?))?$/i,
  /^आधार(?:\s+(?:number|no\.?))?$/i,
  // Document dates, joined so their value keeps the label as context.
  /^(?:date\s+of\s+)?(?:issue|print|download|generation|expiry)(?:\s+date)?$/i,
  /^(?:issued|printed|downloaded|generated)\s+on$/i,
];

const CONTROL_CHARS = /[\u0000-\u0008\u000b\u000c\u000e-\u001f\u007f]/g;
const STRAY_GLYPHS = /[|~¦_]/g;

function isLabelOnly(line: string): boolean {
  const bare = line.replace(/\s*[:\-]\s*$/, '').trim();
  return LABEL_ONLY_LINES.some((pattern) => pattern.test(bare));
}

/**
 * Normalizes raw OCR text. Total over any string; empty input yields "".
 * Line structure is kept (one logical line per "\n") and casing is preserved.
 */
export function normalizeOcrText(raw: string): string {
  const lines = raw
    .normalize('NFKC')
    .replace(/\r\n?/g, '\n')
    .replace(CONTROL_CHARS, ' ')
    .replace(STRAY_GLYPHS, ' ')
    .split('\n')
    .map((line) => line.replace(/[^\S\n]+/g, ' ').trim())
    .filter((line) => line.length > 0);

  const joined: string[] = [];
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const next = lines[i + 1];
    if (next !== undefined && isLabelOnly(line) && !isLabelOnly(next)) {
      joined.push(`${line} ${next}`);
      i++;
    } else {
      joined.push(line);
    }
  }
  return joined.join('\n');
}

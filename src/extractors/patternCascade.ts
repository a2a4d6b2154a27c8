/**
 * Pattern cascades
 *
 * An extractor is an ordered list of FieldPattern records. Each pattern is a
 * regex plus a pure transform; the first pattern that yields an accepted
 * candidate wins. Adding a label variant means adding an entry, not a branch.
 */

import type { TextSpan } from '../kyc/types.js';

export interface PatternContext {
  /** Whole normalized text */
  text: string;
  /** Text on the same line before the capture */
  linePrefix: string;
}

export interface FieldPattern<T> {
  id: string;
  description: string;
  /** Capture group 1 holds the value; group 0 is used when there is none. */
  regex: RegExp;
  /** Returns null to reject the candidate and keep scanning. */
  transform: (raw: string, context: PatternContext) => T | null;
}

export interface CascadeHit<T> {
  value: T;
  raw: string;
  patternId: string;
  span: TextSpan;
}

export interface CascadeOptions {
  /** Rejects candidates whose span is already taken by another field. */
  isBlocked?: (span: TextSpan) => boolean;
}

function withFlags(regex: RegExp, required: string): RegExp {
  const flags = new Set(regex.flags.split(''));
  for (const flag of required) flags.add(flag);
  return new RegExp(regex.source, [...flags].join(''));
}

export function spansOverlap(a: TextSpan, b: TextSpan): boolean {
  return a.start < b.end && b.start < a.end;
}

/**
 * True when the two spans sit on the same line separated only by spaces or
 * dashes.
 */
export function spansAdjacentOnLine(a: TextSpan, b: TextSpan, text: string): boolean {
  const [first, second] = a.start <= b.start ? [a, b] : [b, a];
  if (first.end > second.start) return false;
  return /^[ \t-]*$/.test(text.slice(first.end, second.start));
}

export function overlapsAny(span: TextSpan, claimed: readonly TextSpan[]): boolean {
  return claimed.some((other) => spansOverlap(span, other));
}

function linePrefixAt(text: string, index: number): string {
  const lineStart = text.lastIndexOf('\n', index - 1) + 1;
  return text.slice(lineStart, index);
}

/**
 * Runs patterns in order against `text`. Within a pattern every match is tried
 * left to right (overlapping retries included) until one is accepted.
 */
export function runCascade<T>(
  text: string,
  patterns: readonly FieldPattern<T>[],
  options: CascadeOptions = {}
): CascadeHit<T> | null {
  for (const pattern of patterns) {
    // Fresh copy per run: a shared global regex would carry lastIndex between calls.
    const regex = withFlags(pattern.regex, 'gd');
    let match: RegExpExecArray | null;

    while ((match = regex.exec(text)) !== null) {
      const hasGroup = match[1] !== undefined;
      const raw = hasGroup ? match[1] : match[0];
      const indices = hasGroup ? match.indices?.[1] : match.indices?.[0];
      const start = indices ? indices[0] : match.index;
      const span: TextSpan = { start, end: start + raw.length };

      if (!options.isBlocked?.(span)) {
        const value = pattern.transform(raw, { text, linePrefix: linePrefixAt(text, start) });
        if (value !== null) {
          return { value, raw, patternId: pattern.id, span };
        }
      }
      regex.lastIndex = match.index + 1;
    }
  }
  return null;
}

/**
 * True when any pattern's regex matches somewhere in `text`.
 */
export function matchesAnyPattern(text: string, patterns: readonly FieldPattern<unknown>[]): boolean {
  return patterns.some((pattern) => withFlags(pattern.regex, '').test(text));
}

/**
 * Strips punctuation and whitespace from both ends of a captured value.
 */
export function trimNoise(value: string): string {
  return value.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, '');
}

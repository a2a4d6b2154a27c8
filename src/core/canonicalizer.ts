/**
 * Name canonicalization and fuzzy comparison
 *
 * Handles:
 * - Accent folding (ÉLODIE → ELODIE)
 * - Case and punctuation (O'Neil-Smith → ONEIL SMITH)
 * - Word order (DOE JOHN ↔ JOHN DOE), via a sorted-token form
 *
 * Similarity is normalized Levenshtein distance in [0, 1].
 */

// ============================================================================
// TYPES
// ============================================================================

export interface CanonicalName {
  /** Upper-cased, accent-folded, punctuation-free, single-spaced */
  canonical: string;
  /** Tokens in original order */
  tokens: string[];
  /** Tokens sorted alphabetically and joined */
  sorted: string;
  /** List of transformations applied */
  transformations: string[];
}

export interface NameComparison {
  /** max(direct, tokenSorted), 0..1 */
  score: number;
  /** Similarity of the canonical strings as written */
  direct: number;
  /** Similarity of the sorted-token forms */
  tokenSorted: number;
  matchType: 'empty' | 'exact' | 'normalized' | 'token' | 'fuzzy';
  reasoning: string;
}

// ============================================================================
// CORE FUNCTIONS
// ============================================================================

/**
 * Removes diacritics/accents from a string
 */
export function removeDiacritics(input: string): string {
  return input
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '');
}

/**
 * Replaces punctuation with spaces and collapses whitespace. Apostrophes are
 * dropped so O'NEIL stays one token.
 */
export function normalizeWhitespace(input: string): string {
  return input
    .replace(/['’`]/g, '')
    .replace(/[^\p{L}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function canonicalizeName(input: string): CanonicalName {
  if (!input) {
    return { canonical: '', tokens: [], sorted: '', transformations: [] };
  }

  const transformations: string[] = [];
  let result = input.toUpperCase();

  const withoutDiacritics = removeDiacritics(result);
  if (withoutDiacritics !== result) {
    transformations.push('diacritics_removed');
    result = withoutDiacritics;
  }

  const withNormalizedSpace = normalizeWhitespace(result);
  if (withNormalizedSpace !== result) {
    transformations.push('whitespace_normalized');
    result = withNormalizedSpace;
  }

  const tokens = result.split(' ').filter((t) => t.length > 0);
  return {
    canonical: tokens.join(' '),
    tokens,
    sorted: [...tokens].sort().join(' '),
    transformations,
  };
}

// ============================================================================
// COMPARISON FUNCTIONS
// ============================================================================

/**
 * Levenshtein edit distance (insert, delete, substitute; unit costs).
 */
export function levenshteinDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
    }
    previous = current;
  }
  return previous[b.length];
}

/**
 * 1 - distance / longer length. Two empty strings score 0: there is nothing
 * to compare.
 */
export function editSimilarity(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 0;
  return 1 - levenshteinDistance(a, b) / longest;
}

/**
 * Compares two person names, order-insensitively.
 */
export function compareNames(a: string, b: string): NameComparison {
  const canonA = canonicalizeName(a);
  const canonB = canonicalizeName(b);

  if (!canonA.canonical || !canonB.canonical) {
    return { score: 0, direct: 0, tokenSorted: 0, matchType: 'empty', reasoning: 'One or both names are empty' };
  }

  const direct = editSimilarity(canonA.canonical, canonB.canonical);
  const tokenSorted = editSimilarity(canonA.sorted, canonB.sorted);
  const score = Math.max(direct, tokenSorted);

  if (a.trim() === b.trim()) {
    return { score, direct, tokenSorted, matchType: 'exact', reasoning: 'Identical input' };
  }
  if (direct === 1) {
    return {
      score, direct, tokenSorted,
      matchType: 'normalized',
      reasoning: `Match after canonicalization: ${[...canonA.transformations, ...canonB.transformations].join(', ') || 'case'}`,
    };
  }
  if (tokenSorted === 1) {
    return { score, direct, tokenSorted, matchType: 'token', reasoning: 'Same tokens in a different order' };
  }
  return {
    score, direct, tokenSorted,
    matchType: 'fuzzy',
    reasoning: `Edit similarity ${(direct * 100).toFixed(0)}% as written, ${(tokenSorted * 100).toFixed(0)}% with sorted tokens`,
  };
}

/**
 * Tool: normalize_date
 *
 * Parses a free-form date the same way reference and document DOBs are parsed.
 */

import { z } from 'zod';
import { formatCanonicalDate, normalizeDate } from '../../core/dateNormalizer.js';
import { parseInput } from '../../utils/parseInput.js';
import { errorResponseFrom, okResponse, type McpToolResponse } from '../responses.js';

export const NORMALIZE_DATE_INPUT = {
  value: z.string().describe('Date string, e.g. 15/08/1995, 1995-08-15, 15 Aug 1995'),
  reference_year: z.number().int().optional().describe('Latest accepted year (default: current year)'),
};

const NormalizeDateSchema = z.object(NORMALIZE_DATE_INPUT);

export type NormalizeDateArgs = z.infer<typeof NormalizeDateSchema>;

export interface NormalizeDateResult {
  canonical: string;
  year: number;
  month: number;
  day: number;
}

export function normalizeDateValue(args: unknown): NormalizeDateResult {
  const input = parseInput(NormalizeDateSchema, args, 'normalize_date arguments');
  const date = normalizeDate(input.value, { referenceYear: input.reference_year });
  return { canonical: formatCanonicalDate(date), year: date.year, month: date.month, day: date.day };
}

export async function handleNormalizeDate(args: NormalizeDateArgs): Promise<McpToolResponse> {
  try {
    return okResponse(normalizeDateValue(args));
  } catch (error) {
    return errorResponseFrom(error);
  }
}

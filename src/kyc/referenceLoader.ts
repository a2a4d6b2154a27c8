import * as fs from 'fs/promises';
import { InvalidInputError } from '../core/errors.js';
import { ReferenceFileZodSchema } from '../schemas/referenceRecord.js';
import { parseInput } from '../utils/parseInput.js';
import type { ReferenceRecord } from './types.js';

/**
 * Parses a reference record from JSON text. Accepts `aadhaar` as an alias of
 * `idNumber`; missing fields become empty strings.
 */
export function parseReferenceRecord(json: string): ReferenceRecord {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InvalidInputError(`Reference record is not valid JSON: ${message}`);
  }
  return parseInput(ReferenceFileZodSchema, data, 'reference record');
}

export async function loadReferenceRecord(filePath: string): Promise<ReferenceRecord> {
  let json: string;
  try {
    json = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InvalidInputError(`Cannot read reference record ${filePath}: ${message}`);
  }
  return parseReferenceRecord(json);
}

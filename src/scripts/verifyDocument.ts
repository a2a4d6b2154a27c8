#!/usr/bin/env node
import "dotenv/config";
import * as fs from 'fs/promises';
import * as path from 'path';
import { fileURLToPath } from 'url';

import { loadEngineConfig } from '../core/config.js';
import { parseAsOfDate } from '../core/dateNormalizer.js';
import { InvalidInputError, isVerificationError } from '../core/errors.js';
import { loadReferenceRecord } from '../kyc/referenceLoader.js';
import { formatVerificationSummary } from '../kyc/reportBuilder.js';
import { runVerification } from '../kyc/verificationService.js';

export const USAGE = [
  'Usage: npm run verify -- --text=<ocr.txt> [--text=<pass2.txt> ...] --reference=<reference.json>',
  '         [--as-of=YYYY-MM-DD] [--redact] [--debug] [--json]',
  '  --text:      OCR output of the document; repeat for additional OCR passes',
  '  --reference: JSON with name, dob and aadhaar (or idNumber)',
  '  --as-of:     date used for the age calculation (default: today)',
].join('\n');

export interface CliOptions {
  textPaths: string[];
  referencePath: string;
  asOf: Date | null;
  redact: boolean;
  debug: boolean;
  json: boolean;
}

export function parseCliArgs(args: readonly string[]): CliOptions {
  const valueOf = (arg: string) => arg.slice(arg.indexOf('=') + 1);

  const textPaths = args.filter(a => a.startsWith('--text=')).map(valueOf).filter(v => v.length > 0);
  const referenceArg = args.find(a => a.startsWith('--reference='));
  const asOfArg = args.find(a => a.startsWith('--as-of='));

  if (textPaths.length === 0 || !referenceArg || !valueOf(referenceArg)) {
    throw new InvalidInputError(`Missing --text or --reference\n${USAGE}`);
  }

  let asOf: Date | null = null;
  if (asOfArg) {
    asOf = parseAsOfDate(valueOf(asOfArg));
    if (!asOf) {
      throw new InvalidInputError(`Invalid --as-of value "${valueOf(asOfArg)}" (expected YYYY-MM-DD)`);
    }
  }

  return {
    textPaths,
    referencePath: valueOf(referenceArg),
    asOf,
    redact: args.includes('--redact'),
    debug: args.includes('--debug'),
    json: args.includes('--json'),
  };
}

async function readOcrText(filePath: string): Promise<string> {
  try {
    return await fs.readFile(path.resolve(filePath), 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InvalidInputError(`Cannot read OCR text ${filePath}: ${message}`);
  }
}

/**
 * Runs the CLI. Returns the exit code: 0 all fields match, 2 mismatch, 1 error.
 */
export async function runCli(args: readonly string[], write: (chunk: string) => void = (c) => process.stdout.write(c)): Promise<number> {
  try {
    const options = parseCliArgs(args);
    const texts = await Promise.all(options.textPaths.map(readOcrText));
    const reference = await loadReferenceRecord(path.resolve(options.referencePath));

    const run = runVerification({
      texts,
      reference,
      asOf: options.asOf ?? undefined,
      config: loadEngineConfig(),
    });

    if (options.json) {
      write(`${JSON.stringify({ runId: run.runId, report: run.report }, null, 2)}\n`);
    } else {
      write(`\n${formatVerificationSummary(run.report, { redacted: options.redact })}\n`);
    }
    if (options.debug) {
      write(`\nNormalized OCR text:\n${run.normalizedText}\n`);
    }
    return run.report.allMatch ? 0 : 2;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    write(`Error: ${isVerificationError(error) ? `[${error.code}] ` : ''}${message}\n`);
    return 1;
  }
}

const invokedDirectly = process.argv[1] !== undefined && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url);

if (invokedDirectly) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      console.error("Verification failed:", err);
      process.exit(1);
    });
}

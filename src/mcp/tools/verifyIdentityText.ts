/**
 * Tool: verify_identity_text
 *
 * Extracts name, DOB and ID number from OCR text and verifies them against
 * the caller's reference record. Shared by the MCP tool and POST /verify.
 */

import { z } from 'zod';
import { loadEngineConfig } from '../../core/config.js';
import { parseAsOfDate } from '../../core/dateNormalizer.js';
import { InvalidInputError } from '../../core/errors.js';
import { formatVerificationSummary } from '../../kyc/reportBuilder.js';
import { runVerification } from '../../kyc/verificationService.js';
import type { VerificationReport } from '../../kyc/types.js';
import { parseInput } from '../../utils/parseInput.js';
import { recordVerificationError, recordVerificationOutcome } from '../health.js';
import { errorResponseFrom, okResponse, type McpToolResponse } from '../responses.js';

export const VERIFY_IDENTITY_TEXT_INPUT = {
  raw_text: z.string().describe('OCR text of the identity document'),
  additional_texts: z
    .array(z.string())
    .optional()
    .describe('Further OCR passes of the same document; each field is taken from the first pass that has it'),
  reference: z
    .object({
      name: z.string().optional(),
      dob: z.string().optional(),
      id_number: z.string().optional(),
    })
    .describe('Expected values supplied by the caller'),
  as_of: z.string().optional().describe('YYYY-MM-DD date used for the age calculation (default: today)'),
  redacted: z.boolean().optional().describe('Mask all but the last four ID digits in the summary'),
};

const VerifyIdentityTextSchema = z.object(VERIFY_IDENTITY_TEXT_INPUT);

export type VerifyIdentityTextArgs = z.infer<typeof VerifyIdentityTextSchema>;

export interface VerifyIdentityTextResult {
  run_id: string;
  report: VerificationReport;
  summary: string;
}

export function verifyIdentityText(args: unknown, context: { corrId?: string } = {}): VerifyIdentityTextResult {
  try {
    const input = parseInput(VerifyIdentityTextSchema, args, 'verify_identity_text arguments');

    let asOf: Date | undefined;
    if (input.as_of !== undefined) {
      const parsed = parseAsOfDate(input.as_of);
      if (!parsed) {
        throw new InvalidInputError(`as_of must be YYYY-MM-DD, got "${input.as_of}"`);
      }
      asOf = parsed;
    }

    const run = runVerification({
      texts: [input.raw_text, ...(input.additional_texts ?? [])],
      reference: {
        name: input.reference.name ?? '',
        dob: input.reference.dob ?? '',
        idNumber: input.reference.id_number ?? '',
      },
      asOf,
      config: loadEngineConfig(),
      corrId: context.corrId,
    });

    recordVerificationOutcome(run.report);
    return {
      run_id: run.runId,
      report: run.report,
      summary: formatVerificationSummary(run.report, { redacted: input.redacted ?? false }),
    };
  } catch (error) {
    recordVerificationError();
    throw error;
  }
}

export async function handleVerifyIdentityText(args: VerifyIdentityTextArgs): Promise<McpToolResponse> {
  try {
    return okResponse(verifyIdentityText(args));
  } catch (error) {
    return errorResponseFrom(error);
  }
}

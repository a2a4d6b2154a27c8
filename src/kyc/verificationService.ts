/**
 * Verification service
 *
 * Wraps the pure engine for the outer layers (CLI, MCP tools, REST API):
 * assigns a run id, logs the outcome and keeps raw ID digits out of the logs.
 */

import * as crypto from 'crypto';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../core/config.js';
import { isVerificationError } from '../core/errors.js';
import { createContextLogger } from '../utils/logger.js';
import type { ExtractedFields, RawText, ReferenceRecordInput, VerificationReport } from './types.js';
import { verifyWithDetails } from './verifier.js';

export interface VerificationRequest {
  texts: readonly RawText[];
  reference: ReferenceRecordInput;
  asOf?: Date;
  config?: EngineConfig;
  runId?: string;
  corrId?: string;
}

export interface VerificationRun {
  runId: string;
  report: VerificationReport;
  fields: ExtractedFields;
  normalizedText: string;
}

export function runVerification(request: VerificationRequest): VerificationRun {
  const runId = request.runId ?? crypto.randomUUID();
  const log = createContextLogger({ runId, corrId: request.corrId });

  log.info({ variants: request.texts.length }, 'Verification started');

  try {
    const details = verifyWithDetails(
      request.texts,
      request.reference,
      request.asOf ?? new Date(),
      request.config ?? DEFAULT_ENGINE_CONFIG
    );
    const { report, fields } = details;

    log.info(
      {
        allMatch: report.allMatch,
        nameMatched: report.name.matched,
        nameScore: Number(report.name.similarityScore.toFixed(3)),
        dobMatched: report.dob.matched,
        idMatched: report.idNumber.matched,
        extraction: {
          name: fields.name.status === 'found' ? fields.name.patternId : fields.name.reason,
          dob: fields.dob.status === 'found' ? fields.dob.patternId : fields.dob.reason,
          idNumber: fields.idNumber.status === 'found' ? fields.idNumber.patternId : fields.idNumber.reason,
        },
        ageYears: report.ageYears,
        isTeen: report.isTeen,
      },
      'Verification completed'
    );

    return { runId, ...details };
  } catch (error) {
    if (isVerificationError(error)) {
      log.warn({ error_code: error.code, message: error.message }, 'Verification rejected');
    } else {
      log.error({ err: error }, 'Verification failed');
    }
    throw error;
  }
}

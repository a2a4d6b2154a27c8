/**
 * REST API Handlers for verification
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import { InvalidInputError, isVerificationError } from '../core/errors.js';
import { createContextLogger } from '../utils/logger.js';
import { verifyIdentityText } from './tools/verifyIdentityText.js';
import { normalizeDateValue } from './tools/normalizeDate.js';

function sendError(request: FastifyRequest, reply: FastifyReply, error: unknown): FastifyReply {
  if (isVerificationError(error)) {
    return reply.code(400).send({
      error: error.code,
      message: error.message,
      ...(error instanceof InvalidInputError && error.issues.length > 0 ? { issues: error.issues } : {}),
    });
  }

  const log = createContextLogger({ corrId: request.corrId });
  log.error({ err: error, url: request.url }, 'Request failed');
  return reply.code(500).send({
    error: 'INTERNAL_ERROR',
    message: error instanceof Error ? error.message : 'Unknown error',
  });
}

/**
 * POST /verify
 * Body: { raw_text, additional_texts?, reference: { name, dob, id_number }, as_of?, redacted? }
 */
export async function handleVerify(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  try {
    return reply.send(verifyIdentityText(request.body, { corrId: request.corrId }));
  } catch (error) {
    return sendError(request, reply, error);
  }
}

/**
 * POST /dates/normalize
 * Body: { value, reference_year? }
 */
export async function handleNormalizeDateRoute(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
  try {
    return reply.send(normalizeDateValue(request.body));
  } catch (error) {
    return sendError(request, reply, error);
  }
}

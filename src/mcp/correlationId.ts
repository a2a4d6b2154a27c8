/**
 * Correlation ID Middleware
 *
 * Reuses the caller's X-Correlation-ID or generates one
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import * as crypto from 'crypto';

declare module 'fastify' {
  interface FastifyRequest {
    corrId?: string;
  }
}

export function getCorrelationId(request: FastifyRequest): string {
  const headerId = request.headers['x-correlation-id'];
  if (typeof headerId === 'string' && headerId.length > 0) {
    return headerId;
  }
  return crypto.randomUUID();
}

export async function correlationIdMiddleware(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<void> {
  const corrId = getCorrelationId(request);
  request.corrId = corrId;
  reply.header('X-Correlation-ID', corrId);
}

/**
 * Fastify Middleware for API Key Authentication and Rate Limiting
 */

import type { FastifyRequest, FastifyReply } from 'fastify';

declare module 'fastify' {
  interface FastifyRequest {
    apiKey?: string;
  }
}

const PUBLIC_PATHS = new Set(['/healthz', '/metrics']);

export function parseApiKeys(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((key) => key.trim())
    .filter((key) => key.length > 0);
}

/**
 * Builds a preHandler that requires a known x-api-key header. With no keys
 * configured every request passes.
 */
export function createApiKeyAuth(apiKeys: readonly string[]) {
  const allowed = new Set(apiKeys);

  return async function apiKeyAuth(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | void> {
    const path = request.url.split('?')[0];
    if (allowed.size === 0 || PUBLIC_PATHS.has(path) || path.startsWith('/docs')) {
      return;
    }

    const apiKey = request.headers['x-api-key'];
    if (typeof apiKey !== 'string' || apiKey.length === 0) {
      return reply.code(401).send({ error: 'Missing x-api-key header' });
    }
    if (!allowed.has(apiKey)) {
      return reply.code(401).send({ error: 'Invalid API key' });
    }
    request.apiKey = apiKey;
  };
}

/**
 * Rate limiting configuration: 60 requests per minute per API key (or IP)
 */
export const rateLimitConfig = {
  max: 60,
  timeWindow: 60 * 1000,
  keyGenerator: (request: FastifyRequest): string => {
    const apiKey = request.headers['x-api-key'];
    if (typeof apiKey === 'string' && apiKey.length > 0) {
      return `key:${apiKey}`;
    }
    return request.ip || 'unknown';
  },
  errorResponseBuilder: () => ({
    statusCode: 429,
    error: 'Rate limit exceeded',
    message: 'Maximum 60 requests per minute',
  }),
};

/**
 * Health and Metrics Endpoints
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import { Registry, Counter, Histogram } from 'prom-client';
import type { VerificationReport } from '../kyc/types.js';

// Prometheus metrics registry
export const register = new Registry();

const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'route', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1],
  registers: [register],
});

const httpRequestTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'route', 'status'],
  registers: [register],
});

const verificationsTotal = new Counter({
  name: 'id_verifications_total',
  help: 'Total number of verification runs',
  labelNames: ['outcome'], // match, mismatch, error
  registers: [register],
});

const fieldMatchesTotal = new Counter({
  name: 'id_field_matches_total',
  help: 'Per-field match results',
  labelNames: ['field', 'matched'],
  registers: [register],
});

export const metrics = {
  httpRequestDuration,
  httpRequestTotal,
  verificationsTotal,
  fieldMatchesTotal,
};

export function recordVerificationOutcome(report: VerificationReport): void {
  verificationsTotal.inc({ outcome: report.allMatch ? 'match' : 'mismatch' });
  for (const field of [report.name, report.dob, report.idNumber]) {
    fieldMatchesTotal.inc({ field: field.field, matched: String(field.matched) });
  }
}

export function recordVerificationError(): void {
  verificationsTotal.inc({ outcome: 'error' });
}

/**
 * GET /healthz
 * Simple health check - returns OK if server is running
 */
export async function handleHealthz(
  _request: FastifyRequest,
  reply: FastifyReply
): Promise<void> {
  reply.send({ status: 'ok' });
}

/**
 * GET /metrics
 * Prometheus metrics endpoint
 */
export async function handleMetrics(
  _request: FastifyRequest,
  reply: FastifyReply
): Promise<void> {
  reply.type(register.contentType).send(await register.metrics());
}

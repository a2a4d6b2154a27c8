/**
 * Engine configuration.
 *
 * All thresholds used by the extractors, the match engine and the age
 * calculator are read from one EngineConfig object passed into `verify`.
 */

import { z } from 'zod';
import { parseInput } from '../utils/parseInput.js';

export type TeenPolicy =
  | { kind: 'band'; minAge: number; maxAge: number }
  | { kind: 'under'; limit: number };

/** Teen = 13 through 19 years old, inclusive. */
export const TEEN_POLICY: TeenPolicy = Object.freeze({ kind: 'band', minAge: 13, maxAge: 19 });

/** Alternative screening policy: anyone younger than 18. */
export const UNDER_18_POLICY: TeenPolicy = Object.freeze({ kind: 'under', limit: 18 });

export const NAME_MATCH_THRESHOLD = 0.8;
export const ID_NUMBER_DIGITS = 12;

export interface EngineConfig {
  nameThreshold: number;
  teenPolicy: TeenPolicy;
  idDigits: number;
  /** Reject 12-digit IDs starting with 0 or 1 (never issued). */
  rejectLeadingZeroOrOne: boolean;
}

const TeenPolicySchema = z.union([
  z
    .object({
      kind: z.literal('band'),
      minAge: z.number().int().min(0),
      maxAge: z.number().int().min(0),
    })
    .refine((p) => p.minAge <= p.maxAge, { message: 'minAge must not exceed maxAge' }),
  z.object({ kind: z.literal('under'), limit: z.number().int().positive() }),
]);

export const EngineConfigSchema = z.object({
  nameThreshold: z.number().min(0).max(1),
  teenPolicy: TeenPolicySchema,
  idDigits: z.number().int().positive(),
  rejectLeadingZeroOrOne: z.boolean(),
});

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  nameThreshold: NAME_MATCH_THRESHOLD,
  teenPolicy: TEEN_POLICY,
  idDigits: ID_NUMBER_DIGITS,
  rejectLeadingZeroOrOne: false,
});

/**
 * Merges overrides onto the defaults and validates the result.
 */
export function resolveEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return parseInput(EngineConfigSchema, { ...DEFAULT_ENGINE_CONFIG, ...overrides }, 'engine configuration');
}

const EnvSchema = z.object({
  NAME_MATCH_THRESHOLD: z.coerce.number().optional(),
  TEEN_POLICY: z.enum(['band', 'under18']).optional(),
  ID_REJECT_LEADING_ZERO_OR_ONE: z.enum(['true', 'false', '1', '0']).optional(),
});

/**
 * Builds the engine configuration from environment variables.
 * Unset variables fall back to DEFAULT_ENGINE_CONFIG.
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = parseInput(
    EnvSchema,
    {
      NAME_MATCH_THRESHOLD: env.NAME_MATCH_THRESHOLD || undefined,
      TEEN_POLICY: env.TEEN_POLICY || undefined,
      ID_REJECT_LEADING_ZERO_OR_ONE: env.ID_REJECT_LEADING_ZERO_OR_ONE || undefined,
    },
    'environment'
  );

  const overrides: Partial<EngineConfig> = {};
  if (parsed.NAME_MATCH_THRESHOLD !== undefined) {
    overrides.nameThreshold = parsed.NAME_MATCH_THRESHOLD;
  }
  if (parsed.TEEN_POLICY !== undefined) {
    overrides.teenPolicy = parsed.TEEN_POLICY === 'under18' ? UNDER_18_POLICY : TEEN_POLICY;
  }
  if (parsed.ID_REJECT_LEADING_ZERO_OR_ONE !== undefined) {
    overrides.rejectLeadingZeroOrOne =
      parsed.ID_REJECT_LEADING_ZERO_OR_ONE === 'true' || parsed.ID_REJECT_LEADING_ZERO_OR_ONE === '1';
  }
  return resolveEngineConfig(overrides);
}

import type { z } from 'zod';
import { InvalidInputError, type InputIssue } from '../core/errors.js';

export function toInputIssues(error: z.ZodError): InputIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}

/**
 * Runs a zod schema and rethrows failures as InvalidInputError.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = toInputIssues(result.error);
    const detail = issues.map((i) => `${i.path}: ${i.message}`).join('; ');
    throw new InvalidInputError(`Invalid ${what}: ${detail}`, issues);
  }
  return result.data;
}

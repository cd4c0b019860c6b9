import type { z } from 'zod';
import { toFieldIssues, ValidationError } from './errors.js';

/**
 * Validate input against a Zod schema. Returns parsed data or throws a
 * ValidationError carrying every issue.
 */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(toFieldIssues(result.error.issues));
  }
  return result.data;
}


import type { z } from 'zod';
import { PosError, POS_ERROR_CODES } from '../utils/errors.js';

/**
 * Parse with a zod schema, turning the first issue into a VALIDATION_ERROR.
 */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue?.path.join('.');
    throw new PosError(POS_ERROR_CODES.VALIDATION_ERROR, {
      message: issue ? (path ? `${path}: ${issue.message}` : issue.message) : 'Validation failed',
      context: {
        issues: result.error.issues.map(i => ({ path: i.path.join('.'), message: i.message })),
      },
    });
  }
  return result.data;
}

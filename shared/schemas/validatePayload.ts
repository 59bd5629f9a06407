import { z } from 'zod';
import { ValidationError } from '../../services/base/ServiceError';

/**
 * Parse a payload against a schema, throwing a ValidationError that carries the
 * zod issues when it does not conform.
 */
export function validatePayload<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  payload: unknown,
  context: string
): T {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const summary = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(`Invalid ${context}: ${summary}`, result.error.issues);
  }
  return result.data;
}

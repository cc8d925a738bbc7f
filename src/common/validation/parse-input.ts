import type { ZodType, ZodTypeDef } from 'zod';
import { ValidationError } from '../errors/game-errors.js';

/** zod safeParse → typed value, or ValidationError with flattened issues */
export function parseInput<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  value: unknown,
  message = 'Validation failed',
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const formatted = result.error.issues.map(
      (i) => `${i.path.join('.')}: ${i.message}`,
    );
    throw new ValidationError(message, { issues: formatted });
  }
  return result.data;
}

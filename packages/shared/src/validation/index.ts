import type { z } from 'zod';
import { ValidationError } from '../errors';

export const hubIdPattern = /^[A-Za-z0-9_.:-]+$/;

/**
 * Parse `input` with `schema`, throwing a ValidationError carrying one detail
 * per zod issue.
 *
 * @example
 * ```ts
 * const order = parseOrThrow(kitchenOrderSchema, body, 'Invalid order');
 * ```
 */
export function parseOrThrow<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  message = 'Validation failed',
): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(
      message,
      parsed.error.issues.map((i) => ({
        field: i.path.join('.'),
        message: i.message,
      })),
    );
  }
  return parsed.data;
}

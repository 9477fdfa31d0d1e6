import { z } from 'zod';
import { ValidationError } from '../errors';
import { isIsoDate } from '../utils/calendar';

export const isoDateSchema = z.string().trim().refine(isIsoDate, 'Expected a YYYY-MM-DD date');
export const monthSchema = z
  .string()
  .trim()
  .regex(/^\d{4}-\d{1,2}$/, 'Expected a YYYY-MM month');

/**
 * Assert that a Zod safeParse result succeeded, throwing a ValidationError if not.
 * After calling this, `parsed.data` is type-safe.
 */
export function assertValidated<T>(
  parsed: z.SafeParseReturnType<unknown, T>,
  message = 'Validation failed',
): asserts parsed is z.SafeParseSuccess<T> {
  if (!parsed.success) {
    throw new ValidationError(
      message,
      parsed.error.issues.map((i) => ({
        field: i.path.join('.'),
        message: i.message,
      })),
    );
  }
}

/** Parses `input` or throws ValidationError with one detail per issue. */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown, message?: string): z.output<S> {
  const parsed = schema.safeParse(input);
  assertValidated(parsed, message);
  return parsed.data;
}

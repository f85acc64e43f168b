import { z } from 'zod';
import { ValidationError } from '../errors';

/**
 * Assert that a Zod safeParse result succeeded, throwing a ValidationError if not.
 * After calling this, `parsed.data` is type-safe.
 *
 * @example
 * ```ts
 * const parsed = schema.safeParse(body);
 * assertValidated(parsed);
 * // parsed.data is now typed
 * ```
 */
export function assertValidated<T>(
  parsed: z.SafeParseReturnType<unknown, T>,
  message = 'Validation failed',
): asserts parsed is z.SafeParseSuccess<T> {
  if (!parsed.success) {
    throw new ValidationError(message, zodIssuesToDetails(parsed.error));
  }
}

export function zodIssuesToDetails(error: z.ZodError): Array<{ field: string; message: string }> {
  return error.issues.map((i) => ({
    field: i.path.join('.'),
    message: i.message,
  }));
}

/** One-line summary of the first issue, e.g. `lists.0.id: Invalid uuid`. */
export function describeZodError(error: z.ZodError): string {
  const first = error.issues[0];
  if (!first) return 'Unknown validation error';
  const path = first.path.join('.');
  const rest = error.issues.length > 1 ? ` (+${error.issues.length - 1} more)` : '';
  return `${path ? `${path}: ` : ''}${first.message}${rest}`;
}

/**
 * Validation utilities
 */

import { z } from 'zod';
import { ValidationError } from './errors';

/**
 * Result types returned by every fallible constructor
 */
export type Success<T> = { success: true; data: T };
export type Failure<E> = { success: false; error: E };
export type Result<T, E> = Success<T> | Failure<E>;

export function ok<T>(data: T): Success<T> {
  return { success: true, data };
}

export function err<E>(error: E): Failure<E> {
  return { success: false, error };
}

/**
 * Unwrap a result, throwing its error on failure.
 *
 * @example
 * ```typescript
 * const name = unwrap(LimitedStr.tryFrom(100, 'Ada'));
 * ```
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

/**
 * Validate data against a Zod schema
 * @param schema The Zod schema to validate against
 * @param data The data to validate
 * @returns The validated data
 * @throws ValidationError if validation fails
 */
export function validate<S extends z.ZodTypeAny>(schema: S, data: unknown): z.output<S> {
  return unwrap(safeParse(schema, data));
}

/**
 * Safe validation that returns a result object instead of throwing
 * @param schema The Zod schema to validate against
 * @param data The data to validate
 * @returns Object with success flag and data or error
 */
export function safeParse<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown
): Result<z.output<S>, ValidationError> {
  const result = schema.safeParse(data);
  if (result.success) {
    return ok(result.data);
  }
  const issues = formatIssues(result.error);
  return err(
    new ValidationError(`Validation failed: ${issues.join(', ')}`, {
      issues,
      errors: result.error.issues,
    })
  );
}

/**
 * Turn a Result-returning constructor into a zod transform.
 *
 * A failed result becomes a custom issue carrying the error's message and
 * code, which fails the whole parse of the enclosing schema.
 */
export function refineWith<I, O>(build: (input: I) => Result<O, Error & { code?: string }>) {
  return (input: I, ctx: z.RefinementCtx): O => {
    const result = build(input);
    if (!result.success) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: result.error.message,
        params: { code: result.error.code },
      });
      return z.NEVER;
    }
    return result.data;
  };
}

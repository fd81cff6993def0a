import { z } from 'zod';
import { DomainError, DomainErrorCode } from '../error-handling/errors.js';

export interface FieldIssue {
  field: string;
  message: string;
  code: string;
}

export function formatZodIssues(error: z.ZodError): FieldIssue[] {
  return error.errors.map(err => ({
    field: err.path.join('.'),
    message: err.message,
    code: err.code,
  }));
}

/**
 * Parses request input (body, params or query) with `schema`, throwing a
 * 400 DomainError listing the issues when it does not match.
 */
export function validateInput<S extends z.ZodTypeAny>(schema: S, input: unknown, what = 'Request body'): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new DomainError(`${what} validation failed`, 400, undefined, DomainErrorCode.VALIDATION_ERROR, {
      errors: formatZodIssues(result.error),
    });
  }
  return result.data;
}

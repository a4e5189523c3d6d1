/**
 * Request Validation
 *
 * Parses request input with zod; failures reach errorHandler as ZodError.
 */

import type { ZodTypeAny, z } from 'zod';
import { AppError } from './error-handler';

export function parseBody<S extends ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  return schema.parse(body);
}

export function parseQuery<S extends ZodTypeAny>(schema: S, query: unknown): z.infer<S> {
  return schema.parse(query);
}

export function requireParam(value: string | undefined, name: string): string {
  if (!value) {
    throw AppError.badRequest(`Missing route parameter: ${name}`);
  }
  return value;
}

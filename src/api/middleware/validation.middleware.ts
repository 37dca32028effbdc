import type { ZodSchema, ZodTypeDef } from 'zod';
import { ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

type RequestPart = 'body' | 'query' | 'params';

const PART_MESSAGES: Record<RequestPart, string> = {
  body: 'Validation failed',
  query: 'Invalid query parameters',
  params: 'Invalid path parameters',
};

/**
 * Parse one part of a request against a Zod schema, throwing a
 * ValidationError with per-field messages.
 */
function parseRequestPart<T>(schema: ZodSchema<T, ZodTypeDef, unknown>, value: unknown, part: RequestPart): T {
  const result = schema.safeParse(value);

  if (!result.success) {
    const errors = result.error.errors.map((err) => ({
      field: err.path.join('.'),
      message: err.message,
    }));

    logger.debug('Validation failed', { part, errors });
    throw new ValidationError(PART_MESSAGES[part], { errors });
  }

  return result.data;
}

/**
 * Validate request body against a Zod schema
 */
export function parseBody<T>(schema: ZodSchema<T, ZodTypeDef, unknown>, body: unknown): T {
  return parseRequestPart(schema, body ?? {}, 'body');
}

/**
 * Validate request query parameters against a Zod schema
 */
export function parseQuery<T>(schema: ZodSchema<T, ZodTypeDef, unknown>, query: unknown): T {
  return parseRequestPart(schema, query, 'query');
}

/**
 * Validate request params against a Zod schema
 */
export function parseParams<T>(schema: ZodSchema<T, ZodTypeDef, unknown>, params: unknown): T {
  return parseRequestPart(schema, params, 'params');
}

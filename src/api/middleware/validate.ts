/**
 * Request Validation Middleware
 *
 * Parses JSON bodies and query strings with zod schemas before the route
 * handler runs. Failures answer 400 with the field-level issues:
 *
 * ```json
 * {
 *   "success": false,
 *   "error": {
 *     "code": "VALIDATION_ERROR",
 *     "message": "Invalid request body",
 *     "details": [{ "path": "grade", "message": "Expected number, received string" }]
 *   }
 * }
 * ```
 *
 * @example
 * ```typescript
 * router.post('/', validate(createOpeningSchema), async (c) => {
 *   const body = getValidatedBody(c, createOpeningSchema);
 *   ...
 * });
 * ```
 */

import type { Context, MiddlewareHandler } from 'hono';
import { z } from 'zod';
import type { ApiErrorResponse, ValidationErrorDetail } from '../types';

declare module 'hono' {
  interface ContextVariableMap {
    validatedBody: unknown;
    validatedQuery: unknown;
  }
}

function toDetails(error: z.ZodError): ValidationErrorDetail[] {
  return error.errors.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

function validationFailure(c: Context, message: string, error: z.ZodError): Response {
  const response: ApiErrorResponse = {
    success: false,
    error: { code: 'VALIDATION_ERROR', message, details: toDetails(error) },
  };
  return c.json(response, 400);
}

export function validate<T extends z.ZodType>(schema: T): MiddlewareHandler {
  return async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch (err) {
      if (err instanceof SyntaxError) {
        const response: ApiErrorResponse = {
          success: false,
          error: { code: 'INVALID_JSON', message: 'Request body must be valid JSON' },
        };
        return c.json(response, 400);
      }
      throw err;
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return validationFailure(c, 'Invalid request body', result.error);
    }

    c.set('validatedBody', result.data);
    await next();
  };
}

export function validateQuery<T extends z.ZodType>(schema: T): MiddlewareHandler {
  return async (c, next) => {
    const result = schema.safeParse(c.req.query());
    if (!result.success) {
      return validationFailure(c, 'Invalid query parameters', result.error);
    }

    c.set('validatedQuery', result.data);
    await next();
  };
}

/**
 * The body stored by `validate(schema)`. The stored value already passed
 * the schema; parsing it again gives the handler its typed shape.
 */
export function getValidatedBody<T extends z.ZodType>(c: Context, schema: T): z.output<T> {
  return schema.parse(c.get('validatedBody'));
}

export function getValidatedQuery<T extends z.ZodType>(c: Context, schema: T): z.output<T> {
  return schema.parse(c.get('validatedQuery'));
}

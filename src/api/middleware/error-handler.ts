/**
 * Global Error Handler for the Opening Drill API
 *
 * Every error that escapes a route is turned into the standard envelope:
 *
 * ```json
 * {
 *   "success": false,
 *   "error": {
 *     "code": "ERROR_CODE",
 *     "message": "Human-readable error message",
 *     "details": { ... }
 *   }
 * }
 * ```
 *
 * Study errors carry their own machine-readable code; the handler only
 * chooses the HTTP status for them.
 *
 * @example
 * ```typescript
 * import { Hono } from 'hono';
 * import { errorHandler, AppError } from '@/api/middleware/error-handler';
 *
 * const app = new Hono();
 * app.onError(errorHandler());
 *
 * app.get('/missing', () => {
 *   throw new AppError('NOT_FOUND', 'Nothing here', 404);
 * });
 * ```
 */

import type { Context, ErrorHandler } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import {
  IllegalTokenError,
  InvalidGradeError,
  StudyError,
  type StudyErrorCode,
} from '@/core/errors';
import { EngineError, EngineNotFoundError } from '@/engine/errors';

/**
 * Error codes produced by the API layer itself.
 */
export const ErrorCodes = {
  BAD_REQUEST: 'BAD_REQUEST',
  NOT_FOUND: 'NOT_FOUND',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  CONFLICT: 'CONFLICT',

  INTERNAL_ERROR: 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  ENGINE_ERROR: 'ENGINE_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export interface ApiErrorResponse {
  success: false;
  error: {
    code: ErrorCode | StudyErrorCode | string;
    message: string;
    details?: unknown;
  };
}

/**
 * HTTP status for each study error code.
 */
export const STUDY_ERROR_STATUS: Record<StudyErrorCode, number> = {
  INVALID_GRADE: 400,
  EMPTY_TARGET: 422,
  ILLEGAL_MOVE: 400,
  EMPTY_LINE: 400,
  DUPLICATE_NAME: 409,
  OPENING_NOT_FOUND: 404,
  ORACLE_UNAVAILABLE: 503,
};

/**
 * An error with a chosen code and HTTP status.
 *
 * @example
 * ```typescript
 * throw new AppError('NOT_FOUND', 'Opening not found', 404);
 * ```
 */
export class AppError extends Error {
  public readonly code: ErrorCode | string;
  public readonly statusCode: number;
  public readonly details?: unknown;

  constructor(
    code: ErrorCode | string,
    message: string,
    statusCode: number = 500,
    details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    Error.captureStackTrace?.(this, AppError);
  }
}

function studyErrorDetails(error: StudyError): Record<string, unknown> | undefined {
  if (error instanceof IllegalTokenError) {
    return { token: error.token, ply: error.ply };
  }
  if (error instanceof InvalidGradeError) {
    return { grade: error.grade };
  }
  return undefined;
}

/**
 * Formats any thrown value into the error envelope and its status.
 */
export function formatErrorResponse(error: unknown): {
  response: ApiErrorResponse;
  statusCode: number;
} {
  if (error instanceof AppError) {
    return {
      response: {
        success: false,
        error: {
          code: error.code,
          message: error.message,
          ...(error.details !== undefined && { details: error.details }),
        },
      },
      statusCode: error.statusCode,
    };
  }

  if (error instanceof StudyError) {
    const details = studyErrorDetails(error);
    return {
      response: {
        success: false,
        error: {
          code: error.code,
          message: error.message,
          ...(details !== undefined && { details }),
        },
      },
      statusCode: STUDY_ERROR_STATUS[error.code],
    };
  }

  if (error instanceof EngineNotFoundError) {
    return {
      response: {
        success: false,
        error: { code: ErrorCodes.SERVICE_UNAVAILABLE, message: error.message },
      },
      statusCode: 503,
    };
  }

  if (error instanceof EngineError) {
    return {
      response: {
        success: false,
        error: { code: ErrorCodes.ENGINE_ERROR, message: error.message },
      },
      statusCode: 502,
    };
  }

  if (error instanceof Error) {
    const isDev = process.env.NODE_ENV !== 'production';

    return {
      response: {
        success: false,
        error: {
          code: ErrorCodes.INTERNAL_ERROR,
          message: isDev ? error.message : 'An unexpected error occurred. Please try again.',
          ...(isDev && { details: { stack: error.stack } }),
        },
      },
      statusCode: 500,
    };
  }

  return {
    response: {
      success: false,
      error: {
        code: ErrorCodes.INTERNAL_ERROR,
        message: 'An unexpected error occurred',
        ...(process.env.NODE_ENV !== 'production' && {
          details: { rawError: String(error) },
        }),
      },
    },
    statusCode: 500,
  };
}

/**
 * Creates the app-level error handler. Register it with `app.onError`.
 * Unexpected errors (status 500) are logged with their stack; expected
 * ones with their message only.
 */
export function errorHandler(): ErrorHandler {
  return (error: unknown, c: Context) => {
    const { response, statusCode } = formatErrorResponse(error);

    if (statusCode >= 500) {
      console.error('[Error Handler]', error);
    } else {
      console.warn(`[Error Handler] ${response.error.code}: ${response.error.message}`);
    }

    // Cast statusCode to ContentfulStatusCode for Hono's type system
    return c.json(response, statusCode as ContentfulStatusCode);
  };
}

/**
 * API Middleware - Barrel Export
 *
 * @example
 * ```typescript
 * import { errorHandler, loggerMiddleware } from '@/api/middleware';
 *
 * const app = new Hono();
 * app.onError(errorHandler());
 * app.use('*', loggerMiddleware());
 * ```
 */

export {
  errorHandler,
  formatErrorResponse,
  AppError,
  ErrorCodes,
  STUDY_ERROR_STATUS,
  type ErrorCode,
  type ApiErrorResponse,
} from './error-handler';

export {
  loggerMiddleware,
  formatRequestLine,
  formatResponseTime,
  DEFAULT_LOGGER_CONFIG,
  type LoggerConfig,
  type RequestLogEntry,
} from './logger';

export { validate, validateQuery, getValidatedBody, getValidatedQuery } from './validate';

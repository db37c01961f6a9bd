/**
 * API Module - Barrel Export
 */

export { createApp, type CreateAppOptions } from './app';
export {
  createDependencies,
  type ApiDependencies,
  type ApiDefaults,
  type DependencyOptions,
} from './dependencies';

export {
  errorHandler,
  formatErrorResponse,
  AppError,
  ErrorCodes,
  STUDY_ERROR_STATUS,
  type ErrorCode,
  loggerMiddleware,
  formatRequestLine,
  DEFAULT_LOGGER_CONFIG,
  type LoggerConfig,
  validate,
  validateQuery,
  getValidatedBody,
  getValidatedQuery,
} from './middleware';

export { createApiRouter, healthRoutes } from './routes';

export {
  type ApiResponse,
  type ApiError,
  type ApiErrorResponse,
  type ApiResult,
  type ValidationErrorDetail,
  createOpeningSchema,
  updateNotesSchema,
  quizSchema,
  reviewSchema,
  evalSchema,
  type CreateOpeningBody,
  type UpdateNotesBody,
  type QuizBody,
  type ReviewBody,
  type EvalBody,
} from './types';

export { success, error } from './utils/response';

/**
 * Hono application factory.
 *
 * @example
 * ```typescript
 * const deps = createDependencies(openDatabase(':memory:'), { evaluator });
 * const app = createApp(deps);
 * const res = await app.request('/api/due');
 * ```
 */

import { Hono } from 'hono';
import type { ApiDependencies } from './dependencies';
import { errorHandler, loggerMiddleware, type LoggerConfig } from './middleware';
import { createApiRouter, healthRoutes } from './routes';
import { error } from './utils/response';

export interface CreateAppOptions {
  /** Request logging; `false` turns it off */
  logger?: Partial<LoggerConfig> | false;
}

export function createApp(deps: ApiDependencies, options: CreateAppOptions = {}): Hono {
  const app = new Hono();

  app.onError(errorHandler());

  if (options.logger !== false) {
    app.use('*', loggerMiddleware(options.logger));
  }

  app.route('/health', healthRoutes(deps.clock));
  app.route('/api', createApiRouter(deps));

  app.notFound((c) => error(c, 'NOT_FOUND', `Route ${c.req.method} ${c.req.path} not found`, 404));

  return app;
}

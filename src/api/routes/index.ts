/**
 * API Router
 *
 * Mounts every route module under /api and serves the discovery endpoint.
 */

import { Hono } from 'hono';
import type { ApiDependencies } from '../dependencies';
import { success } from '../utils/response';
import { APP_VERSION } from './health';
import { openingsRoutes } from './openings';
import { studyRoutes } from './study';
import { treeRoutes } from './tree';
import { evalRoutes } from './eval';

export { healthRoutes, APP_VERSION, type HealthCheckData } from './health';
export { openingsRoutes, type OpeningDetail } from './openings';
export { studyRoutes, type QuizResponse } from './study';
export { treeRoutes, type TreeResponse } from './tree';
export { evalRoutes, type EvalResponse } from './eval';

export interface ApiInfo {
  name: string;
  version: string;
  endpoints: {
    path: string;
    description: string;
  }[];
}

export function createApiRouter(deps: ApiDependencies): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const apiInfo: ApiInfo = {
      name: 'Opening Drill API',
      version: APP_VERSION,
      endpoints: [
        { path: '/api/openings', description: 'List, add and remove opening lines' },
        { path: '/api/openings/:id', description: 'One line with notes, schedule and latest evaluation' },
        { path: '/api/openings/:id/quiz', description: 'Check a typed recall attempt' },
        { path: '/api/openings/:id/reviews', description: 'Grade a line and read its review history' },
        { path: '/api/due', description: 'Lines due for review' },
        { path: '/api/tree', description: 'Branching structure of a set of lines' },
        { path: '/api/eval', description: 'Engine evaluation of a FEN' },
        { path: '/health', description: 'Health check endpoint' },
      ],
    };

    return success(c, apiInfo);
  });

  router.route('/openings', openingsRoutes(deps));
  router.route('/', studyRoutes(deps));
  router.route('/tree', treeRoutes(deps));
  router.route('/eval', evalRoutes(deps));

  return router;
}

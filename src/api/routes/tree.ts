import { Hono } from 'hono';
import { buildTree, type OpeningTree } from '@/core/tree';
import type { ApiDependencies } from '../dependencies';
import { validateQuery, getValidatedQuery } from '../middleware/validate';
import { treeQuerySchema } from '../types';
import { success } from '../utils/response';

export interface TreeResponse extends OpeningTree {
  prefix: string;
  /** Number of lines the tree was built from */
  lineCount: number;
}

/**
 * GET /api/tree?prefix&levels&limit
 */
export function treeRoutes(deps: ApiDependencies): Hono {
  const router = new Hono();

  router.get('/', validateQuery(treeQuerySchema), async (c) => {
    const query = getValidatedQuery(c, treeQuerySchema);
    const prefix = query.prefix ?? deps.defaults.prefix;

    const lines = await deps.openings.findByPrefix(prefix, query.limit);
    const tree = buildTree(lines, query.levels);

    const response: TreeResponse = { prefix, lineCount: lines.length, ...tree };
    return success(c, response);
  });

  return router;
}

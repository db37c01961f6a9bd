import { Hono } from 'hono';
import type { EvaluationResult } from '@/core/models';
import { formatStoredScore } from '@/engine/uci';
import type { ApiDependencies } from '../dependencies';
import { validate, getValidatedBody, validateQuery, getValidatedQuery } from '../middleware/validate';
import { evalQuerySchema, evalSchema } from '../types';
import { success } from '../utils/response';

export interface EvalResponse extends EvaluationResult {
  /** Side-to-move score, e.g. "0.35" or "M3" */
  display: string;
}

/**
 * POST /api/eval?depth
 *
 * Evaluates a FEN. Answers `data: null` when the FEN is invalid or no
 * engine can be run, so browsing clients can simply hide the evaluation.
 */
export function evalRoutes(deps: ApiDependencies): Hono {
  const router = new Hono();

  router.post('/', validateQuery(evalQuerySchema), validate(evalSchema), async (c) => {
    const { depth } = getValidatedQuery(c, evalQuerySchema);
    const { fen } = getValidatedBody(c, evalSchema);

    const result = await deps.evaluator.tryEvaluate(fen, depth ?? deps.defaults.evalDepth);
    if (!result) {
      return success(c, null);
    }

    const response: EvalResponse = {
      ...result,
      display: formatStoredScore(result.scoreCp, result.mateIn),
    };
    return success(c, response);
  });

  return router;
}

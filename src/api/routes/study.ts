/**
 * Study routes: recall checks, grading and the review queue.
 *
 * POST /api/openings/:id/quiz     check a typed attempt
 * POST /api/openings/:id/reviews  grade the line, returns the new schedule
 * GET  /api/openings/:id/reviews  review history, oldest first
 * GET  /api/due                   next lines to review
 */

import { Hono } from 'hono';
import { OpeningNotFoundError } from '@/core/errors';
import { checkRecall, suggestGrade, type QuizResult } from '@/core/quiz';
import { today, type ApiDependencies } from '../dependencies';
import { validate, getValidatedBody, validateQuery, getValidatedQuery } from '../middleware/validate';
import { dueQuerySchema, quizSchema, reviewSchema } from '../types';
import { success } from '../utils/response';

export interface QuizResponse extends QuizResult {
  openingId: string;
  /** 0-5, from the share of moves recalled */
  suggestedGrade: number;
}

export function studyRoutes(deps: ApiDependencies): Hono {
  const router = new Hono();

  router.post('/openings/:id/quiz', validate(quizSchema), async (c) => {
    const id = c.req.param('id');
    const body = getValidatedBody(c, quizSchema);

    const opening = await deps.openings.findById(id);
    if (!opening) {
      throw new OpeningNotFoundError(id);
    }

    const result = checkRecall(opening.tokens, body.typed, body.tokens);
    const response: QuizResponse = {
      openingId: opening.id,
      ...result,
      suggestedGrade: suggestGrade(result),
    };
    return success(c, response);
  });

  router.post('/openings/:id/reviews', validate(reviewSchema), async (c) => {
    const body = getValidatedBody(c, reviewSchema);
    const now = deps.clock();

    const applied = await deps.study.applyGrade(
      {
        openingId: c.req.param('id'),
        grade: body.grade,
        metadata: {
          promptMode: body.promptMode,
          prompt: body.prompt,
          typedMoves: body.typedMoves,
          correctTokens: body.correctTokens,
          targetTokens: body.targetTokens,
        },
      },
      today(deps),
      now
    );

    return success(c, applied);
  });

  router.get('/openings/:id/reviews', async (c) => {
    const id = c.req.param('id');
    const opening = await deps.openings.findById(id);
    if (!opening) {
      throw new OpeningNotFoundError(id);
    }
    return success(c, await deps.reviews.findByOpeningId(opening.id));
  });

  router.get('/due', validateQuery(dueQuerySchema), async (c) => {
    const query = getValidatedQuery(c, dueQuerySchema);
    const prefix = query.prefix ?? deps.defaults.prefix;

    return success(c, await deps.study.pickDue(prefix, today(deps), query.limit));
  });

  return router;
}

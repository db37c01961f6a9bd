/**
 * Opening catalog routes.
 *
 * GET    /api/openings            list, by ?prefix or ?q substring
 * POST   /api/openings            add a line (replayed on a board first)
 * GET    /api/openings/:id        the line with notes, card and latest eval
 * PUT    /api/openings/:id/notes  replace the notes
 * DELETE /api/openings/:id        remove the line and everything attached
 */

import { Hono } from 'hono';
import { addOpening } from '@/chess';
import { OpeningNotFoundError } from '@/core/errors';
import type { OpeningLine, StoredEvaluation } from '@/core/models';
import { formatStoredScore } from '@/engine/uci';
import type { ApiDependencies } from '../dependencies';
import { validate, getValidatedBody, validateQuery, getValidatedQuery } from '../middleware/validate';
import { createOpeningSchema, listOpeningsQuerySchema, updateNotesSchema } from '../types';
import { success } from '../utils/response';

export interface OpeningDetail extends OpeningLine {
  notes: string;
  card: {
    ease: number;
    intervalDays: number;
    reps: number;
    lapses: number;
    dueDate: string;
    lastGrade: number | null;
  } | null;
  evaluation: (StoredEvaluation & { display: string }) | null;
}

export function openingsRoutes(deps: ApiDependencies): Hono {
  const router = new Hono();

  const requireOpening = async (id: string): Promise<OpeningLine> => {
    const opening = await deps.openings.findById(id);
    if (!opening) {
      throw new OpeningNotFoundError(id);
    }
    return opening;
  };

  router.get('/', validateQuery(listOpeningsQuerySchema), async (c) => {
    const query = getValidatedQuery(c, listOpeningsQuerySchema);

    if (query.q) {
      return success(c, await deps.openings.search(query.q, query.limit));
    }
    return success(c, await deps.openings.findByPrefix(query.prefix ?? '', query.limit));
  });

  router.post('/', validate(createOpeningSchema), async (c) => {
    const body = getValidatedBody(c, createOpeningSchema);
    const opening = await addOpening(deps.openings, body.name, body.moves);
    return success(c, opening, 201);
  });

  router.get('/:id', async (c) => {
    const opening = await requireOpening(c.req.param('id'));

    const [notes, state, latest] = await Promise.all([
      deps.notes.get(opening.id),
      deps.study.getState(opening.id),
      deps.evaluations.latest(opening.id),
    ]);

    const detail: OpeningDetail = {
      ...opening,
      notes: notes ?? '',
      card: state && {
        ease: state.ease,
        intervalDays: state.intervalDays,
        reps: state.reps,
        lapses: state.lapses,
        dueDate: state.dueDate,
        lastGrade: state.lastGrade,
      },
      evaluation: latest && {
        ...latest,
        display: formatStoredScore(latest.scoreCp, latest.mateIn),
      },
    };

    return success(c, detail);
  });

  router.put('/:id/notes', validate(updateNotesSchema), async (c) => {
    const opening = await requireOpening(c.req.param('id'));
    const body = getValidatedBody(c, updateNotesSchema);

    await deps.notes.set(opening.id, body.notes, deps.clock());
    return success(c, { id: opening.id, notes: body.notes });
  });

  router.delete('/:id', async (c) => {
    const opening = await requireOpening(c.req.param('id'));
    await deps.openings.delete(opening.id);
    return success(c, { id: opening.id, deleted: true });
  });

  return router;
}

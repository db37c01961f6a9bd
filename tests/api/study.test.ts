/**
 * Study API Tests
 *
 * Recall checks, grading, review history and the due queue.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { Hono } from 'hono';
import {
  cleanupTestDatabase,
  createTestApp,
  createTestContext,
  FIXED_NOW,
  FIXED_TODAY,
  type TestContext,
} from '../setup';
import { createAllTestOpenings, createTestOpening, getJsonResponse, jsonRequest } from '../helpers';

describe('Study API', () => {
  let ctx: TestContext;
  let app: Hono;

  beforeEach(() => {
    ctx = createTestContext();
    app = createTestApp(ctx).app;
  });

  afterEach(() => {
    cleanupTestDatabase(ctx);
  });

  describe('POST /api/openings/:id/quiz', () => {
    it('scores a partial attempt by strict prefix match', async () => {
      const line = await createTestOpening(ctx.repos, 'italian');

      const response = await app.request(
        `/api/openings/${line.id}/quiz`,
        jsonRequest('POST', { typed: 'e4 e5 Nf3 Nc6 Bb5 Bc5', tokens: 6 })
      );
      const body = await getJsonResponse(response);

      expect(response.status).toBe(200);
      expect(body.data).toEqual({
        openingId: line.id,
        target: ['e4', 'e5', 'Nf3', 'Nc6', 'Bc4', 'Bc5'],
        typed: ['e4', 'e5', 'Nf3', 'Nc6', 'Bb5', 'Bc5'],
        correctTokens: 4,
        targetTokens: 6,
        fullyCorrect: false,
        suggestedGrade: 3,
      });
    });

    it('caps the target at the line length', async () => {
      const line = await createTestOpening(ctx.repos, 'italian');

      const response = await app.request(
        `/api/openings/${line.id}/quiz`,
        jsonRequest('POST', { typed: 'e4 e5 Nf3 Nc6 Bc4 Bc5 c3' })
      );
      const body = await getJsonResponse(response);

      expect(body.data).toMatchObject({
        correctTokens: 6,
        targetTokens: 6,
        fullyCorrect: true,
        suggestedGrade: 5,
      });
    });

    it('rejects a prompt length below one', async () => {
      const line = await createTestOpening(ctx.repos, 'italian');

      const response = await app.request(
        `/api/openings/${line.id}/quiz`,
        jsonRequest('POST', { typed: 'e4', tokens: 0 })
      );
      const body = await getJsonResponse(response);

      expect(response.status).toBe(400);
      expect(body.error).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Invalid request body',
        details: [{ path: 'tokens', message: 'Prompt length must be at least 1' }],
      });
    });

    it('answers 404 for an unknown opening', async () => {
      const response = await app.request(
        '/api/openings/op_missing/quiz',
        jsonRequest('POST', { typed: 'e4' })
      );
      expect(response.status).toBe(404);
    });
  });

  describe('POST /api/openings/:id/reviews', () => {
    it('applies the grade and returns the new schedule with its log entry', async () => {
      const line = await createTestOpening(ctx.repos, 'italian');

      const response = await app.request(
        `/api/openings/${line.id}/reviews`,
        jsonRequest('POST', {
          grade: 5,
          promptMode: 'name_to_moves',
          prompt: 'Italian Game',
          typedMoves: 'e4 e5 Nf3 Nc6 Bc4 Bc5',
          correctTokens: 6,
          targetTokens: 6,
        })
      );
      const body = await getJsonResponse(response);

      expect(response.status).toBe(200);
      expect(body.data).toMatchObject({
        state: {
          ease: 2.6,
          intervalDays: 1,
          reps: 1,
          lapses: 0,
          dueDate: '2024-05-02',
          lastGrade: 5,
          lastReviewedAt: FIXED_NOW.toISOString(),
        },
        review: {
          openingId: line.id,
          grade: 5,
          promptMode: 'name_to_moves',
          correctTokens: 6,
          targetTokens: 6,
        },
      });
    });

    it('defaults to a manual review', async () => {
      const line = await createTestOpening(ctx.repos, 'italian');

      await app.request(`/api/openings/${line.id}/reviews`, jsonRequest('POST', { grade: 3 }));

      const [review] = await ctx.repos.reviews.findByOpeningId(line.id);
      expect(review).toMatchObject({
        grade: 3,
        promptMode: 'manual',
        prompt: null,
        typedMoves: null,
        correctTokens: null,
        targetTokens: null,
      });
    });

    it('rejects a grade outside 0..5 and stores nothing', async () => {
      const line = await createTestOpening(ctx.repos, 'italian');

      const response = await app.request(
        `/api/openings/${line.id}/reviews`,
        jsonRequest('POST', { grade: 7 })
      );
      const body = await getJsonResponse(response);

      expect(response.status).toBe(400);
      expect(body.error).toEqual({
        code: 'INVALID_GRADE',
        message: 'Grade must be an integer 0..5, got 7',
        details: { grade: 7 },
      });
      expect(await ctx.study.getState(line.id)).toBeNull();
      expect(await ctx.repos.reviews.countByOpeningId(line.id)).toBe(0);
    });

    it('answers 404 for an unknown opening', async () => {
      const response = await app.request(
        '/api/openings/op_missing/reviews',
        jsonRequest('POST', { grade: 4 })
      );
      const body = await getJsonResponse(response);

      expect(response.status).toBe(404);
      expect(body.error?.code).toBe('OPENING_NOT_FOUND');
    });
  });

  describe('GET /api/openings/:id/reviews', () => {
    it('lists the history oldest first', async () => {
      const line = await createTestOpening(ctx.repos, 'italian');
      await ctx.study.applyGrade({ openingId: line.id, grade: 2 }, '2024-04-29', new Date(2024, 3, 29, 12));
      await ctx.study.applyGrade({ openingId: line.id, grade: 4 }, '2024-04-30', new Date(2024, 3, 30, 12));

      const response = await app.request(`/api/openings/${line.id}/reviews`);
      const body = await getJsonResponse(response);

      expect(response.status).toBe(200);
      expect(body.data).toMatchObject([{ grade: 2 }, { grade: 4 }]);
    });
  });

  describe('GET /api/due', () => {
    it('creates cards on demand and lists lines due today', async () => {
      await createAllTestOpenings(ctx.repos);

      const response = await app.request('/api/due?prefix=Scotch');
      const body = await getJsonResponse(response);

      expect(response.status).toBe(200);
      expect(body.data).toMatchObject([
        { name: 'Scotch Game - Classical', dueDate: FIXED_TODAY },
        { name: 'Scotch Game - Main', dueDate: FIXED_TODAY },
      ]);
    });

    it('falls back to the next upcoming line when nothing is due', async () => {
      const line = await createTestOpening(ctx.repos, 'italian');
      await app.request(`/api/openings/${line.id}/reviews`, jsonRequest('POST', { grade: 5 }));

      const response = await app.request('/api/due?limit=1');
      const body = await getJsonResponse(response);

      expect(body.data).toEqual([
        { id: line.id, name: 'Italian Game', movesSan: 'e4 e5 Nf3 Nc6 Bc4 Bc5', dueDate: '2024-05-02' },
      ]);
    });

    it('returns an empty list for an empty catalog', async () => {
      const response = await app.request('/api/due');
      const body = await getJsonResponse(response);

      expect(body).toEqual({ success: true, data: [] });
    });
  });
});

/**
 * Study Flow Integration Tests
 *
 * StudyService over real repositories: card creation, atomic grading with
 * its review log, and due selection with the upcoming fallback.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { InvalidGradeError, OpeningNotFoundError } from '../../src/core/errors';
import { RecallScheduler } from '../../src/core/scheduler';
import {
  cleanupTestDatabase,
  createTestContext,
  FIXED_NOW,
  FIXED_TODAY,
  type TestContext,
} from '../setup';
import { createAllTestOpenings, createTestOpening } from '../helpers';

describe('StudyService', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  afterEach(() => {
    cleanupTestDatabase(ctx);
  });

  describe('ensureCards', () => {
    it('creates one card per matching opening, due today, and only once', async () => {
      // Arrange
      const lines = await createAllTestOpenings(ctx.repos);

      // Act
      const first = await ctx.study.ensureCards('Scotch', FIXED_TODAY);
      const second = await ctx.study.ensureCards('Scotch', FIXED_TODAY);

      // Assert
      expect(first).toBe(2);
      expect(second).toBe(0);
      expect(await ctx.study.getState(lines.italian.id)).toBeNull();
      expect(await ctx.study.getState(lines.scotchMain.id)).toEqual({
        ease: 2.5,
        intervalDays: 0,
        reps: 0,
        lapses: 0,
        dueDate: FIXED_TODAY,
        lastGrade: null,
        lastReviewedAt: null,
      });
    });
  });

  describe('applyGrade', () => {
    it('creates a missing card, applies the grade and logs the review', async () => {
      const line = await createTestOpening(ctx.repos, 'italian');

      const { state, review } = await ctx.study.applyGrade(
        {
          openingId: line.id,
          grade: 4,
          metadata: {
            promptMode: 'name_to_moves',
            prompt: 'Italian Game',
            typedMoves: 'e4 e5 Nf3 Nc6 Bc4',
            correctTokens: 5,
            targetTokens: 6,
          },
        },
        FIXED_TODAY,
        FIXED_NOW
      );

      expect(state).toEqual({
        ease: 2.5,
        intervalDays: 1,
        reps: 1,
        lapses: 0,
        dueDate: '2024-05-02',
        lastGrade: 4,
        lastReviewedAt: FIXED_NOW,
      });
      expect(review).toMatchObject({
        openingId: line.id,
        reviewedAt: FIXED_NOW,
        grade: 4,
        promptMode: 'name_to_moves',
        prompt: 'Italian Game',
        typedMoves: 'e4 e5 Nf3 Nc6 Bc4',
        correctTokens: 5,
        targetTokens: 6,
      });
      expect(await ctx.study.getState(line.id)).toEqual(state);
      expect(await ctx.repos.reviews.findByOpeningId(line.id)).toEqual([review]);
    });

    it('follows the SM-2 intervals over successive passing grades', async () => {
      const line = await createTestOpening(ctx.repos, 'italian');

      const first = await ctx.study.applyGrade({ openingId: line.id, grade: 5 }, '2024-05-01', FIXED_NOW);
      const second = await ctx.study.applyGrade({ openingId: line.id, grade: 5 }, '2024-05-02', FIXED_NOW);
      const third = await ctx.study.applyGrade({ openingId: line.id, grade: 4 }, '2024-05-08', FIXED_NOW);

      expect(first.state.intervalDays).toBe(1);
      expect(first.state.dueDate).toBe('2024-05-02');
      expect(second.state.intervalDays).toBe(6);
      expect(second.state.dueDate).toBe('2024-05-08');
      // Ease 2.5 -> 2.6 -> 2.7 -> 2.7; round(6 * 2.7) = 16
      expect(third.state.ease).toBeCloseTo(2.7);
      expect(third.state.intervalDays).toBe(16);
      expect(third.state.dueDate).toBe('2024-05-24');
      expect(third.state.reps).toBe(3);
      expect(await ctx.repos.reviews.countByOpeningId(line.id)).toBe(3);
    });

    it('resets the interval on a lapse and keeps the ease penalty', async () => {
      const line = await createTestOpening(ctx.repos, 'italian');
      await ctx.study.applyGrade({ openingId: line.id, grade: 5 }, '2024-05-01', FIXED_NOW);

      const { state, review } = await ctx.study.applyGrade(
        { openingId: line.id, grade: 2 },
        '2024-05-02',
        FIXED_NOW
      );

      expect(state.reps).toBe(0);
      expect(state.lapses).toBe(1);
      expect(state.intervalDays).toBe(1);
      expect(state.dueDate).toBe('2024-05-03');
      expect(state.ease).toBeCloseTo(2.28);
      expect(review.promptMode).toBe('manual');
      expect(review.typedMoves).toBeNull();
    });

    it('rejects an invalid grade without touching state or log', async () => {
      const line = await createTestOpening(ctx.repos, 'italian');
      const before = await ctx.study.applyGrade({ openingId: line.id, grade: 3 }, FIXED_TODAY, FIXED_NOW);

      await expect(
        ctx.study.applyGrade({ openingId: line.id, grade: 6 }, FIXED_TODAY, FIXED_NOW)
      ).rejects.toBeInstanceOf(InvalidGradeError);
      await expect(
        ctx.study.applyGrade({ openingId: line.id, grade: 2.5 }, FIXED_TODAY, FIXED_NOW)
      ).rejects.toBeInstanceOf(InvalidGradeError);

      expect(await ctx.study.getState(line.id)).toEqual(before.state);
      expect(await ctx.repos.reviews.countByOpeningId(line.id)).toBe(1);
    });

    it('rejects an unknown opening', async () => {
      await expect(
        ctx.study.applyGrade({ openingId: 'op_missing', grade: 4 }, FIXED_TODAY, FIXED_NOW)
      ).rejects.toBeInstanceOf(OpeningNotFoundError);
    });

    it('applies concurrent grades for one opening one after the other', async () => {
      const line = await createTestOpening(ctx.repos, 'italian');
      const scheduler = new RecallScheduler();
      const initial = scheduler.createInitialState(FIXED_TODAY);
      const sequential = (first: number, second: number) =>
        scheduler.applyGrade(
          scheduler.applyGrade(initial, first, FIXED_TODAY, FIXED_NOW),
          second,
          FIXED_TODAY,
          FIXED_NOW
        );

      await Promise.all([
        ctx.study.applyGrade({ openingId: line.id, grade: 5 }, FIXED_TODAY, FIXED_NOW),
        ctx.study.applyGrade({ openingId: line.id, grade: 1 }, FIXED_TODAY, FIXED_NOW),
      ]);

      const final = await ctx.study.getState(line.id);
      const grades = (await ctx.repos.reviews.findByOpeningId(line.id)).map((entry) => entry.grade);

      expect(grades.sort()).toEqual([1, 5]);
      expect(final?.lapses).toBe(1);
      expect(final?.ease).toBeCloseTo(2.06, 10);
      expect([sequential(5, 1), sequential(1, 5)]).toContainEqual(final);
    });
  });

  describe('pickDue', () => {
    it('returns new lines due today ordered by name', async () => {
      await createAllTestOpenings(ctx.repos);

      const picked = await ctx.study.pickDue('', FIXED_TODAY, 10);

      expect(picked.map((line) => line.name)).toEqual([
        'Italian Game',
        'Scotch Game - Classical',
        'Scotch Game - Main',
      ]);
      expect(picked.every((line) => line.dueDate === FIXED_TODAY)).toBe(true);
    });

    it('leaves out lines scheduled later while others are due', async () => {
      const lines = await createAllTestOpenings(ctx.repos);
      await ctx.study.applyGrade({ openingId: lines.italian.id, grade: 5 }, FIXED_TODAY, FIXED_NOW);

      const picked = await ctx.study.pickDue('', FIXED_TODAY, 10);

      expect(picked.map((line) => line.name)).toEqual([
        'Scotch Game - Classical',
        'Scotch Game - Main',
      ]);
    });

    it('falls back to the soonest upcoming lines when nothing is due', async () => {
      const lines = await createAllTestOpenings(ctx.repos);
      await ctx.study.applyGrade({ openingId: lines.scotchMain.id, grade: 5 }, '2024-04-30', FIXED_NOW);
      await ctx.study.applyGrade({ openingId: lines.scotchMain.id, grade: 5 }, '2024-05-01', FIXED_NOW);
      await ctx.study.applyGrade({ openingId: lines.scotchClassical.id, grade: 5 }, FIXED_TODAY, FIXED_NOW);
      await ctx.study.applyGrade({ openingId: lines.italian.id, grade: 5 }, FIXED_TODAY, FIXED_NOW);

      const picked = await ctx.study.pickDue('', FIXED_TODAY, 2);
      const due = await ctx.study.listDue('', FIXED_TODAY, 2);

      expect(picked.map((line) => [line.name, line.dueDate])).toEqual([
        ['Italian Game', '2024-05-02'],
        ['Scotch Game - Classical', '2024-05-02'],
      ]);
      expect(due).toEqual([]);
    });

    it('returns nothing when no opening matches the prefix', async () => {
      await createAllTestOpenings(ctx.repos);
      expect(await ctx.study.pickDue('Sicilian', FIXED_TODAY, 5)).toEqual([]);
    });
  });
});

/**
 * CLI Command Tests
 *
 * Runs the commander program in process against an in-memory database,
 * with scripted prompt answers and a scripted UCI engine.
 */

import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { runCli } from '../../src/cli/program';
import { cleanupTestDatabase, createTestContext, FIXED_NOW, type TestContext } from '../setup';
import { createAllTestOpenings, createTestOpening } from '../helpers';
import { createTestCli, type TestCliOptions } from '../fakes/cli-context';
import { engineAnswering, handshake, type Responder } from '../fakes/scripted-transport';

const ITALIAN_FEN = 'r1bqk1nr/pppp1ppp/2n5/2b1p3/2B1P3/5N2/PPPP1PPP/RNBQK2R w KQkq - 4 4';

/**
 * An engine that answers successive searches with the given side-to-move
 * centipawn scores.
 */
function engineScoring(scores: number[]): Responder {
  let searches = 0;
  return (command, transport) => {
    if (command.startsWith('go ')) {
      const cp = scores[searches++] ?? 0;
      return [`info depth 10 score cp ${cp} pv a2a3`, 'bestmove a2a3'];
    }
    if (command === 'quit') {
      transport.exit();
      return [];
    }
    return handshake(command);
  };
}

describe('CLI commands', () => {
  let ctx: TestContext;

  const run = async (args: string[], options: Omit<TestCliOptions, 'db' | 'now'> = {}) => {
    const cli = createTestCli({ db: ctx.db, now: FIXED_NOW, ...options });
    const code = await runCli(args, cli.ctx);
    return { code, ...cli };
  };

  beforeEach(() => {
    ctx = createTestContext();
  });

  afterEach(() => {
    cleanupTestDatabase(ctx);
  });

  describe('catalog', () => {
    it('add stores a validated line', async () => {
      const { code, output } = await run(['add', 'Ruy Lopez', '--moves', 'e4 e5 Nf3 Nc6 Bb5']);

      expect(code).toBe(0);
      expect(output).toEqual(['Added Ruy Lopez']);
      expect((await ctx.repos.openings.findByName('Ruy Lopez'))?.movesSan).toBe('e4 e5 Nf3 Nc6 Bb5');
    });

    it('add reports an illegal move and exits 1', async () => {
      const { code, errors } = await run(['add', 'Broken', '--moves', 'e4 e5 Ke3']);

      expect(code).toBe(1);
      expect(errors).toEqual(["Error: Invalid SAN move 'Ke3' at ply 3."]);
      expect(await ctx.repos.openings.findAll()).toEqual([]);
    });

    it('add reports a duplicate name', async () => {
      await createTestOpening(ctx.repos, 'italian');

      const { code, errors } = await run(['add', 'Italian Game', '--moves', 'e4']);

      expect(code).toBe(1);
      expect(errors).toEqual(["Error: An opening named 'Italian Game' already exists."]);
    });

    it('list prints a table of names and moves', async () => {
      await createTestOpening(ctx.repos, 'italian');

      const { output } = await run(['list']);

      expect(output).toEqual([
        'Openings',
        'Name          Moves (SAN)',
        `${'─'.repeat(12)}  ${'─'.repeat(21)}`,
        'Italian Game  e4 e5 Nf3 Nc6 Bc4 Bc5',
      ]);
    });

    it('list says so when the catalog is empty', async () => {
      const { output } = await run(['list']);
      expect(output).toEqual(['No openings stored yet.']);
    });

    it('note then show prints the line, its FEN, notes and latest eval', async () => {
      const line = await createTestOpening(ctx.repos, 'italian');
      await ctx.repos.evaluations.store(line.id, {
        depth: 12,
        scoreCp: 35,
        mateIn: null,
        bestmoveUci: 'c2c3',
        pvUci: 'c2c3 g8f6',
      });

      const noted = await run(['note', 'Italian Game', '--text', '  Play c3 then d4  ']);
      const shown = await run(['show', 'Italian Game']);

      expect(noted.output).toEqual(['Saved notes for Italian Game']);
      expect(shown.output).toEqual([
        'Italian Game',
        'e4 e5 Nf3 Nc6 Bc4 Bc5',
        `FEN: ${ITALIAN_FEN}`,
        '',
        'Notes',
        'Play c3 then d4',
        'Latest eval @ depth 12: 0.35',
      ]);
    });

    it('show exits 1 for an unknown name', async () => {
      const { code, errors } = await run(['show', 'Nope']);

      expect(code).toBe(1);
      expect(errors).toEqual(["Error: No opening 'Nope'."]);
    });
  });

  describe('study', () => {
    it('due lists the lines due today', async () => {
      await createTestOpening(ctx.repos, 'italian');

      const { output } = await run(['due']);

      expect(output).toEqual([
        'Due today (prefix: )',
        'Opening       Due',
        `${'─'.repeat(12)}  ${'─'.repeat(10)}`,
        'Italian Game  2024-05-01',
      ]);
    });

    it('due reports nothing due once every line is scheduled later', async () => {
      const line = await createTestOpening(ctx.repos, 'italian');
      await ctx.study.applyGrade({ openingId: line.id, grade: 5 }, '2024-05-01', FIXED_NOW);

      const { output } = await run(['due', '--prefix', 'Italian']);

      expect(output).toEqual(["Nothing due today for prefix 'Italian'."]);
    });

    it('quiz checks the typed moves and schedules the default grade', async () => {
      const line = await createTestOpening(ctx.repos, 'italian');
      await ctx.repos.notes.set(line.id, 'Aim at f7');

      const { code, output, questions } = await run(['quiz', '--tokens', '6'], {
        answers: ['e4 e5 Nf3 Nc6 Bc4 Bc5', ''],
      });

      expect(code).toBe(0);
      expect(questions).toEqual(['Type first 6 moves (SAN tokens)', 'Grade your recall (0..5)']);
      expect(output).toEqual([
        'Created 1 study cards.',
        '',
        'Italian Game  (due 2024-05-01)',
        'Correct (6/6)',
        'Suggested grade: 5',
        'Next review: 2024-05-02 (in 1 day)',
        'Note: Aim at f7',
      ]);

      const [review] = await ctx.repos.reviews.findByOpeningId(line.id);
      expect(review).toMatchObject({
        grade: 4,
        promptMode: 'name_to_moves',
        prompt: 'Italian Game',
        typedMoves: 'e4 e5 Nf3 Nc6 Bc4 Bc5',
        correctTokens: 6,
        targetTokens: 6,
      });
    });

    it('quiz shows the answer after a partial recall', async () => {
      await createTestOpening(ctx.repos, 'italian');

      const { output } = await run(['quiz', '--tokens', '4'], { answers: ['e4 e5 Bc4', '2'] });

      expect(output).toEqual([
        'Created 1 study cards.',
        '',
        'Italian Game  (due 2024-05-01)',
        'Partial (2/4)',
        'Answer: e4 e5 Nf3 Nc6',
        'Suggested grade: 3',
        'Next review: 2024-05-02 (in 1 day)',
      ]);
    });

    it('quiz rejects a grade outside 0..5 without scheduling', async () => {
      const line = await createTestOpening(ctx.repos, 'italian');

      const { code, errors } = await run(['quiz'], { answers: ['e4', '9'] });

      expect(code).toBe(1);
      expect(errors).toEqual(['Error: Grade must be an integer 0..5, got 9']);
      expect(await ctx.repos.reviews.countByOpeningId(line.id)).toBe(0);
    });

    it('quiz --dry-run prints answers without asking', async () => {
      await createTestOpening(ctx.repos, 'italian');

      const { output, questions } = await run(['quiz', '--dry-run', '--tokens', '3']);

      expect(questions).toEqual([]);
      expect(output).toEqual([
        'Created 1 study cards.',
        '',
        'Italian Game  (due 2024-05-01)',
        'Answer: e4 e5 Nf3',
      ]);
    });

    it('quiz reports an empty selection', async () => {
      const { output } = await run(['quiz', '--prefix', 'Sicilian']);
      expect(output).toEqual(["No openings found for prefix 'Sicilian'."]);
    });
  });

  describe('tree', () => {
    it('prints the common start and the indented branches', async () => {
      await createAllTestOpenings(ctx.repos);

      const { output } = await run(['tree']);

      expect(output).toEqual([
        'Common start (4 tokens)',
        'e4 e5 Nf3 Nc6',
        '',
        'Next branches',
        '- d4  (2)  Scotch Game - Classical, Scotch Game - Main',
        '  - exd4  (2)  Scotch Game - Classical, Scotch Game - Main',
        '    - Nxd4  (2)  Scotch Game - Classical, Scotch Game - Main',
        '- Bc4  (1)  Italian Game',
      ]);
    });
  });

  describe('engine', () => {
    it('eval stores and prints the evaluation of the final position', async () => {
      const line = await createTestOpening(ctx.repos, 'italian');

      const { code, output, transports } = await run(['eval', 'Italian Game', '--depth', '12'], {
        engine: engineAnswering(['info depth 12 score cp 35 pv c2c3 g8f6', 'bestmove c2c3 ponder g8f6']),
      });

      expect(code).toBe(0);
      expect(output).toEqual([
        'Italian Game @ depth 12: 0.35',
        'bestmove: c2c3',
        'pv: c2c3 g8f6',
      ]);
      expect(transports[0].sent).toContain(`position fen ${ITALIAN_FEN}`);
      expect(transports[0].sent[transports[0].sent.length - 1]).toBe('quit');
      expect(await ctx.repos.evaluations.latest(line.id)).toMatchObject({
        depth: 12,
        scoreCp: 35,
        bestmoveUci: 'c2c3',
      });
    });

    it('eval-all prints a table of the stored evaluations', async () => {
      await createTestOpening(ctx.repos, 'italian');

      const { code, output } = await run(['eval-all'], { engine: engineScoring([35]) });

      expect(code).toBe(0);
      expect(output).toEqual([
        'Evaluations (depth 12)',
        'Opening       Score  Bestmove',
        '────────────  ─────  ────────',
        'Italian Game  0.35   a2a3',
      ]);
    });

    it('eval-all says so when the catalog is empty', async () => {
      const { code, output } = await run(['eval-all']);

      expect(code).toBe(0);
      expect(output).toEqual(['No openings stored yet.']);
    });

    it('eval exits 1 when no engine is installed', async () => {
      await createTestOpening(ctx.repos, 'italian');

      const { code, errors } = await run(['eval', 'Italian Game']);

      expect(code).toBe(1);
      expect(errors).toEqual(['Error: Stockfish not found on PATH']);
    });

    it('learn flags the largest swing as critical', async () => {
      await ctx.repos.openings.create({ name: 'Wayward Queen', tokens: ['e4', 'e5', 'Qh5'] });

      // Side-to-move scores: start, after e4, after e5, after Qh5
      const { output } = await run(['learn'], { engine: engineScoring([20, -30, 25, 100]) });

      expect(output).toEqual([
        '',
        'Wayward Queen',
        '01  e4 e5 Qh5',
        'Final eval (Stockfish d10, White POV): -1.00',
        'CRITICAL: ply 3 (White) Qh5  +0.25 → -1.00  (Δ 1.25)',
      ]);
    });

    it('learn continues without evaluation when no engine is installed', async () => {
      await ctx.repos.openings.create({ name: 'Wayward Queen', tokens: ['e4', 'e5', 'Qh5'] });

      const { code, output } = await run(['learn', '--chunk', '4']);

      expect(code).toBe(0);
      expect(output).toEqual([
        'Stockfish not available: Stockfish not found on PATH',
        'Continuing without eval. Install Stockfish or set STOCKFISH_PATH.',
        '',
        'Wayward Queen',
        '01  e4 e5 Qh5',
      ]);
    });
  });

  describe('import', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'opening-drill-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('adds new lines, skips existing names and reports illegal ones', async () => {
      await createTestOpening(ctx.repos, 'italian');
      const file = join(dir, 'repertoire.tsv');
      writeFileSync(
        file,
        [
          '# white repertoire',
          'Scotch Game\t1. e4 e5 2. Nf3 Nc6 3. d4 *',
          'Italian Game\t1. e4 e5 2. Nf3 Nc6 3. Bc4',
          '',
          '1. d4 d5 2. c4',
          'Broken\t1. e4 e5 2. Ke3',
        ].join('\n')
      );

      const { code, output } = await run(['import', file]);

      expect(code).toBe(0);
      expect(output).toEqual([
        'ADDED: Scotch Game',
        'SKIP (already exists): Italian Game',
        'ADDED: Imported line 1',
        "FAIL: Broken: Invalid SAN move 'Ke3' at ply 3.",
        '',
        'Done. added=2 skipped=1 failed=1 dry_run=false',
      ]);
      expect((await ctx.repos.openings.findByName('Scotch Game'))?.movesSan).toBe('e4 e5 Nf3 Nc6 d4');
      expect((await ctx.repos.openings.findByName('Imported line 1'))?.movesSan).toBe('d4 d5 c4');
    });

    it('validates without storing on --dry-run, with the name prefix applied', async () => {
      const file = join(dir, 'lines.tsv');
      writeFileSync(file, 'Queen Gambit\t1. d4 d5 2. c4\n');

      const { output } = await run(['import', file, '--dry-run', '--name-prefix', 'QG: ']);

      expect(output).toEqual([
        'OK (validated): QG: Queen Gambit',
        '',
        'Done. added=1 skipped=0 failed=0 dry_run=true',
      ]);
      expect(await ctx.repos.openings.findAll()).toEqual([]);
    });

    it('exits 1 for a file with nothing to import', async () => {
      const file = join(dir, 'empty.tsv');
      writeFileSync(file, '# nothing\n\n');

      const { code, errors } = await run(['import', file]);

      expect(code).toBe(1);
      expect(errors).toEqual([`Error: No importable lines found in ${file}`]);
    });
  });
});

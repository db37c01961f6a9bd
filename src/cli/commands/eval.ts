/**
 * Engine commands: eval (one opening) and eval-all.
 *
 * Each run starts one Stockfish process, evaluates the final position of
 * each line and stores the result. Scores are from the side to move.
 */

import { Command } from 'commander';
import { playLine } from '@/chess';
import { evaluatePosition, formatStoredScore, type UciEngine } from '@/engine';
import { EvaluationRepository, OpeningRepository } from '@/storage/repositories';
import type { CliContext } from '../context';
import { intOption } from '../utils/options';
import { bold, cyan, yellow, formatTable } from '../utils/terminal';
import { requireOpeningByName } from './openings';

interface EvalOptions {
  depth: number;
}

async function withEngine<T>(ctx: CliContext, run: (engine: UciEngine) => Promise<T>): Promise<T> {
  const engine = await ctx.launchEngine();
  try {
    return await run(engine);
  } finally {
    await engine.quit();
  }
}

export function createEvalCommand(ctx: CliContext): Command {
  return new Command('eval')
    .description('Evaluate one opening and store the result')
    .argument('<name>', 'Opening name')
    .option('--depth <n>', 'Stockfish depth', intOption(1, 99), ctx.settings.engineDepth)
    .action(async (name: string, options: EvalOptions) => {
      const db = ctx.db();
      const opening = await requireOpeningByName(new OpeningRepository(db), name);
      const { fen } = playLine(opening.tokens);

      const result = await withEngine(ctx, (engine) => evaluatePosition(engine, fen, options.depth));
      const stored = await new EvaluationRepository(db).store(opening.id, result, ctx.clock());

      const score = formatStoredScore(stored.scoreCp, stored.mateIn);
      ctx.io.print(`${bold(opening.name)} @ depth ${stored.depth}: ${cyan(score)}`);
      if (stored.bestmoveUci) {
        ctx.io.print(`bestmove: ${stored.bestmoveUci}`);
      }
      if (stored.pvUci) {
        ctx.io.print(`pv: ${stored.pvUci}`);
      }
    });
}

export function createEvalAllCommand(ctx: CliContext): Command {
  return new Command('eval-all')
    .description('Evaluate all openings and store the results')
    .option('--depth <n>', 'Stockfish depth', intOption(1, 99), ctx.settings.engineDepth)
    .action(async (options: EvalOptions) => {
      const db = ctx.db();
      const openings = await new OpeningRepository(db).findAll();
      if (openings.length === 0) {
        ctx.io.print(yellow('No openings stored yet.'));
        return;
      }

      const evaluations = new EvaluationRepository(db);
      const rows = await withEngine(ctx, async (engine) => {
        const collected: string[][] = [];
        for (const opening of openings) {
          const result = await evaluatePosition(engine, playLine(opening.tokens).fen, options.depth);
          const stored = await evaluations.store(opening.id, result, ctx.clock());
          collected.push([
            bold(opening.name),
            cyan(formatStoredScore(stored.scoreCp, stored.mateIn)),
            stored.bestmoveUci ?? '',
          ]);
        }
        return collected;
      });

      const title = `Evaluations (depth ${options.depth})`;
      for (const line of formatTable(['Opening', 'Score', 'Bestmove'], rows, title)) {
        ctx.io.print(line);
      }
    });
}

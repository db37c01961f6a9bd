/**
 * learn: a study sheet to read before quizzing.
 *
 * Each line is printed in numbered chunks. With an engine available, every
 * ply is evaluated from White's point of view and the move with the largest
 * swing is highlighted; swings of at least --swing-cp are flagged CRITICAL.
 */

import { Command } from 'commander';
import { applyMove, startPosition } from '@/chess';
import { OracleUnavailableError } from '@/core/errors';
import { chunkTokens } from '@/core/moves';
import { analyzeLine, type LargestSwing, type SwingReport } from '@/core/swing';
import { createWhitePovEvaluator, EngineNotFoundError, type UciEngine } from '@/engine';
import { OpeningRepository } from '@/storage/repositories';
import type { CliContext } from '../context';
import { intOption } from '../utils/options';
import { bold, cyan, dim, red, reverse, yellow, formatChunkLines } from '../utils/terminal';

interface LearnOptions {
  prefix: string;
  limit: number;
  chunk: number;
  eval: boolean;
  depth: number;
  swingCp: number;
}

/**
 * The one-line summary of a swing, e.g.
 * `CRITICAL: ply 5 (White) Bc4  +0.20 → -1.10  (Δ 1.30)`.
 */
export function formatSwing(swing: LargestSwing): string {
  const tag = swing.critical ? bold(red('CRITICAL')) : yellow('Largest swing');
  const side = swing.side === 'white' ? 'White' : 'Black';
  const pawns = (Math.abs(swing.delta) / 100).toFixed(2);
  return `${tag}: ply ${swing.ply} (${side}) ${bold(swing.token)}  ${swing.before} → ${swing.after}  ${dim(`(Δ ${pawns})`)}`;
}

async function startEngine(ctx: CliContext): Promise<UciEngine | null> {
  try {
    return await ctx.launchEngine();
  } catch (error) {
    if (error instanceof EngineNotFoundError) {
      ctx.io.print(`${yellow('Stockfish not available')}: ${error.message}`);
      ctx.io.print(dim('Continuing without eval. Install Stockfish or set STOCKFISH_PATH.'));
      return null;
    }
    throw error;
  }
}

export function createLearnCommand(ctx: CliContext): Command {
  return new Command('learn')
    .description('Print a study sheet: each opening split into small chunks to rehearse')
    .option('--prefix <prefix>', 'Filter by opening name prefix', ctx.settings.studyPrefix)
    .option('--limit <n>', 'Maximum openings to show', intOption(1, 200), 20)
    .option('--chunk <n>', 'Tokens per chunk to memorize', intOption(4, 20), 8)
    .option('--eval', 'Show Stockfish eval and critical swing', true)
    .option('--no-eval', 'Skip engine evaluation')
    .option('--depth <n>', 'Stockfish depth for learn evals', intOption(1, 30), ctx.settings.learnDepth)
    .option('--swing-cp <n>', 'Highlight swings >= this (centipawns)', intOption(10, 2000), ctx.settings.swingCp)
    .action(async (options: LearnOptions) => {
      const lines = await new OpeningRepository(ctx.db()).findByPrefix(options.prefix, options.limit);
      if (lines.length === 0) {
        ctx.io.print(`${yellow('No openings found')} for prefix '${options.prefix}'.`);
        return;
      }

      let engine = options.eval ? await startEngine(ctx) : null;

      try {
        for (const line of lines) {
          let report: SwingReport | null = null;

          if (engine) {
            try {
              report = await analyzeLine(line.tokens, {
                start: startPosition(),
                applyMove,
                evaluate: createWhitePovEvaluator(engine, options.depth),
                criticalThreshold: options.swingCp,
              });
            } catch (error) {
              if (!(error instanceof OracleUnavailableError)) throw error;
              ctx.io.print(`${yellow('Evaluation stopped')}: ${error.message}`);
              report = error.partial;
              await engine.quit();
              engine = null;
            }
          }

          const criticalIndex = report?.swing?.plyIndex ?? null;
          const shown = line.tokens.map((token, index) =>
            index === criticalIndex ? bold(reverse(red(token))) : token
          );

          ctx.io.print();
          ctx.io.print(bold(line.name));
          for (const chunkLine of formatChunkLines(chunkTokens(shown, options.chunk))) {
            ctx.io.print(chunkLine);
          }

          if (report?.complete) {
            ctx.io.print(
              `${dim(`Final eval (Stockfish d${options.depth}, White POV)`)}: ${cyan(report.finalScore.display)}`
            );
          }
          if (report?.swing) {
            ctx.io.print(formatSwing(report.swing));
          }
        }
      } finally {
        await engine?.quit();
      }
    });
}

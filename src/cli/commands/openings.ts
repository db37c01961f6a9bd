/**
 * Catalog commands: init, add, list, show, note.
 */

import { Command } from 'commander';
import { addOpening, playLine } from '@/chess';
import { OpeningNotFoundError } from '@/core/errors';
import type { OpeningLine } from '@/core/models';
import { formatStoredScore } from '@/engine/uci';
import { EvaluationRepository, NoteRepository, OpeningRepository } from '@/storage/repositories';
import type { CliContext } from '../context';
import { bold, cyan, green, yellow, formatTable } from '../utils/terminal';

export async function requireOpeningByName(
  openings: OpeningRepository,
  name: string
): Promise<OpeningLine> {
  const opening = await openings.findByName(name);
  if (!opening) {
    throw new OpeningNotFoundError(name);
  }
  return opening;
}

export function createInitCommand(ctx: CliContext): Command {
  return new Command('init').description('Initialize the SQLite database').action(() => {
    ctx.db();
    ctx.io.print(`${green('Initialized')} ${ctx.settings.databasePath}`);
  });
}

interface AddOptions {
  moves: string;
}

export function createAddCommand(ctx: CliContext): Command {
  return new Command('add')
    .description('Add an opening (validates SAN moves before saving)')
    .argument('<name>', 'Unique opening name')
    .requiredOption('--moves <san>', 'SAN moves, space-separated')
    .action(async (name: string, options: AddOptions) => {
      const opening = await addOpening(new OpeningRepository(ctx.db()), name, options.moves);
      ctx.io.print(`${green('Added')} ${opening.name}`);
    });
}

export function createListCommand(ctx: CliContext): Command {
  return new Command('list').description('List stored openings').action(async () => {
    const openings = await new OpeningRepository(ctx.db()).findAll();
    if (openings.length === 0) {
      ctx.io.print(yellow('No openings stored yet.'));
      return;
    }

    const rows = openings.map((opening) => [bold(opening.name), opening.movesSan]);
    for (const line of formatTable(['Name', 'Moves (SAN)'], rows, 'Openings')) {
      ctx.io.print(line);
    }
  });
}

export function createShowCommand(ctx: CliContext): Command {
  return new Command('show')
    .description('Show an opening, its notes and its latest stored evaluation')
    .argument('<name>', 'Opening name')
    .action(async (name: string) => {
      const db = ctx.db();
      const opening = await requireOpeningByName(new OpeningRepository(db), name);
      const notes = await new NoteRepository(db).get(opening.id);
      const latest = await new EvaluationRepository(db).latest(opening.id);

      ctx.io.print(bold(opening.name));
      ctx.io.print(opening.movesSan);
      ctx.io.print(`FEN: ${playLine(opening.tokens).fen}`);

      if (notes) {
        ctx.io.print();
        ctx.io.print(bold('Notes'));
        ctx.io.print(notes);
      }
      if (latest) {
        const score = formatStoredScore(latest.scoreCp, latest.mateIn);
        ctx.io.print(`Latest eval @ depth ${latest.depth}: ${cyan(score)}`);
      }
    });
}

interface NoteOptions {
  text: string;
}

export function createNoteCommand(ctx: CliContext): Command {
  return new Command('note')
    .description('Attach notes (mnemonics, triggers, plans) to an opening')
    .argument('<name>', 'Opening name')
    .requiredOption('--text <text>', 'Notes for this opening')
    .action(async (name: string, options: NoteOptions) => {
      const db = ctx.db();
      const opening = await requireOpeningByName(new OpeningRepository(db), name);
      await new NoteRepository(db).set(opening.id, options.text.trim(), ctx.clock());
      ctx.io.print(`${green('Saved notes')} for ${bold(opening.name)}`);
    });
}

/**
 * Spaced repetition commands: due and quiz.
 *
 * The quiz shows an opening's name, asks for its first moves, scores the
 * attempt by strict prefix match, then records the self-assessed grade.
 */

import { Command } from 'commander';
import { daysBetween, toCalendarDate } from '@/core/calendar';
import { InvalidGradeError } from '@/core/errors';
import { checkRecall, suggestGrade } from '@/core/quiz';
import { StudyService } from '@/core/study';
import {
  NoteRepository,
  OpeningRepository,
  StudyCardRepository,
} from '@/storage/repositories';
import type { CliContext } from '../context';
import { intOption } from '../utils/options';
import { bold, cyan, dim, green, yellow, formatTable } from '../utils/terminal';

function studyService(ctx: CliContext): StudyService {
  const db = ctx.db();
  return new StudyService(new OpeningRepository(db), new StudyCardRepository(db));
}

/**
 * Parses a typed grade. Anything but an integer 0..5 is rejected.
 *
 * @throws InvalidGradeError
 */
export function parseGrade(raw: string): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidGradeError(trimmed);
  }
  const grade = Number(trimmed);
  if (grade > 5) {
    throw new InvalidGradeError(grade);
  }
  return grade;
}

interface DueOptions {
  prefix: string;
  limit: number;
}

export function createDueCommand(ctx: CliContext): Command {
  return new Command('due')
    .description('Show what to review today (spaced repetition)')
    .option('--prefix <prefix>', 'Filter by opening name prefix', ctx.settings.studyPrefix)
    .option('--limit <n>', 'Maximum lines to show', intOption(1, 200), 20)
    .action(async (options: DueOptions) => {
      const today = toCalendarDate(ctx.clock());
      const due = await studyService(ctx).listDue(options.prefix, today, options.limit);

      if (due.length === 0) {
        ctx.io.print(`${green('Nothing due today')} for prefix '${options.prefix}'.`);
        return;
      }

      const rows = due.map((opening) => [bold(opening.name), opening.dueDate]);
      const title = `Due today (prefix: ${options.prefix})`;
      for (const line of formatTable(['Opening', 'Due'], rows, title)) {
        ctx.io.print(line);
      }
    });
}

interface QuizOptions {
  prefix: string;
  limit: number;
  tokens: number;
  dryRun: boolean;
}

export function createQuizCommand(ctx: CliContext): Command {
  return new Command('quiz')
    .description('Quiz yourself: type the first N moves of each due opening, then grade your recall')
    .option('--prefix <prefix>', 'Filter by opening name prefix', ctx.settings.studyPrefix)
    .option('--limit <n>', 'Maximum openings to quiz', intOption(1, 200), 10)
    .option('--tokens <n>', 'How many SAN tokens to recall', intOption(2, 60), 10)
    .option('--dry-run', 'Show answers without prompting or scheduling', false)
    .action(async (options: QuizOptions) => {
      const study = studyService(ctx);
      const notes = new NoteRepository(ctx.db());
      const today = toCalendarDate(ctx.clock());

      const created = await study.ensureCards(options.prefix, today);
      const openings = await study.pickDue(options.prefix, today, options.limit);

      if (created > 0) {
        ctx.io.print(dim(`Created ${created} study cards.`));
      }
      if (openings.length === 0) {
        ctx.io.print(`${yellow('No openings found')} for prefix '${options.prefix}'.`);
        return;
      }

      const openingRepo = new OpeningRepository(ctx.db());
      for (const scheduled of openings) {
        const opening = await openingRepo.findById(scheduled.id);
        if (!opening) continue;

        ctx.io.print();
        ctx.io.print(`${bold(opening.name)}  ${dim(`(due ${scheduled.dueDate})`)}`);

        if (options.dryRun) {
          ctx.io.print(`${cyan('Answer')}: ${opening.tokens.slice(0, options.tokens).join(' ')}`);
          continue;
        }

        const typed = await ctx.io.ask(`Type first ${options.tokens} moves (SAN tokens)`);
        const result = checkRecall(opening.tokens, typed, options.tokens);

        if (result.fullyCorrect) {
          ctx.io.print(`${green('Correct')} (${result.correctTokens}/${result.targetTokens})`);
        } else {
          ctx.io.print(`${yellow('Partial')} (${result.correctTokens}/${result.targetTokens})`);
          ctx.io.print(`${cyan('Answer')}: ${result.target.join(' ')}`);
        }

        ctx.io.print(dim(`Suggested grade: ${suggestGrade(result)}`));
        const grade = parseGrade(await ctx.io.ask('Grade your recall (0..5)', '4'));

        const reviewedAt = ctx.clock();
        const { state } = await study.applyGrade(
          {
            openingId: opening.id,
            grade,
            metadata: {
              promptMode: 'name_to_moves',
              prompt: opening.name,
              typedMoves: typed,
              correctTokens: result.correctTokens,
              targetTokens: result.targetTokens,
            },
          },
          today,
          reviewedAt
        );

        const days = daysBetween(today, state.dueDate);
        ctx.io.print(dim(`Next review: ${state.dueDate} (in ${days} day${days === 1 ? '' : 's'})`));

        const note = await notes.get(opening.id);
        if (note) {
          ctx.io.print(`${dim('Note:')} ${note}`);
        }
      }
    });
}

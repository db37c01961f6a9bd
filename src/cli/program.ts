/**
 * Builds the commander program and runs it with the CLI's error policy:
 * study and usage errors print `Error: <message>` and exit 1; anything
 * else propagates to the entry point as a fatal error.
 */

import { Command, CommanderError } from 'commander';
import { StudyError } from '@/core/errors';
import { EngineNotFoundError } from '@/engine';
import type { CliContext } from './context';
import { CliUsageError } from './errors';
import { createEvalAllCommand, createEvalCommand } from './commands/eval';
import { createImportCommand } from './commands/import';
import { createLearnCommand } from './commands/learn';
import {
  createAddCommand,
  createInitCommand,
  createListCommand,
  createNoteCommand,
  createShowCommand,
} from './commands/openings';
import { createDueCommand, createQuizCommand } from './commands/study';
import { createTreeCommand } from './commands/tree';
import { red } from './utils/terminal';

export const CLI_NAME = 'opening-drill';

export function createProgram(ctx: CliContext): Command {
  const program = new Command(CLI_NAME)
    .description('Store chess openings, rehearse them with spaced repetition, and evaluate them with Stockfish.')
    .version('0.1.0');

  const commands = [
    createInitCommand(ctx),
    createAddCommand(ctx),
    createListCommand(ctx),
    createShowCommand(ctx),
    createNoteCommand(ctx),
    createEvalCommand(ctx),
    createEvalAllCommand(ctx),
    createDueCommand(ctx),
    createQuizCommand(ctx),
    createLearnCommand(ctx),
    createTreeCommand(ctx),
    createImportCommand(ctx),
  ];

  for (const command of commands) {
    program.addCommand(command.exitOverride());
  }

  return program.exitOverride();
}

function isUserError(error: unknown): error is Error {
  return (
    error instanceof StudyError ||
    error instanceof CliUsageError ||
    error instanceof EngineNotFoundError
  );
}

/**
 * Runs one invocation.
 *
 * @param args - Arguments after the program name, e.g. `['add', 'Scotch', '--moves', 'e4 e5']`
 * @returns The process exit code
 */
export async function runCli(args: readonly string[], ctx: CliContext): Promise<number> {
  try {
    await createProgram(ctx).parseAsync([...args], { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      // help and version exit through here with code 0
      return error.exitCode;
    }
    if (isUserError(error)) {
      ctx.io.error(red(`Error: ${error.message}`));
      return 1;
    }
    throw error;
  } finally {
    ctx.close();
  }
}

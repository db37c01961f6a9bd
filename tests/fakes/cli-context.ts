/**
 * In-process CLI context
 *
 * Runs commands against an in-memory database, records everything printed
 * (ANSI codes stripped) and answers prompts from a script.
 */

import type { CliContext, CliSettings } from '@/cli/context';
import { stripAnsi } from '@/cli/utils/terminal';
import { EngineNotFoundError, UciEngine } from '@/engine';
import type { AppDatabase } from '@/storage/db';
import { ScriptedTransport, type Responder } from './scripted-transport';

export interface TestCliOptions {
  db: AppDatabase;
  now: Date;
  /** Answers handed to `ask`, in order; an empty answer takes the default */
  answers?: string[];
  /** Engine replies; without one, launching reports a missing engine */
  engine?: Responder;
  settings?: Partial<CliSettings>;
}

export interface TestCli {
  ctx: CliContext;
  /** Printed lines, stdout and stderr interleaved */
  output: string[];
  errors: string[];
  questions: string[];
  transports: ScriptedTransport[];
}

export const TEST_SETTINGS: CliSettings = {
  databasePath: ':memory:',
  stockfishPath: undefined,
  engineDepth: 12,
  learnDepth: 10,
  studyPrefix: '',
  swingCp: 80,
};

export function createTestCli(options: TestCliOptions): TestCli {
  const output: string[] = [];
  const errors: string[] = [];
  const questions: string[] = [];
  const transports: ScriptedTransport[] = [];
  const answers = [...(options.answers ?? [])];
  const respond = options.engine;

  const ctx: CliContext = {
    settings: { ...TEST_SETTINGS, ...options.settings },
    io: {
      print: (line = '') => output.push(stripAnsi(line)),
      error: (line) => {
        const plain = stripAnsi(line);
        output.push(plain);
        errors.push(plain);
      },
      async ask(question, defaultValue = '') {
        questions.push(question);
        const answer = (answers.shift() ?? '').trim();
        return answer === '' ? defaultValue : answer;
      },
    },
    db: () => options.db,
    async launchEngine() {
      if (!respond) {
        throw new EngineNotFoundError('Stockfish not found on PATH');
      }
      const transport = new ScriptedTransport(respond);
      transports.push(transport);
      return UciEngine.start(transport);
    },
    clock: () => options.now,
    // The test owns the database
    close: () => undefined,
  };

  return { ctx, output, errors, questions, transports };
}

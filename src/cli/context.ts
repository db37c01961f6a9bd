/**
 * What every command needs from the outside world. `createCliContext`
 * builds the real one from the configuration; tests pass an in-memory
 * database, a scripted engine and captured output.
 */

import { createInterface } from 'readline/promises';
import { config } from '@/config';
import { resolveStockfishPath, UciEngine } from '@/engine';
import { closeDatabase, openDatabase, type AppDatabase } from '@/storage/db';

export interface CliIO {
  print(line?: string): void;
  error(line: string): void;
  /** Reads one answer; an empty answer yields `defaultValue` */
  ask(question: string, defaultValue?: string): Promise<string>;
}

export interface CliSettings {
  databasePath: string;
  stockfishPath: string | undefined;
  /** Default depth for `eval` and `eval-all` */
  engineDepth: number;
  /** Default depth for `learn` */
  learnDepth: number;
  /** Default name prefix for the study commands */
  studyPrefix: string;
  swingCp: number;
}

export interface CliContext {
  settings: CliSettings;
  io: CliIO;
  /** Opens and migrates the database on first use */
  db(): AppDatabase;
  launchEngine(): Promise<UciEngine>;
  clock(): Date;
  close(): void;
}

export function consoleIO(): CliIO {
  return {
    print: (line = '') => console.log(line),
    error: (line) => console.error(line),
    async ask(question, defaultValue = '') {
      const rl = createInterface({ input: process.stdin, output: process.stdout });
      try {
        const hint = defaultValue ? ` [${defaultValue}]` : '';
        const answer = (await rl.question(`${question}${hint}: `)).trim();
        return answer === '' ? defaultValue : answer;
      } finally {
        rl.close();
      }
    },
  };
}

export function settingsFromConfig(): CliSettings {
  return {
    databasePath: config.database.path,
    stockfishPath: config.engine.stockfishPath,
    engineDepth: config.engine.depth,
    learnDepth: config.engine.learnDepth,
    studyPrefix: config.study.prefix,
    swingCp: config.study.swingCp,
  };
}

export function createCliContext(
  settings: CliSettings = settingsFromConfig(),
  io: CliIO = consoleIO()
): CliContext {
  let db: AppDatabase | null = null;

  return {
    settings,
    io,
    db() {
      if (!db) {
        db = openDatabase(settings.databasePath);
      }
      return db;
    },
    launchEngine: async () => UciEngine.launch(resolveStockfishPath(settings.stockfishPath)),
    clock: () => new Date(),
    close() {
      if (db) {
        closeDatabase(db);
        db = null;
      }
    },
  };
}

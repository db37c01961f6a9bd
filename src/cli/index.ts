#!/usr/bin/env tsx
/**
 * Opening Drill CLI
 *
 * Usage:
 *   npm run cli -- <command> [options]
 *
 * @example
 * ```bash
 * npm run cli -- add "Scotch Game - Main" --moves "e4 e5 Nf3 Nc6 d4 exd4 Nxd4"
 * npm run cli -- quiz --prefix "Scotch Game"
 * npm run cli -- learn --prefix "Scotch Game" --depth 12
 * ```
 *
 * Environment Variables:
 *   DATABASE_PATH  - Path to the SQLite database (default: data/opening-drill.db)
 *   STOCKFISH_PATH - Stockfish binary (default: `stockfish` on PATH)
 *   STUDY_PREFIX   - Default --prefix for due, quiz, learn and tree
 */

import { createCliContext } from './context';
import { runCli } from './program';
import { dim, red } from './utils/terminal';

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2), createCliContext());
}

main().catch((error: unknown) => {
  console.error(red('\nFatal error:'));
  console.error(dim(error instanceof Error ? error.message : String(error)));

  if (process.env.DEBUG && error instanceof Error) {
    console.error(dim(error.stack || ''));
  }

  process.exit(1);
});

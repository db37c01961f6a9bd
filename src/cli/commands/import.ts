/**
 * import: bulk-add openings from a TSV file (see `parseImportFile`).
 *
 * Every line is replayed on a board before it is stored. Names already in
 * the catalog are skipped; lines with illegal or missing moves are reported
 * and the import carries on.
 */

import { readFile } from 'fs/promises';
import { Command } from 'commander';
import { addOpening, validateLine } from '@/chess';
import { DuplicateNameError, StudyError } from '@/core/errors';
import { sanitizePgnMoves } from '@/core/moves';
import { OpeningRepository } from '@/storage/repositories';
import type { CliContext } from '../context';
import { CliUsageError } from '../errors';
import { parseImportFile } from '../import-file';
import { green, red, yellow } from '../utils/terminal';

interface ImportOptions {
  namePrefix: string;
  dryRun: boolean;
}

export interface ImportSummary {
  added: number;
  skipped: number;
  failed: number;
}

export function createImportCommand(ctx: CliContext): Command {
  return new Command('import')
    .description('Import openings from a TSV file: <name>\\t<PGN moves> per line')
    .argument('<file>', 'Path to a UTF-8 TSV file')
    .option('--name-prefix <prefix>', 'Prefix added to every imported name', '')
    .option('--dry-run', 'Parse and validate SAN without storing anything', false)
    .action(async (file: string, options: ImportOptions) => {
      const rows = parseImportFile(await readFile(file, 'utf-8'));
      if (rows.length === 0) {
        throw new CliUsageError(`No importable lines found in ${file}`);
      }

      const openings = new OpeningRepository(ctx.db());
      const summary: ImportSummary = { added: 0, skipped: 0, failed: 0 };

      for (const row of rows) {
        const fullName = `${options.namePrefix}${row.name}`.trim();
        const moves = sanitizePgnMoves(row.pgn);

        try {
          if (options.dryRun) {
            validateLine(moves);
          } else {
            await addOpening(openings, fullName, moves);
          }
        } catch (error) {
          if (error instanceof DuplicateNameError) {
            summary.skipped += 1;
            ctx.io.print(`${yellow('SKIP (already exists)')}: ${fullName}`);
            continue;
          }
          if (error instanceof StudyError) {
            summary.failed += 1;
            ctx.io.print(`${red('FAIL')}: ${fullName}: ${error.message}`);
            continue;
          }
          throw error;
        }

        summary.added += 1;
        ctx.io.print(`${green(options.dryRun ? 'OK (validated)' : 'ADDED')}: ${fullName}`);
      }

      ctx.io.print();
      ctx.io.print(
        `Done. added=${summary.added} skipped=${summary.skipped} failed=${summary.failed} dry_run=${options.dryRun}`
      );
    });
}

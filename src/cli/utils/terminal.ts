/**
 * Terminal Utilities for CLI Output Formatting
 *
 * ANSI escape code wrappers plus the few layouts the commands share: a
 * column table, numbered chunks and the tree's indented branches.
 *
 * Usage:
 * ```typescript
 * import { bold, green, formatTable } from './terminal';
 *
 * console.log(green('Added') + ' ' + bold('Scotch Game'));
 * for (const line of formatTable(['Opening', 'Due'], rows)) console.log(line);
 * ```
 *
 * In non-TTY environments the codes pass through harmlessly; tests compare
 * output after `stripAnsi`.
 */

// =============================================================================
// Text Styles and Colors
// =============================================================================

export const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;

export const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;

/** Swaps foreground and background; used to highlight the critical move */
export const reverse = (s: string): string => `\x1b[7m${s}\x1b[0m`;

export const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;

export const yellow = (s: string): string => `\x1b[33m${s}\x1b[0m`;

export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;

export const cyan = (s: string): string => `\x1b[36m${s}\x1b[0m`;

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

/**
 * Removes ANSI escape codes, e.g. to measure the visible width.
 */
export function stripAnsi(s: string): string {
  return s.replace(ANSI_PATTERN, '');
}

// =============================================================================
// Layouts
// =============================================================================

/**
 * Lays out rows under a bold header, columns padded to their widest
 * visible cell. An optional title goes above.
 *
 * @example
 * formatTable(['Opening', 'Due'], [['Scotch Game', '2024-05-01']]);
 * // ['Opening      Due', '───────────  ──────────', 'Scotch Game  2024-05-01']  (without colors)
 */
export function formatTable(
  headers: readonly string[],
  rows: readonly (readonly string[])[],
  title?: string
): string[] {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => stripAnsi(row[column] ?? '').length))
  );

  const renderRow = (cells: readonly string[]): string =>
    cells
      .map((cell, column) => {
        const padding = ' '.repeat(Math.max(0, (widths[column] ?? 0) - stripAnsi(cell).length));
        return column === cells.length - 1 ? cell : cell + padding;
      })
      .join('  ');

  const lines: string[] = [];
  if (title) {
    lines.push(bold(title));
  }
  lines.push(bold(renderRow(headers)));
  lines.push(dim(widths.map((width) => '─'.repeat(width)).join('  ')));
  for (const row of rows) {
    lines.push(renderRow(headers.map((_, column) => row[column] ?? '')));
  }
  return lines;
}

/**
 * Numbers chunks from 01 for the study sheet.
 */
export function formatChunkLines(chunks: readonly string[]): string[] {
  return chunks.map((chunk, index) => `${dim(String(index + 1).padStart(2, '0'))}  ${chunk}`);
}

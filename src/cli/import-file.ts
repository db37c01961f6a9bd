/**
 * Parser for opening import files.
 *
 * One line per opening, either `<name>\t<PGN moves>` or bare PGN moves.
 * Blank lines and lines starting with `#` are skipped. Lines without a
 * name are called `Imported line N`, numbered from 1 in file order.
 */

export interface ImportRow {
  /** 1-based line number in the file */
  lineNumber: number;
  name: string;
  pgn: string;
}

export function parseImportFile(text: string): ImportRow[] {
  const rows: ImportRow[] = [];
  let autoIndex = 1;

  const autoName = (): string => `Imported line ${autoIndex++}`;

  text.split(/\r?\n/).forEach((raw, index) => {
    const line = raw.trim();
    if (!line || line.startsWith('#')) {
      return;
    }

    const tab = line.indexOf('\t');
    if (tab === -1) {
      rows.push({ lineNumber: index + 1, name: autoName(), pgn: line });
      return;
    }

    const name = line.slice(0, tab).trim();
    rows.push({
      lineNumber: index + 1,
      name: name || autoName(),
      pgn: line.slice(tab + 1).trim(),
    });
  });

  return rows;
}

import { existsSync } from 'fs';
import { delimiter, join } from 'path';
import { EngineNotFoundError } from './errors';

/**
 * The Stockfish binary to run: the configured path, or `stockfish` found on
 * PATH.
 *
 * @throws EngineNotFoundError if neither is available
 */
export function resolveStockfishPath(
  explicitPath: string | undefined,
  searchPath: string = process.env.PATH ?? ''
): string {
  if (explicitPath) {
    return explicitPath;
  }

  const binary = process.platform === 'win32' ? 'stockfish.exe' : 'stockfish';
  for (const dir of searchPath.split(delimiter)) {
    if (!dir) continue;
    const candidate = join(dir, binary);
    if (existsSync(candidate)) {
      return candidate;
    }
  }

  throw new EngineNotFoundError(
    'Stockfish binary not found on PATH. Install it (e.g. `brew install stockfish`) or set STOCKFISH_PATH.'
  );
}

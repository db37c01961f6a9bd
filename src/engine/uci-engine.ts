/**
 * UCI Engine Client
 *
 * Drives a UCI engine (Stockfish) over an EngineTransport: handshake, fixed
 * depth searches, and shutdown. Searches are queued, so concurrent calls to
 * `analyse` run one after another on the single engine process. A search
 * that times out is stopped, and its late output is discarded.
 *
 * @example
 * ```typescript
 * const engine = await UciEngine.launch(resolveStockfishPath(config.engine.stockfishPath));
 * try {
 *   const analysis = await engine.analyse(fen, 14);
 * } finally {
 *   await engine.quit();
 * }
 * ```
 */

import { EngineError } from './errors';
import { spawnTransport, type EngineTransport } from './transport';
import { parseBestMove, parseInfoLine, type EngineAnalysis, type UciScore } from './uci';

export interface UciEngineOptions {
  /** Maximum wait for the handshake, in ms */
  startupTimeoutMs?: number;
  /** Maximum wait for one search, in ms */
  searchTimeoutMs?: number;
  /** Maximum wait for a clean exit after `quit`, in ms */
  quitTimeoutMs?: number;
}

const DEFAULT_OPTIONS: Required<UciEngineOptions> = {
  startupTimeoutMs: 10_000,
  searchTimeoutMs: 120_000,
  quitTimeoutMs: 1_000,
};

interface PendingRead {
  accept: (line: string) => boolean;
  resolve: () => void;
  reject: (error: Error) => void;
}

export class UciEngine {
  private readonly options: Required<UciEngineOptions>;
  private pending: PendingRead | null = null;
  private exitError: EngineError | null = null;
  private readonly exitWaiters: (() => void)[] = [];
  private quitting = false;
  /** Timed-out searches whose `bestmove` has not arrived yet */
  private staleSearches = 0;
  private queue: Promise<unknown> = Promise.resolve();

  private constructor(
    private readonly transport: EngineTransport,
    options: UciEngineOptions
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    transport.onLine((line) => this.handleLine(line));
    transport.onExit((error) => this.handleExit(error));
  }

  /**
   * Performs the UCI handshake over an existing transport.
   */
  static async start(transport: EngineTransport, options: UciEngineOptions = {}): Promise<UciEngine> {
    const engine = new UciEngine(transport, options);
    try {
      engine.send('uci');
      await engine.readUntil((line) => line.trim() === 'uciok', engine.options.startupTimeoutMs);
      engine.send('isready');
      await engine.readUntil((line) => line.trim() === 'readyok', engine.options.startupTimeoutMs);
    } catch (error) {
      transport.close();
      throw error;
    }
    return engine;
  }

  /**
   * Spawns the engine binary and performs the handshake.
   */
  static async launch(enginePath: string, options: UciEngineOptions = {}): Promise<UciEngine> {
    return UciEngine.start(spawnTransport(enginePath), options);
  }

  /**
   * Searches `fen` to a fixed depth with a single principal variation.
   *
   * @throws EngineError if the engine exits or times out
   */
  analyse(fen: string, depth: number): Promise<EngineAnalysis> {
    const run = this.queue.then(() => this.search(fen, depth));
    // The queue only orders searches; each caller still receives its own failure
    this.queue = run.catch(() => undefined);
    return run;
  }

  /**
   * Asks the engine to exit, terminating it if it does not within
   * `quitTimeoutMs`.
   */
  async quit(): Promise<void> {
    if (this.exitError) {
      return;
    }
    this.quitting = true;

    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.transport.close();
        resolve();
      }, this.options.quitTimeoutMs);
      this.exitWaiters.push(() => {
        clearTimeout(timer);
        resolve();
      });
      this.transport.send('quit');
    });
  }

  private async search(fen: string, depth: number): Promise<EngineAnalysis> {
    const collected: { score: UciScore | null; pv: string[]; bestmove: string | null } = {
      score: null,
      pv: [],
      bestmove: null,
    };

    this.send(`position fen ${fen}`);
    this.send(`go depth ${depth}`);

    try {
      await this.readUntil((line) => {
        const info = parseInfoLine(line);
        if (info && (info.multipv === null || info.multipv === 1)) {
          if (info.score) collected.score = info.score;
          if (info.pv.length > 0) collected.pv = info.pv;
          return false;
        }

        const best = parseBestMove(line);
        if (best) {
          collected.bestmove = best.move;
          return true;
        }
        return false;
      }, this.options.searchTimeoutMs);
    } catch (error) {
      if (!this.exitError) {
        // Timed out while the engine is still searching: stop it and skip
        // its output up to the abandoned search's bestmove
        this.staleSearches++;
        this.transport.send('stop');
      }
      throw error;
    }

    return {
      depth,
      score: collected.score,
      bestmove: collected.bestmove ?? collected.pv[0] ?? null,
      pv: collected.pv,
    };
  }

  private send(command: string): void {
    if (this.exitError) {
      throw this.exitError;
    }
    this.transport.send(command);
  }

  /**
   * Resolves once `accept` returns true for a line.
   */
  private readUntil(accept: (line: string) => boolean, timeoutMs: number): Promise<void> {
    if (this.exitError) {
      return Promise.reject(this.exitError);
    }

    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null;
        reject(new EngineError(`Engine did not respond within ${timeoutMs}ms`));
      }, timeoutMs);

      this.pending = {
        accept,
        resolve: () => {
          clearTimeout(timer);
          resolve();
        },
        reject: (error) => {
          clearTimeout(timer);
          reject(error);
        },
      };
    });
  }

  private handleLine(line: string): void {
    if (this.staleSearches > 0) {
      if (parseBestMove(line)) {
        this.staleSearches--;
      }
      return;
    }

    const pending = this.pending;
    if (pending && pending.accept(line)) {
      this.pending = null;
      pending.resolve();
    }
  }

  private handleExit(error: EngineError): void {
    this.exitError = error;
    if (!this.quitting) {
      console.error(`[Engine] ${error.message}`);
    }

    const pending = this.pending;
    this.pending = null;
    pending?.reject(error);

    for (const waiter of this.exitWaiters.splice(0)) {
      waiter();
    }
  }
}

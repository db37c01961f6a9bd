/**
 * Engine Session
 *
 * A long-lived engine shared by server requests: launched on first use,
 * reused afterwards, and dropped when it fails so the next request starts
 * a fresh process.
 */

import { parseFen } from '@/chess';
import type { EvaluationResult } from '@/core/models';
import { EngineError, EngineNotFoundError } from './errors';
import { evaluatePosition } from './evaluator';
import { resolveStockfishPath } from './resolve-path';
import { UciEngine } from './uci-engine';

export type EngineLauncher = () => Promise<UciEngine>;

/**
 * Evaluates positions when an engine is available.
 */
export interface PositionEvaluator {
  /**
   * @returns The evaluation, or null when the FEN is invalid or no engine
   *   can be run
   */
  tryEvaluate(fen: string, depth: number): Promise<EvaluationResult | null>;
  close(): Promise<void>;
}

export class EngineSession implements PositionEvaluator {
  private engine: Promise<UciEngine> | null = null;

  constructor(private readonly launch: EngineLauncher) {}

  /**
   * A session over the configured binary, or `stockfish` on PATH. The path
   * is resolved at first use.
   */
  static forPath(stockfishPath: string | undefined): EngineSession {
    return new EngineSession(async () => UciEngine.launch(resolveStockfishPath(stockfishPath)));
  }

  async get(): Promise<UciEngine> {
    if (this.engine) {
      return this.engine;
    }

    const launching = this.launch();
    this.engine = launching;
    try {
      return await launching;
    } catch (error) {
      this.engine = null;
      throw error;
    }
  }

  async tryEvaluate(fen: string, depth: number): Promise<EvaluationResult | null> {
    const normalized = parseFen(fen);
    if (normalized === null) {
      return null;
    }

    try {
      const engine = await this.get();
      return await evaluatePosition(engine, normalized, depth);
    } catch (error) {
      if (error instanceof EngineNotFoundError) {
        console.warn(`[Engine] ${error.message}`);
        return null;
      }
      if (error instanceof EngineError) {
        console.warn(`[Engine] Evaluation failed, restarting on next request: ${error.message}`);
        await this.close();
        return null;
      }
      throw error;
    }
  }

  async close(): Promise<void> {
    const current = this.engine;
    this.engine = null;
    if (!current) {
      return;
    }

    try {
      const engine = await current;
      await engine.quit();
    } catch (error) {
      if (!(error instanceof EngineError)) {
        throw error;
      }
    }
  }
}

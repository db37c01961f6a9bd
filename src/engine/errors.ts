/**
 * Engine Errors
 */

export class EngineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EngineError';
  }
}

/**
 * No Stockfish binary was configured or found on PATH.
 */
export class EngineNotFoundError extends EngineError {
  constructor(message: string) {
    super(message);
    this.name = 'EngineNotFoundError';
  }
}

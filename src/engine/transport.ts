/**
 * Engine Transport
 *
 * The line-oriented channel to a UCI engine. The default implementation
 * spawns the engine binary; tests substitute a scripted transport.
 */

import { spawn } from 'child_process';
import { createInterface } from 'readline';
import { EngineError, EngineNotFoundError } from './errors';

export interface EngineTransport {
  /** Writes one command line */
  send(command: string): void;
  /** Registers the handler for each line the engine prints */
  onLine(listener: (line: string) => void): void;
  /** Registers the handler called once when the engine goes away */
  onExit(listener: (error: EngineError) => void): void;
  /** Terminates the engine */
  close(): void;
}

/**
 * Spawns the engine at `enginePath` with piped stdio.
 */
export function spawnTransport(enginePath: string): EngineTransport {
  const child = spawn(enginePath, [], { stdio: ['pipe', 'pipe', 'pipe'] });
  const lines = createInterface({ input: child.stdout });

  let stderrData = '';
  child.stderr.on('data', (data: Buffer) => {
    stderrData += data.toString();
  });

  let exitListener: ((error: EngineError) => void) | null = null;
  let exited = false;
  const notifyExit = (error: EngineError): void => {
    if (exited) return;
    exited = true;
    exitListener?.(error);
  };

  // Usually EPIPE from a write racing the engine's exit
  child.stdin.on('error', (error) => {
    console.error(`[Engine] Write failed: ${error.message}`);
    notifyExit(new EngineError(`Engine write failed: ${error.message}`, { cause: error }));
  });

  child.once('error', (error) => {
    notifyExit(
      error.message.includes('ENOENT')
        ? new EngineNotFoundError(`Engine binary not found: ${enginePath}`)
        : new EngineError(`Failed to start engine: ${error.message}`, { cause: error })
    );
  });

  child.once('exit', (code, signal) => {
    const reason = signal ? `signal ${signal}` : `exit code ${code ?? 'unknown'}`;
    const detail = stderrData.trim() ? `\nstderr: ${stderrData.trim().slice(0, 500)}` : '';
    notifyExit(new EngineError(`Engine exited (${reason})${detail}`));
  });

  return {
    send(command) {
      child.stdin.write(`${command}\n`);
    },
    onLine(listener) {
      lines.on('line', listener);
    },
    onExit(listener) {
      exitListener = listener;
    },
    close() {
      lines.close();
      child.kill('SIGTERM');
    },
  };
}

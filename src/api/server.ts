/**
 * Opening Drill API Server
 *
 * Serves the Hono app on Node via @hono/node-server, with the database
 * migrated on start and one Stockfish process shared across requests.
 *
 * Usage:
 *   npm run server
 *
 * Environment Variables:
 *   PORT           - Preferred port (default: 3001); the next free one is used if taken
 *   HOST           - Interface to bind (default: 127.0.0.1)
 *   DATABASE_PATH  - SQLite file (default: data/opening-drill.db)
 *   STOCKFISH_PATH - Engine binary (default: `stockfish` on PATH)
 *
 * @example
 * ```bash
 * PORT=8080 npm run server
 * ```
 */

import { createServer } from 'net';
import { fileURLToPath } from 'url';
import { serve } from '@hono/node-server';
import { config, validateConfig } from '@/config';
import { EngineSession } from '@/engine';
import { closeDatabase, openDatabase } from '@/storage';
import { createApp } from './app';
import { createDependencies } from './dependencies';

const MAX_PORT_ATTEMPTS = 100;

/**
 * The first port from `preferredPort` upwards that can be bound.
 *
 * @throws Error if every port up to `maxPort` is taken
 */
export async function findAvailablePort(
  preferredPort: number,
  maxPort: number = preferredPort + MAX_PORT_ATTEMPTS
): Promise<number> {
  for (let port = preferredPort; port <= maxPort; port++) {
    const free = await new Promise<boolean>((resolve) => {
      const probe = createServer();
      probe.once('error', () => resolve(false));
      probe.listen(port, config.server.host, () => {
        probe.close(() => resolve(true));
      });
    });

    if (free) {
      return port;
    }
    console.log(`[Server] Port ${port} is in use, trying ${port + 1}...`);
  }

  throw new Error(`No available port found in range ${preferredPort}-${maxPort}`);
}

async function startServer(): Promise<void> {
  validateConfig();

  const db = openDatabase(config.database.path);
  const evaluator = EngineSession.forPath(config.engine.stockfishPath);
  const deps = createDependencies(db, {
    evaluator,
    defaults: { prefix: config.study.prefix, evalDepth: config.engine.learnDepth },
  });

  const port = await findAvailablePort(config.server.port);
  const server = serve({
    fetch: createApp(deps).fetch,
    port,
    hostname: config.server.host,
  });

  console.log('');
  console.log(`[Server] Opening Drill API on http://${config.server.host}:${port}`);
  console.log(`[Server] Environment: ${config.server.nodeEnv}`);
  console.log(`[Server] Database:    ${config.database.path}`);
  console.log(`[Server] Health:      http://${config.server.host}:${port}/health`);
  console.log('');

  const shutdown = (signal: string): void => {
    console.log(`\n[Server] Received ${signal}, shutting down...`);
    server.close();
    void evaluator
      .close()
      .catch((error: unknown) => console.error('[Server] Engine shutdown failed:', error))
      .finally(() => {
        closeDatabase(db);
        process.exit(0);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

const isMain = process.argv[1] !== undefined && fileURLToPath(import.meta.url) === process.argv[1];

if (isMain) {
  startServer().catch((error: unknown) => {
    console.error('[Server] Failed to start:', error);
    process.exit(1);
  });
}

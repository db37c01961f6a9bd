/**
 * Centralized Configuration Module
 *
 * Loads the application's configuration from environment variables once, at
 * module load, and validates it with zod.
 *
 * Usage:
 *   import { config, validateConfig } from './config';
 *
 *   console.log(config.server.port);
 *   console.log(config.database.path);
 *
 *   // Stricter checks before serving in production
 *   validateConfig();
 *
 * @module config
 */

import { existsSync } from 'fs';
import { z } from 'zod';

// =============================================================================
// Configuration Schema
// =============================================================================

/**
 * Environment variables arrive as strings; numeric fields are coerced and
 * range-checked here so the rest of the app only sees valid values.
 */
const configSchema = z.object({
  server: z.object({
    port: z.coerce.number().int().positive().default(3001),
    host: z.string().default('127.0.0.1'),
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  }),

  database: z.object({
    path: z.string().min(1).default('data/opening-drill.db'),
  }),

  engine: z.object({
    // Falls back to looking up `stockfish` on PATH
    stockfishPath: z.string().min(1).optional(),
    depth: z.coerce.number().int().min(1).max(99).default(14),
    learnDepth: z.coerce.number().int().min(1).max(30).default(10),
  }),

  study: z.object({
    // Name prefix the study commands filter on when --prefix is not given
    prefix: z.string().default(''),
    swingCp: z.coerce.number().int().min(10).max(2000).default(120),
  }),
});

export type Config = z.infer<typeof configSchema>;

// =============================================================================
// Environment Variable Loading
// =============================================================================

/**
 * Treats empty strings as unset so `PORT=` behaves like no PORT at all.
 */
function envValue(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Raw string values, grouped the way the schema expects them.
 */
function loadFromEnvironment(): Record<string, Record<string, string | undefined>> {
  return {
    server: {
      port: envValue('PORT'),
      host: envValue('HOST'),
      nodeEnv: envValue('NODE_ENV'),
    },
    database: {
      path: envValue('DATABASE_PATH'),
    },
    engine: {
      stockfishPath: envValue('STOCKFISH_PATH'),
      depth: envValue('ENGINE_DEPTH'),
      learnDepth: envValue('LEARN_DEPTH'),
    },
    study: {
      prefix: process.env.STUDY_PREFIX,
      swingCp: envValue('SWING_CP'),
    },
  };
}

// =============================================================================
// Configuration Validation
// =============================================================================

/**
 * Configuration validation error with detailed information about missing/invalid values.
 */
export class ConfigValidationError extends Error {
  public readonly missingVars: string[];
  public readonly invalidVars: { name: string; reason: string }[];

  constructor(
    message: string,
    missingVars: string[] = [],
    invalidVars: { name: string; reason: string }[] = []
  ) {
    super(message);
    this.name = 'ConfigValidationError';
    this.missingVars = missingVars;
    this.invalidVars = invalidVars;
  }
}

/**
 * Checks the settings a long-running server depends on.
 *
 * In production DATABASE_PATH must be set explicitly and must not be an
 * in-memory database. A configured STOCKFISH_PATH must point at an existing
 * file in every environment.
 *
 * @throws {ConfigValidationError} listing every problem found
 */
export function validateConfig(current: Config = config): void {
  const missingVars: string[] = [];
  const invalidVars: { name: string; reason: string }[] = [];

  if (current.server.nodeEnv === 'production') {
    if (envValue('DATABASE_PATH') === undefined) {
      missingVars.push('DATABASE_PATH');
    }
    if (current.database.path === ':memory:') {
      invalidVars.push({
        name: 'DATABASE_PATH',
        reason: 'An in-memory database loses every study card on restart',
      });
    }
  }

  if (current.engine.stockfishPath && !existsSync(current.engine.stockfishPath)) {
    invalidVars.push({
      name: 'STOCKFISH_PATH',
      reason: `No file at ${current.engine.stockfishPath}`,
    });
  }

  if (missingVars.length > 0 || invalidVars.length > 0) {
    const errorParts: string[] = [];

    if (missingVars.length > 0) {
      errorParts.push(`Missing required environment variables: ${missingVars.join(', ')}`);
    }

    if (invalidVars.length > 0) {
      const invalidDescriptions = invalidVars
        .map((v) => `${v.name}: ${v.reason}`)
        .join('; ');
      errorParts.push(`Invalid configuration: ${invalidDescriptions}`);
    }

    const fullMessage = [
      '╔═══════════════════════════════════════════════════════════════════════╗',
      '║  CONFIGURATION ERROR                                                  ║',
      '╠═══════════════════════════════════════════════════════════════════════╣',
      `║  ${errorParts.join('\n║  ')}`,
      '║                                                                       ║',
      '║  Please check your environment variables.                             ║',
      '╚═══════════════════════════════════════════════════════════════════════╝',
    ].join('\n');

    throw new ConfigValidationError(fullMessage, missingVars, invalidVars);
  }
}

// =============================================================================
// Configuration Export
// =============================================================================

const parseResult = configSchema.safeParse(loadFromEnvironment());

if (!parseResult.success) {
  console.error('Invalid configuration schema:');
  console.error(parseResult.error.format());
  process.exit(1);
}

/**
 * The validated, type-safe configuration object.
 *
 * @example
 * ```typescript
 * import { config } from './config';
 *
 * const db = createDatabase(config.database.path);
 * ```
 */
export const config: Config = parseResult.data;

export default config;

/**
 * Request Logger Middleware
 *
 * Logs each request's method, path, status and response time:
 *
 * ```
 * [API] GET /api/openings 200 - 4ms
 * [API] POST /api/openings/op_1f0c.../reviews 200 - 7ms
 * [API] POST /api/openings 409 - 3ms
 * ```
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.use('*', loggerMiddleware({ skipPaths: ['/health'] }));
 * ```
 */

import type { MiddlewareHandler } from 'hono';

export interface LoggerConfig {
  prefix: string;
  includeTimestamp: boolean;
  /** Path prefixes that are never logged */
  skipPaths: string[];
  /** ANSI colors for method, status and timing */
  colorize: boolean;
  /** Where finished lines go */
  write: (line: string) => void;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  prefix: '[API]',
  includeTimestamp: false,
  skipPaths: ['/health'],
  colorize: process.env.NODE_ENV !== 'production',
  write: (line) => console.log(line),
};

const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
  magenta: '\x1b[35m',
};

function statusColor(status: number): string {
  if (status >= 500) return colors.red;
  if (status >= 400) return colors.yellow;
  if (status >= 300) return colors.cyan;
  if (status >= 200) return colors.green;
  return colors.dim;
}

function methodColor(method: string): string {
  switch (method.toUpperCase()) {
    case 'GET':
      return colors.cyan;
    case 'POST':
      return colors.green;
    case 'PUT':
    case 'PATCH':
      return colors.yellow;
    case 'DELETE':
      return colors.red;
    default:
      return colors.magenta;
  }
}

/**
 * Milliseconds under one second, seconds with two decimals above.
 */
export function formatResponseTime(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(2)}s`;
}

export interface RequestLogEntry {
  method: string;
  path: string;
  status: number;
  responseTimeMs: number;
}

/**
 * Renders one request as a log line.
 *
 * @example
 * formatRequestLine({ method: 'GET', path: '/api/due', status: 200, responseTimeMs: 5 },
 *   { prefix: '[API]', colorize: false });
 * // '[API] GET /api/due 200 - 5ms'
 */
export function formatRequestLine(
  entry: RequestLogEntry,
  options: Pick<LoggerConfig, 'prefix' | 'colorize'>
): string {
  const time = formatResponseTime(entry.responseTimeMs);

  if (!options.colorize) {
    return `${options.prefix} ${entry.method} ${entry.path} ${entry.status} - ${time}`;
  }

  return [
    options.prefix,
    `${methodColor(entry.method)}${entry.method.padEnd(7)}${colors.reset}`,
    entry.path,
    `${statusColor(entry.status)}${entry.status}${colors.reset}`,
    '-',
    `${colors.dim}${time}${colors.reset}`,
  ].join(' ');
}

export function loggerMiddleware(config: Partial<LoggerConfig> = {}): MiddlewareHandler {
  const finalConfig: LoggerConfig = { ...DEFAULT_LOGGER_CONFIG, ...config };

  return async (c, next) => {
    const path = c.req.path;
    if (finalConfig.skipPaths.some((skip) => path.startsWith(skip))) {
      return next();
    }

    const startTime = performance.now();
    await next();

    let line = formatRequestLine(
      {
        method: c.req.method,
        path,
        status: c.res.status,
        responseTimeMs: Math.round(performance.now() - startTime),
      },
      finalConfig
    );

    if (finalConfig.includeTimestamp) {
      line = `[${new Date().toISOString()}] ${line}`;
    }

    finalConfig.write(line);
  };
}

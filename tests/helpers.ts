/**
 * Test Helpers Module
 *
 * Line fixtures and response helpers shared by the integration, API and
 * CLI tests.
 */

import type { OpeningLine } from '../src/core/models';
import type { TestRepositories } from './setup';

// ============================================================================
// Line Fixtures
// ============================================================================

/** Legal lines sharing `e4 e5 Nf3 Nc6`, so together they form a small tree */
export const LINES = {
  scotchMain: {
    name: 'Scotch Game - Main',
    moves: 'e4 e5 Nf3 Nc6 d4 exd4 Nxd4 Nf6',
  },
  scotchClassical: {
    name: 'Scotch Game - Classical',
    moves: 'e4 e5 Nf3 Nc6 d4 exd4 Nxd4 Bc5',
  },
  italian: {
    name: 'Italian Game',
    moves: 'e4 e5 Nf3 Nc6 Bc4 Bc5',
  },
} as const;

export type LineKey = keyof typeof LINES;

export async function createTestOpening(
  repos: Pick<TestRepositories, 'openings'>,
  key: LineKey
): Promise<OpeningLine> {
  const line = LINES[key];
  return repos.openings.create({ name: line.name, tokens: line.moves.split(' ') });
}

export async function createAllTestOpenings(
  repos: Pick<TestRepositories, 'openings'>
): Promise<Record<LineKey, OpeningLine>> {
  return {
    scotchMain: await createTestOpening(repos, 'scotchMain'),
    scotchClassical: await createTestOpening(repos, 'scotchClassical'),
    italian: await createTestOpening(repos, 'italian'),
  };
}

// ============================================================================
// Response Helpers
// ============================================================================

export interface JsonEnvelope {
  success: boolean;
  data?: unknown;
  error?: { code: string; message: string; details?: unknown };
}

/**
 * Parses a response body into the API envelope. `data` stays unknown; tests
 * assert on it with toEqual/toMatchObject.
 */
export async function getJsonResponse(response: Response): Promise<JsonEnvelope> {
  return response.json();
}

export function jsonRequest(method: string, body: unknown): RequestInit {
  return {
    method,
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}

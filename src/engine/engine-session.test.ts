import { afterEach, describe, it, expect, vi } from 'vitest';
import { START_FEN } from '@/chess';
import { EngineSession } from './engine-session';
import { EngineNotFoundError } from './errors';
import { UciEngine } from './uci-engine';
import { ScriptedTransport, engineAnswering } from '../../tests/fakes/scripted-transport';

function countingLauncher(search: string[]) {
  const transports: ScriptedTransport[] = [];
  const launch = async () => {
    const transport = new ScriptedTransport(engineAnswering(search));
    transports.push(transport);
    return UciEngine.start(transport);
  };
  return { launch, transports };
}

describe('EngineSession', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns null for an invalid FEN without launching an engine', async () => {
    const { launch, transports } = countingLauncher([]);
    const session = new EngineSession(launch);

    expect(await session.tryEvaluate('not a fen', 10)).toBeNull();
    expect(transports).toHaveLength(0);
  });

  it('launches once and reuses the engine', async () => {
    const { launch, transports } = countingLauncher([
      'info depth 8 score cp 25 pv e2e4 e7e5',
      'bestmove e2e4 ponder e7e5',
    ]);
    const session = new EngineSession(launch);

    const first = await session.tryEvaluate(START_FEN, 8);
    const second = await session.tryEvaluate(START_FEN, 8);

    expect(first).toEqual({
      depth: 8,
      scoreCp: 25,
      mateIn: null,
      bestmoveUci: 'e2e4',
      pvUci: 'e2e4 e7e5',
    });
    expect(second).toEqual(first);
    expect(transports).toHaveLength(1);
  });

  it('returns null when no engine binary is available and retries later', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    let attempts = 0;
    const session = new EngineSession(async () => {
      attempts += 1;
      throw new EngineNotFoundError('Stockfish binary not found');
    });

    expect(await session.tryEvaluate(START_FEN, 10)).toBeNull();
    expect(await session.tryEvaluate(START_FEN, 10)).toBeNull();
    expect(attempts).toBe(2);
  });

  it('sends quit on close', async () => {
    const { launch, transports } = countingLauncher(['bestmove e2e4']);
    const session = new EngineSession(launch);

    await session.tryEvaluate(START_FEN, 4);
    await session.close();

    expect(transports[0]?.sent.at(-1)).toBe('quit');
  });
});

import { describe, it, expect } from 'vitest';
import { applyMove, nextPly, parseFen, playLine, sideToMove, START_FEN } from './board';
import { validateLine } from './add-opening';
import { EmptyLineError, IllegalTokenError } from '@/core/errors';

describe('board', () => {
  it('plays SAN moves into new positions', () => {
    const afterE4 = applyMove(START_FEN, 'e4');
    expect(afterE4.split(' ').slice(0, 2)).toEqual([
      'rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR',
      'b',
    ]);
    expect(sideToMove(afterE4)).toBe('black');
  });

  it('counts plies from the FEN', () => {
    expect(nextPly(START_FEN)).toBe(1);
    expect(nextPly(applyMove(START_FEN, 'e4'))).toBe(2);
    expect(nextPly(playLine(['e4', 'e5']).fen)).toBe(3);
  });

  it('rejects an illegal token with its ply', () => {
    expect(() => playLine(['e4', 'e5', 'Ke3'])).toThrow(IllegalTokenError);
    try {
      playLine(['e4', 'e5', 'Ke3']);
    } catch (error) {
      expect(error).toBeInstanceOf(IllegalTokenError);
      if (error instanceof IllegalTokenError) {
        expect(error.token).toBe('Ke3');
        expect(error.ply).toBe(3);
        expect(error.message).toBe("Invalid SAN move 'Ke3' at ply 3.");
      }
    }
  });

  it('returns every intermediate position', () => {
    const line = playLine(['d4', 'd5']);
    expect(line.positions).toHaveLength(3);
    expect(line.positions[0]).toBe(START_FEN);
    expect(line.positions[2]).toBe(line.fen);
  });

  it('parses valid FEN and rejects garbage', () => {
    expect(parseFen(`  ${START_FEN} `)).toBe(START_FEN);
    expect(parseFen('not a position')).toBeNull();
  });
});

describe('validateLine', () => {
  it('returns the tokens of a legal line', () => {
    expect(validateLine(' e4  e5 Nf3 ')).toEqual(['e4', 'e5', 'Nf3']);
  });

  it('refuses an empty line', () => {
    expect(() => validateLine('   ')).toThrow(EmptyLineError);
  });
});

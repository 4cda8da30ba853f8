import { describe, it, expect } from 'vitest';

import { ChessPosition, IllegalMoveError, InvalidFenError } from '../index.js';

const STARTING_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';
const BACK_RANK_FEN = '6k1/p4ppp/8/8/8/8/5PPP/3R2K1 b - - 0 1';

describe('ChessPosition', () => {
  describe('construction', () => {
    it('creates a position from FEN', () => {
      const pos = ChessPosition.fromFen(BACK_RANK_FEN);
      expect(pos.fen()).toBe(BACK_RANK_FEN);
      expect(pos.turn()).toBe('b');
      expect(pos.moveNumber()).toBe(1);
    });

    it('throws InvalidFenError for invalid FEN', () => {
      expect(() => new ChessPosition('invalid')).toThrow(InvalidFenError);
      expect(() => ChessPosition.fromFen('invalid')).toThrow('Invalid FEN: invalid');
    });
  });

  describe('UCI moves', () => {
    it('checks legality of UCI moves', () => {
      const pos = ChessPosition.fromFen(STARTING_FEN);
      expect(pos.isLegalUci('e2e4')).toBe(true);
      expect(pos.isLegalUci('e2e5')).toBe(false);
      expect(pos.isLegalUci('e2')).toBe(false);
    });

    it('plays a move and reports SAN and both FENs', () => {
      const pos = ChessPosition.fromFen(STARTING_FEN);
      const result = pos.playUci('g1f3');

      expect(result.san).toBe('Nf3');
      expect(result.fenBefore).toBe(STARTING_FEN);
      expect(result.fenAfter).toBe('rnbqkbnr/pppppppp/8/8/8/5N2/PPPPPPPP/RNBQKB1R b KQkq - 1 1');
      expect(pos.turn()).toBe('b');
    });

    it('adds the mate suffix', () => {
      const pos = ChessPosition.fromFen(BACK_RANK_FEN);
      pos.playUci('a7a6');
      expect(pos.playUci('d1d8').san).toBe('Rd8#');
      expect(pos.turn()).toBe('b');
    });

    it('requires the promotion piece', () => {
      const pos = ChessPosition.fromFen('8/P7/8/8/8/8/8/k6K w - - 0 1');
      expect(pos.isLegalUci('a7a8')).toBe(false);
      expect(pos.playUci('a7a8n').san).toBe('a8=N');
    });

    it('throws IllegalMoveError for an illegal move', () => {
      const pos = ChessPosition.fromFen(BACK_RANK_FEN);
      pos.playUci('a7a6');
      try {
        pos.playUci('d1h5');
        expect.unreachable('move should be rejected');
      } catch (error) {
        expect(error).toBeInstanceOf(IllegalMoveError);
        if (error instanceof IllegalMoveError) {
          expect(error.move).toBe('d1h5');
          expect(error.fen).toBe('6k1/5ppp/p7/8/8/8/5PPP/3R2K1 w - - 0 2');
        }
      }
    });
  });
});

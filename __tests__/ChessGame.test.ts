/**
 * ChessGame and notation tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ChessGame, parseUci, stripMoveNumber } from '../src/chess/ChessGame.js';
import {
  asciiBoard,
  boardToUnicode,
  evalBarFill,
  formatRelativeScore,
  formatWhiteScore,
  pgnToFen,
  pvToSan,
  thermometer,
  toVariants,
  toWhitePov,
} from '../src/chess/notation.js';
import { STARTING_FEN } from '../src/chess/types.js';
import { IllegalMoveError } from '../src/core/errors.js';

// =============================================================================
// Move Input
// =============================================================================

describe('parseUci', () => {
  it('should split a plain move', () => {
    expect(parseUci('e2e4')).toEqual({ from: 'e2', to: 'e4', promotion: undefined });
  });

  it('should read a promotion piece case-insensitively', () => {
    expect(parseUci('E7E8Q')).toEqual({ from: 'e7', to: 'e8', promotion: 'q' });
  });

  it('should reject SAN and junk', () => {
    expect(parseUci('e4')).toBeNull();
    expect(parseUci('Nf3')).toBeNull();
    expect(parseUci('e2e9')).toBeNull();
  });
});

describe('stripMoveNumber', () => {
  it('should drop white and black move numbers', () => {
    expect(stripMoveNumber('1. e4')).toBe('e4');
    expect(stripMoveNumber('3... Nf6')).toBe('Nf6');
  });

  it('should leave plain moves alone', () => {
    expect(stripMoveNumber('  Nf3 ')).toBe('Nf3');
  });
});

describe('ChessGame', () => {
  let game: ChessGame;

  beforeEach(() => {
    game = new ChessGame();
  });

  it('should play SAN, UCI and numbered input', () => {
    expect(game.playText('e4').uci).toBe('e2e4');
    expect(game.playText('e7e5').san).toBe('e5');
    expect(game.playText('2. Nf3').uci).toBe('g1f3');
    expect(game.historySan()).toEqual(['e4', 'e5', 'Nf3']);
    expect(game.historyUci()).toEqual(['e2e4', 'e7e5', 'g1f3']);
  });

  it('should flag a well-formed but illegal UCI move as parsed', () => {
    try {
      game.parseMove('e2e5');
      expect.fail('expected an IllegalMoveError');
    } catch (err) {
      expect(err).toBeInstanceOf(IllegalMoveError);
      expect(err instanceof IllegalMoveError && err.parsed).toBe(true);
      expect(err instanceof Error && err.message).toBe('Illegal move: e2e5');
    }
  });

  it('should report unreadable input as not parsed', () => {
    expect(() => game.parseMove('hello')).toThrow('Cannot parse move: hello');
  });

  it('should not change the position when parsing', () => {
    game.parseMove('e4');
    expect(game.fen()).toBe(STARTING_FEN);
  });

  it('should track the last SAN per side for the header', () => {
    expect(game.lastSan('w')).toBe('-');
    game.playText('e4');
    game.playText('c5');
    game.playText('Nf3');
    expect(game.lastSan('w')).toBe('Nf3');
    expect(game.lastSan('b')).toBe('c5');
    expect(game.moveNumber()).toBe(2);
  });

  it('should detect checkmate and the winner', () => {
    for (const move of ['f3', 'e5', 'g4', 'Qh4#']) game.playText(move);
    expect(game.isGameOver()).toBe(true);
    expect(game.result()).toBe('0-1');
    expect(game.getGameResult()).toEqual({ winner: 'b', reason: 'checkmate', score: '0-1' });
  });

  it('should detect stalemate as a draw', () => {
    game.load('k7/8/1Q6/8/8/8/8/7K b - - 0 1');
    expect(game.result()).toBe('1/2-1/2');
    expect(game.getGameResult()?.reason).toBe('stalemate');
  });

  it('should promote to a queen from a board selection', () => {
    game.load('8/P7/8/8/8/8/8/k6K w - - 0 1');
    const move = game.moveFromSquares('a7', 'a8');
    expect(move?.promotion).toBe('q');
    expect(move?.uci).toBe('a7a8q');
  });

  it('should list legal targets and check UCI legality', () => {
    expect(game.legalTargets('g1')).toEqual(new Set(['f3', 'h3']));
    expect(game.isLegalUci('g1f3')).toBe(true);
    expect(game.isLegalUci('g1g3')).toBe(false);
    expect(game.isLegalUci('nonsense')).toBe(false);
  });

  it('should pick random moves among the legal ones', () => {
    const move = game.randomLegalMove(() => 0.999);
    expect(move).not.toBeNull();
    expect(game.isLegalUci(move?.uci ?? '')).toBe(true);
  });

  it('should count pieces', () => {
    expect(game.pieceCount()).toBe(32);
    game.load('8/8/8/4k3/8/8/4K3/4R3 w - - 0 1');
    expect(game.pieceCount()).toBe(3);
  });

  it('should snapshot the state', () => {
    game.playText('e4');
    const state = game.getState();
    expect(state.turn).toBe('b');
    expect(state.history).toEqual(['e4']);
    expect(state.historyUci).toEqual(['e2e4']);
    expect(state.lastMove?.san).toBe('e4');
    expect(state.isGameOver).toBe(false);
    expect(state.result).toBeNull();
  });

  it('should undo and reset', () => {
    game.playText('d4');
    expect(game.undo()?.san).toBe('d4');
    expect(game.lastMove()).toBeNull();
    game.playText('d4');
    game.reset();
    expect(game.fen()).toBe(STARTING_FEN);
    expect(game.historySan()).toEqual([]);
  });

  it('should refuse a broken FEN', () => {
    expect(game.load('not a fen')).toBe(false);
    expect(game.fen()).toBe(STARTING_FEN);
  });

  it('should load a PGN and keep its moves', () => {
    expect(game.loadPgn('1. e4 e5 2. Nf3 Nc6')).toBe(true);
    expect(game.historyUci()).toEqual(['e2e4', 'e7e5', 'g1f3', 'b8c6']);
  });
});

// =============================================================================
// Notation
// =============================================================================

describe('notation', () => {
  const AFTER_E4 = 'rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq - 0 1';

  it('should render the board in Unicode, rank 8 first', () => {
    const lines = boardToUnicode(STARTING_FEN).split('\n');
    expect(lines).toHaveLength(8);
    expect(lines[0]).toBe('♜ ♞ ♝ ♛ ♚ ♝ ♞ ♜');
    expect(lines[2]).toBe('. . . . . . . .');
    expect(lines[7]).toBe('♖ ♘ ♗ ♕ ♔ ♗ ♘ ♖');
  });

  it('should frame the ASCII board with coordinates', () => {
    const lines = asciiBoard(STARTING_FEN).split('\n');
    expect(lines[0]).toBe('    a   b   c   d   e   f   g   h');
    expect(lines[1]).toBe('  +---+---+---+---+---+---+---+---+');
    expect(lines[2]).toBe('8 | r | n | b | q | k | b | n | r | 8');
    expect(lines[8]).toBe('5 | . | . | . | . | . | . | . | . | 5');
  });

  it('should centre the thermometer at zero and pin it at the range', () => {
    expect(thermometer(0)).toBe('[-------█-------]');
    expect(thermometer(300)).toBe('[--------------█]');
    expect(thermometer(-1000)).toBe('[█--------------]');
    expect(thermometer(150)).toBe('[-----------█---]');
  });

  it('should place the thermometer marker symmetrically around zero', () => {
    expect(thermometer(-150)).toBe('[---█-----------]');
    expect(thermometer(1, 2, 11)).toBe('[-------█---]');
    expect(thermometer(-1, 2, 11)).toBe('[---█-------]');
  });

  it('should fill the evaluation bar from -1 to +1 pawn', () => {
    expect(evalBarFill(0, 10)).toBe(5);
    expect(evalBarFill(50, 10)).toBe(8);
    expect(evalBarFill(100, 10)).toBe(10);
    expect(evalBarFill(-250, 10)).toBe(0);
  });

  it('should flip scores for black to move', () => {
    expect(toWhitePov({ kind: 'cp', value: 35 }, 'b')).toEqual({ kind: 'cp', value: -35 });
    expect(toWhitePov({ kind: 'mate', value: 2 }, 'w')).toEqual({ kind: 'mate', value: 2 });
  });

  it('should format scores', () => {
    expect(formatWhiteScore({ kind: 'cp', value: 35 })).toBe('+0.35');
    expect(formatWhiteScore({ kind: 'cp', value: -120 })).toBe('-1.20');
    expect(formatWhiteScore({ kind: 'cp', value: 0 })).toBe('+0.00');
    expect(formatWhiteScore({ kind: 'mate', value: 3 })).toBe('Mate in 3');
    expect(formatRelativeScore({ kind: 'cp', value: 35 })).toBe('cp 35');
    expect(formatRelativeScore({ kind: 'mate', value: -2 })).toBe('Mate in -2');
  });

  it('should convert a PV to SAN and stop at the first bad move', () => {
    expect(pvToSan(STARTING_FEN, ['e2e4', 'e7e5', 'g1f3'])).toBe('e4 e5 Nf3');
    expect(pvToSan(STARTING_FEN, ['e2e4', 'e2e4', 'g1f3'])).toBe('e4 ???');
  });

  it('should build White-view variants', () => {
    const variants = toVariants(AFTER_E4, [
      { multipv: 1, depth: 10, score: { kind: 'cp', value: 50 }, pv: ['e7e5', 'g1f3'] },
      { multipv: 2, depth: 10, score: { kind: 'mate', value: 4 }, pv: ['c7c5'] },
    ]);
    expect(variants).toEqual([
      { cp: -50, scoreText: '-0.50', line: 'e5 Nf3' },
      { cp: 0, scoreText: 'Mate in -4', line: 'c5' },
    ]);
  });

  it('should find the final position of a PGN', () => {
    expect(pgnToFen('1. e4 e5 2. Nf3')).toBe('rnbqkbnr/pppp1ppp/8/4p3/4P3/5N2/PPPP1PPP/RNBQKB1R b KQkq - 1 2');
  });
});

/**
 * Notation and display helpers
 *
 * Text renderings shared by the analysis terminal, the hub screens and the
 * state logger: Unicode and ASCII boards, score strings, the evaluation
 * thermometer and PV conversion to SAN.
 */

import { Chess } from 'chess.js';
import { parseUci } from './ChessGame.js';
import { FILES, PIECE_UNICODE } from './types.js';
import type { AnalysisLine, AnalysisVariant, Color, Score } from './types.js';

/**
 * Parse the placement field of a FEN into rows, rank 8 first.
 * Each cell is a FEN piece symbol or null.
 */
export function fenToRows(fen: string): (string | null)[][] {
  const placement = fen.split(' ')[0];
  return placement.split('/').map(row => {
    const cells: (string | null)[] = [];
    for (const c of row) {
      if (/\d/.test(c)) {
        for (let i = 0; i < parseInt(c, 10); i++) cells.push(null);
      } else {
        cells.push(c);
      }
    }
    return cells;
  });
}

/**
 * 8 lines of Unicode pieces, rank 8 first, empty squares as "."
 */
export function boardToUnicode(fen: string): string {
  return fenToRows(fen)
    .map(row => row.map(cell => (cell ? PIECE_UNICODE[cell] ?? '?' : '.')).join(' ').trimEnd())
    .join('\n');
}

/**
 * Framed ASCII board with coordinates, for the state file
 */
export function asciiBoard(fen: string): string {
  const rows = fenToRows(fen);
  const border = '  +---+---+---+---+---+---+---+---+\n';
  const files = `    ${FILES.join('   ')}\n`;
  let out = files + border;
  rows.forEach((row, i) => {
    const rank = 8 - i;
    out += `${rank} |${row.map(cell => ` ${cell ?? '.'} |`).join('')} ${rank}\n`;
    out += border;
  });
  return out + files;
}

/** Round to the nearest integer, halves to the even neighbour */
function roundHalfEven(x: number): number {
  const rounded = Math.round(x);
  return Math.abs(x % 1) === 0.5 && rounded % 2 !== 0 ? rounded - 1 : rounded;
}

/**
 * ASCII evaluation thermometer: a single marker on a dashed bar,
 * centred for 0 and pinned to the ends at ±range centipawns.
 * The marker offset rounds halves to even, so the bar is symmetric.
 */
export function thermometer(cp: number, range: number = 300, length: number = 15): string {
  const clamped = Math.max(-range, Math.min(cp, range));
  const center = Math.floor(length / 2);
  const marker = center + roundHalfEven((clamped / range) * center);
  let bar = '';
  for (let i = 0; i < length; i++) {
    bar += i === marker ? '█' : '-';
  }
  return `[${bar}]`;
}

/**
 * Number of filled cells in a vertical evaluation bar of `height` cells.
 * The score is read in pawns and clamped to [-1, 1].
 */
export function evalBarFill(cp: number, height: number): number {
  const pawns = Math.max(-1, Math.min(cp / 100, 1));
  return Math.round(((pawns + 1) / 2) * height);
}

/**
 * Flip a side-to-move score to White's point of view
 */
export function toWhitePov(score: Score, turn: Color): Score {
  if (turn === 'w' || score.value === 0) return score;
  return { kind: score.kind, value: -score.value };
}

/** "Mate in 3", "+0.35", "-1.20" */
export function formatWhiteScore(score: Score): string {
  if (score.kind === 'mate') return `Mate in ${score.value}`;
  const sign = score.value >= 0 ? '+' : '';
  return `${sign}${(score.value / 100).toFixed(2)}`;
}

/** "Mate in 3", "cp 35" */
export function formatRelativeScore(score: Score): string {
  return score.kind === 'mate' ? `Mate in ${score.value}` : `cp ${score.value}`;
}

/**
 * Convert a UCI principal variation to SAN. The first move that does not
 * parse is shown as "???" and ends the line.
 */
export function pvToSan(fen: string, pv: string[], maxLength: number = 60): string {
  const board = new Chess(fen);
  const moves: string[] = [];
  for (const uci of pv) {
    const parsed = parseUci(uci);
    try {
      if (!parsed) throw new Error(uci);
      moves.push(board.move(parsed).san);
    } catch {
      moves.push('???');
      break;
    }
  }
  return moves.join(' ').slice(0, maxLength);
}

/**
 * Display rows for a multi-PV result, scores from White's view.
 * Mate scores carry cp 0.
 */
export function toVariants(fen: string, lines: AnalysisLine[]): AnalysisVariant[] {
  const turn: Color = fen.split(' ')[1] === 'b' ? 'b' : 'w';
  return lines.map(line => {
    const white = toWhitePov(line.score, turn);
    return {
      cp: white.kind === 'mate' ? 0 : white.value,
      scoreText: formatWhiteScore(white),
      line: pvToSan(fen, line.pv),
    };
  });
}

/**
 * Final position of a PGN mainline
 * @throws Error when the PGN does not parse
 */
export function pgnToFen(pgn: string): string {
  const board = new Chess();
  board.loadPgn(pgn);
  return board.fen();
}

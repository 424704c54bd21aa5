/**
 * Chess Module Type Definitions
 *
 * Typed views over chess.js conventions, plus the engine score and
 * analysis shapes shared by both front-ends.
 */

// =============================================================================
// Core Chess Types
// =============================================================================

/** Chess piece colors */
export type Color = 'w' | 'b';

/** Chess piece types (lowercase) */
export type PieceType = 'p' | 'n' | 'b' | 'r' | 'q' | 'k';

/** Square notation (a1-h8) */
export type Square =
  | 'a1' | 'a2' | 'a3' | 'a4' | 'a5' | 'a6' | 'a7' | 'a8'
  | 'b1' | 'b2' | 'b3' | 'b4' | 'b5' | 'b6' | 'b7' | 'b8'
  | 'c1' | 'c2' | 'c3' | 'c4' | 'c5' | 'c6' | 'c7' | 'c8'
  | 'd1' | 'd2' | 'd3' | 'd4' | 'd5' | 'd6' | 'd7' | 'd8'
  | 'e1' | 'e2' | 'e3' | 'e4' | 'e5' | 'e6' | 'e7' | 'e8'
  | 'f1' | 'f2' | 'f3' | 'f4' | 'f5' | 'f6' | 'f7' | 'f8'
  | 'g1' | 'g2' | 'g3' | 'g4' | 'g5' | 'g6' | 'g7' | 'g8'
  | 'h1' | 'h2' | 'h3' | 'h4' | 'h5' | 'h6' | 'h7' | 'h8';

/** A piece on the board */
export interface Piece {
  type: PieceType;
  color: Color;
}

/** Input format for making moves */
export interface MoveInput {
  from: Square;
  to: Square;
  promotion?: PieceType;
}

/** Full move information (from chess.js verbose mode) */
export interface Move {
  /** Source square */
  from: Square;
  /** Target square */
  to: Square;
  /** Standard Algebraic Notation (e.g., "Nf3", "O-O") */
  san: string;
  /** UCI / long algebraic notation (e.g., "g1f3", "e7e8q") */
  uci: string;
  /** Piece type that moved */
  piece: PieceType;
  /** Piece type captured (if any) */
  captured?: PieceType;
  /** Piece type promoted to (if pawn promotion) */
  promotion?: PieceType;
  /** FEN before the move */
  before: string;
  /** FEN after the move */
  after: string;
  /** Color of the player who made the move */
  color: Color;
}

// =============================================================================
// Game State
// =============================================================================

/** Game termination reasons */
export type GameEndReason =
  | 'checkmate'
  | 'stalemate'
  | 'insufficient_material'
  | 'threefold_repetition'
  | 'fifty_move_rule'
  | 'resignation'
  | 'abandonment';

/** Final score string, or "*" while the game runs */
export type ResultString = '1-0' | '0-1' | '1/2-1/2' | '*';

/** Game result */
export interface GameResult {
  /** Winner color (null for draw) */
  winner: Color | null;
  /** Reason for game end */
  reason: GameEndReason;
  /** Final score string */
  score: Exclude<ResultString, '*'>;
}

/** Snapshot of a game for rendering and state logging */
export interface ChessState {
  fen: string;
  turn: Color;
  moveNumber: number;
  isCheck: boolean;
  isCheckmate: boolean;
  isStalemate: boolean;
  isDraw: boolean;
  isGameOver: boolean;
  result: GameResult | null;
  lastMove: Move | null;
  /** Moves in SAN */
  history: string[];
  /** Moves in UCI */
  historyUci: string[];
}

// =============================================================================
// Engine Scores
// =============================================================================

/**
 * Engine score. Relative to the side to move unless produced by
 * `toWhitePov`.
 */
export type Score =
  | { kind: 'cp'; value: number }
  | { kind: 'mate'; value: number };

/** One principal variation of a multi-PV search */
export interface AnalysisLine {
  /** 1-based multipv index */
  multipv: number;
  depth: number;
  score: Score;
  /** Moves in UCI */
  pv: string[];
  nodes?: number;
  timeMs?: number;
}

/** Display-ready variant: centipawns from White's view (0 for mates) */
export interface AnalysisVariant {
  cp: number;
  scoreText: string;
  line: string;
}

// =============================================================================
// Constants
// =============================================================================

/** Standard starting position */
export const STARTING_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

/** Unicode chess pieces, keyed by FEN symbol */
export const PIECE_UNICODE: Record<string, string> = {
  K: '♔', Q: '♕', R: '♖', B: '♗', N: '♘', P: '♙',
  k: '♚', q: '♛', r: '♜', b: '♝', n: '♞', p: '♟',
};

/** Files a-h */
export const FILES = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'] as const;

/** Ranks 1-8 */
export const RANKS = ['1', '2', '3', '4', '5', '6', '7', '8'] as const;

/** Narrow a string to a board square */
export function isSquare(value: string): value is Square {
  return /^[a-h][1-8]$/.test(value);
}

/** Narrow a string to a piece type */
export function isPieceType(value: string): value is PieceType {
  return value === 'p' || value === 'n' || value === 'b' || value === 'r' || value === 'q' || value === 'k';
}

/** The other side */
export function opposite(color: Color): Color {
  return color === 'w' ? 'b' : 'w';
}

/**
 * ChessGame - Game state wrapper around chess.js
 *
 * Owns the single mutable position both front-ends render. All legality,
 * check and result logic comes from chess.js; this class adds move parsing
 * from user text, the header data the terminal shows, and typed snapshots.
 */

import { Chess, type Move as ChessJsMove } from 'chess.js';
import { IllegalMoveError } from '../core/errors.js';
import { countPieces } from './Tablebase.js';
import { STARTING_FEN, isPieceType, isSquare } from './types.js';
import type {
  ChessState,
  Color,
  GameEndReason,
  GameResult,
  Move,
  MoveInput,
  Piece,
  ResultString,
  Square,
} from './types.js';

const UCI_MOVE = /^([a-h][1-8])([a-h][1-8])([qrbn])?$/;

/**
 * Split a UCI move ("e2e4", "e7e8q") into its parts
 */
export function parseUci(text: string): MoveInput | null {
  const match = UCI_MOVE.exec(text.trim().toLowerCase());
  if (!match) return null;
  const [, from, to, promotion] = match;
  if (!isSquare(from) || !isSquare(to)) return null;
  return {
    from,
    to,
    promotion: promotion && isPieceType(promotion) ? promotion : undefined,
  };
}

/**
 * Drop move numbering from user input: "1. e4" -> "e4", "3... Nf6" -> "Nf6"
 */
export function stripMoveNumber(input: string): string {
  const text = input.trim();
  if (!text.includes('.')) return text;
  const tokens = text.split(/\s+/);
  return tokens.length > 0 ? tokens[tokens.length - 1] : text;
}

export class ChessGame {
  private chess: Chess;
  private moveHistory: Move[] = [];

  constructor(initialFen: string = STARTING_FEN) {
    this.chess = new Chess(initialFen);
  }

  // ===========================================================================
  // Move Input
  // ===========================================================================

  /**
   * Resolve user text to a legal move without playing it.
   * UCI is tried first, then SAN.
   * @throws IllegalMoveError
   */
  parseMove(input: string): Move {
    const text = stripMoveNumber(input);
    if (!text) throw new IllegalMoveError(input);

    const uci = parseUci(text);
    if (uci) {
      const legal = this.findLegal(uci);
      if (!legal) throw new IllegalMoveError(text, true);
      return legal;
    }

    const probe = new Chess(this.chess.fen());
    try {
      return convertMove(probe.move(text));
    } catch {
      throw new IllegalMoveError(text);
    }
  }

  /**
   * Play a move. Accepts the result of parseMove or from/to squares.
   * @throws IllegalMoveError
   */
  play(move: MoveInput | Move): Move {
    let result: ChessJsMove;
    try {
      result = this.chess.move({ from: move.from, to: move.to, promotion: move.promotion });
    } catch {
      throw new IllegalMoveError(`${move.from}${move.to}${move.promotion ?? ''}`, true);
    }
    const fullMove = convertMove(result);
    this.moveHistory.push(fullMove);
    return fullMove;
  }

  /**
   * Play a move given in UCI notation
   * @throws IllegalMoveError
   */
  playUci(uci: string): Move {
    const parsed = parseUci(uci);
    if (!parsed) throw new IllegalMoveError(uci);
    const legal = this.findLegal(parsed);
    if (!legal) throw new IllegalMoveError(uci, true);
    return this.play(legal);
  }

  /**
   * Parse and play user text in one step
   * @throws IllegalMoveError
   */
  playText(input: string): Move {
    return this.play(this.parseMove(input));
  }

  /** Whether a UCI move is legal in the current position */
  isLegalUci(uci: string): boolean {
    const parsed = parseUci(uci);
    return parsed !== null && this.findLegal(parsed) !== null;
  }

  /**
   * The move a board selection produces. Pawns reaching the last rank
   * promote to a queen.
   */
  moveFromSquares(from: Square, to: Square): Move | null {
    const candidates = this.legalMoves().filter(m => m.from === from && m.to === to);
    if (candidates.length === 0) return null;
    return candidates.find(m => m.promotion === 'q') ?? candidates[0];
  }

  /** Squares the piece on `from` can move to */
  legalTargets(from: Square): Set<Square> {
    return new Set(this.legalMoves().filter(m => m.from === from).map(m => m.to));
  }

  /** All legal moves in the current position */
  legalMoves(): Move[] {
    return this.chess.moves({ verbose: true }).map(convertMove);
  }

  /** A uniformly chosen legal move, or null when there is none */
  randomLegalMove(random: () => number = Math.random): Move | null {
    const moves = this.legalMoves();
    if (moves.length === 0) return null;
    return moves[Math.floor(random() * moves.length) % moves.length];
  }

  undo(): Move | null {
    const result = this.chess.undo();
    if (!result) return null;
    this.moveHistory.pop();
    return convertMove(result);
  }

  /**
   * Reset to the starting position or the given FEN
   */
  reset(fen: string = STARTING_FEN): void {
    this.chess.load(fen);
    this.moveHistory = [];
  }

  /**
   * Load a position from FEN
   * @returns true if valid FEN, false otherwise
   */
  load(fen: string): boolean {
    try {
      this.chess.load(fen);
      this.moveHistory = [];
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Load a game from PGN, leaving the board on its final position
   * @returns true if valid PGN, false otherwise
   */
  loadPgn(pgn: string): boolean {
    try {
      this.chess.loadPgn(pgn);
    } catch {
      return false;
    }
    this.moveHistory = this.chess.history({ verbose: true }).map(convertMove);
    return true;
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  fen(): string {
    return this.chess.fen();
  }

  pgn(): string {
    return this.chess.pgn();
  }

  turn(): Color {
    return this.chess.turn();
  }

  /** Full move number ("[Move: N]" in the terminal header) */
  moveNumber(): number {
    return this.chess.moveNumber();
  }

  isCheck(): boolean {
    return this.chess.isCheck();
  }

  isGameOver(): boolean {
    return this.chess.isGameOver();
  }

  pieceAt(square: Square): Piece | null {
    const piece = this.chess.get(square);
    return piece ? { type: piece.type, color: piece.color } : null;
  }

  /** Number of pieces on the board, kings included */
  pieceCount(): number {
    return countPieces(this.chess.fen());
  }

  /** SAN of the last move played by `color`, "-" before any */
  lastSan(color: Color): string {
    for (let i = this.moveHistory.length - 1; i >= 0; i--) {
      if (this.moveHistory[i].color === color) return this.moveHistory[i].san;
    }
    return '-';
  }

  lastMove(): Move | null {
    return this.moveHistory.length > 0 ? this.moveHistory[this.moveHistory.length - 1] : null;
  }

  historySan(): string[] {
    return this.moveHistory.map(m => m.san);
  }

  historyUci(): string[] {
    return this.moveHistory.map(m => m.uci);
  }

  /** "*" while the game runs */
  result(): ResultString {
    return this.getGameResult()?.score ?? '*';
  }

  getGameResult(): GameResult | null {
    if (!this.chess.isGameOver()) return null;

    if (this.chess.isCheckmate()) {
      const winner: Color = this.chess.turn() === 'w' ? 'b' : 'w';
      return { winner, reason: 'checkmate', score: winner === 'w' ? '1-0' : '0-1' };
    }

    let reason: GameEndReason = 'stalemate';
    if (this.chess.isInsufficientMaterial()) reason = 'insufficient_material';
    else if (this.chess.isThreefoldRepetition()) reason = 'threefold_repetition';
    else if (this.halfMoveClock() >= 100) reason = 'fifty_move_rule';

    return { winner: null, reason, score: '1/2-1/2' };
  }

  getState(): ChessState {
    return {
      fen: this.fen(),
      turn: this.turn(),
      moveNumber: this.moveNumber(),
      isCheck: this.chess.isCheck(),
      isCheckmate: this.chess.isCheckmate(),
      isStalemate: this.chess.isStalemate(),
      isDraw: this.chess.isDraw(),
      isGameOver: this.chess.isGameOver(),
      result: this.getGameResult(),
      lastMove: this.lastMove(),
      history: this.historySan(),
      historyUci: this.historyUci(),
    };
  }

  private halfMoveClock(): number {
    return parseInt(this.chess.fen().split(' ')[4] ?? '0', 10);
  }

  private findLegal(input: MoveInput): Move | null {
    return this.legalMoves().find(m =>
      m.from === input.from && m.to === input.to && m.promotion === input.promotion
    ) ?? null;
  }
}

function convertMove(m: ChessJsMove): Move {
  return {
    from: m.from,
    to: m.to,
    san: m.san,
    uci: m.lan,
    piece: m.piece,
    captured: m.captured,
    promotion: m.promotion,
    before: m.before,
    after: m.after,
    color: m.color,
  };
}

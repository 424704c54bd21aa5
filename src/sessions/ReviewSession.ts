/**
 * ReviewSession - step through a finished game with engine analysis
 */

import fs from 'node:fs';
import { EventEmitter } from 'node:events';
import { Chess } from 'chess.js';
import { toVariants } from '../chess/notation.js';
import type { AnalysisVariant } from '../chess/types.js';
import { KibitzError, describeError } from '../core/errors.js';
import type { ChessEngine } from '../engine/UciEngine.js';

export interface ReviewPosition {
  fen: string;
  /** Move that led here, null for the initial position */
  san: string | null;
  uci: string | null;
  /** Ply count from the start of the game */
  ply: number;
}

export interface ReviewSessionOptions {
  engine: ChessEngine | null;
  analysisTimeMs?: number;
  multiPv?: number;
}

/**
 * Every position of a PGN mainline, initial position first
 * @throws KibitzError when the PGN does not parse
 */
export function positionsFromPgn(pgn: string): { positions: ReviewPosition[]; headers: Record<string, string> } {
  const board = new Chess();
  try {
    board.loadPgn(pgn);
  } catch (err) {
    throw new KibitzError(`Cannot read PGN: ${describeError(err)}`, { cause: err });
  }

  const moves = board.history({ verbose: true });
  const first = moves[0];
  const positions: ReviewPosition[] = [{ fen: first ? first.before : board.fen(), san: null, uci: null, ply: 0 }];
  moves.forEach((move, i) => {
    positions.push({ fen: move.after, san: move.san, uci: move.lan, ply: i + 1 });
  });
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(board.header())) {
    if (typeof value === 'string') headers[key] = value;
  }
  return { positions, headers };
}

export class ReviewSession extends EventEmitter {
  readonly positions: ReviewPosition[];
  readonly headers: Record<string, string>;
  variants: AnalysisVariant[] = [];
  status = '';

  private index = 0;
  private readonly engine: ChessEngine | null;
  private readonly analysisTimeMs: number;
  private readonly multiPv: number;

  constructor(pgn: string, options: ReviewSessionOptions) {
    super();
    const parsed = positionsFromPgn(pgn);
    this.positions = parsed.positions;
    this.headers = parsed.headers;
    this.engine = options.engine;
    this.analysisTimeMs = options.analysisTimeMs ?? 1000;
    this.multiPv = options.multiPv ?? 3;
    if (!this.engine) this.status = 'No engine: analysis unavailable';
  }

  /**
   * @throws KibitzError when the file cannot be read or parsed
   */
  static fromFile(file: string, options: ReviewSessionOptions): ReviewSession {
    let pgn: string;
    try {
      pgn = fs.readFileSync(file, 'utf-8');
    } catch (err) {
      throw new KibitzError(`Cannot open ${file}: ${describeError(err)}`, { cause: err });
    }
    return new ReviewSession(pgn, options);
  }

  get current(): ReviewPosition {
    return this.positions[this.index];
  }

  get currentIndex(): number {
    return this.index;
  }

  /** "White vs Black (result)" from the PGN headers */
  title(): string {
    const white = this.headers.White ?? '?';
    const black = this.headers.Black ?? '?';
    const result = this.headers.Result ?? '*';
    return `${white} vs ${black} (${result})`;
  }

  /** SAN moves with the current one in brackets */
  moveText(): string {
    return this.positions
      .slice(1)
      .map((p, i) => {
        const prefix = i % 2 === 0 ? `${i / 2 + 1}. ` : '';
        const san = p.san ?? '';
        return i + 1 === this.index ? `${prefix}[${san}]` : `${prefix}${san}`;
      })
      .join(' ');
  }

  goTo(index: number): void {
    const clamped = Math.max(0, Math.min(index, this.positions.length - 1));
    if (clamped === this.index) return;
    this.index = clamped;
    this.variants = [];
    this.emit('change');
  }

  next(): void {
    this.goTo(this.index + 1);
  }

  prev(): void {
    this.goTo(this.index - 1);
  }

  first(): void {
    this.goTo(0);
  }

  last(): void {
    this.goTo(this.positions.length - 1);
  }

  /**
   * Multi-PV analysis of the current position. A result for a position the
   * user has already left is dropped.
   */
  async analyse(): Promise<void> {
    const engine = this.engine;
    if (!engine) return;
    const fen = this.current.fen;
    try {
      const lines = await engine.analyse(fen, { movetimeMs: this.analysisTimeMs }, this.multiPv);
      if (this.current.fen !== fen) return;
      this.variants = toVariants(fen, lines);
      this.status = '';
    } catch (err) {
      this.status = `Analysis error: ${describeError(err)}`;
    }
    this.emit('change');
  }
}

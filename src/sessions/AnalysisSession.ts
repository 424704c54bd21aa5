/**
 * AnalysisSession - text-input game with continuous engine analysis
 *
 * The human types moves for their side; the engine answers for the other
 * side at a fixed depth. Between moves the screen polls `runAnalysis` for a
 * short multi-PV search whose best line drives the thermometer. Emits
 * 'change' whenever something on screen changed.
 */

import { EventEmitter } from 'node:events';
import { ChessGame } from '../chess/ChessGame.js';
import { thermometer, toVariants } from '../chess/notation.js';
import type { TablebaseProbe } from '../chess/Tablebase.js';
import type { AnalysisVariant, Color } from '../chess/types.js';
import { IllegalMoveError, describeError } from '../core/errors.js';
import type { ChessEngine } from '../engine/UciEngine.js';

export interface AnalysisSessionOptions {
  engine: ChessEngine | null;
  tablebase?: TablebaseProbe | null;
  humanColor?: Color;
  /** Depth of the engine's replies (default: 10) */
  engineDepth?: number;
  /** Budget of one analysis (default: 300) */
  analysisTimeMs?: number;
  /** Lines per analysis (default: 3) */
  multiPv?: number;
}

export type SubmitResult = 'exit' | 'played' | 'rejected';

export class AnalysisSession extends EventEmitter {
  readonly game = new ChessGame();
  readonly humanColor: Color;

  /** One-line status under the board */
  status = '';
  /** Latest tablebase verdict or error */
  tablebaseStatus = '';
  variants: AnalysisVariant[] = [];
  engineThinking = false;

  private engine: ChessEngine | null;
  private tablebase: TablebaseProbe | null;
  private readonly engineDepth: number;
  private readonly analysisTimeMs: number;
  private readonly multiPv: number;
  private analysing = false;

  constructor(options: AnalysisSessionOptions) {
    super();
    this.engine = options.engine;
    this.tablebase = options.tablebase ?? null;
    this.humanColor = options.humanColor ?? 'w';
    this.engineDepth = options.engineDepth ?? 10;
    this.analysisTimeMs = options.analysisTimeMs ?? 300;
    this.multiPv = options.multiPv ?? 3;
  }

  get hasEngine(): boolean {
    return this.engine !== null;
  }

  /** "[Move: 3]  White: Nf3 | Black: Nc6" */
  header(): string {
    return `[Move: ${this.game.moveNumber()}]  White: ${this.game.lastSan('w')} | Black: ${this.game.lastSan('b')}`;
  }

  /** "+0.35 [-------█-------]", or "---" before the first analysis */
  bestEval(): string {
    const best = this.variants[0];
    return best ? `${best.scoreText} ${thermometer(best.cp)}` : '---';
  }

  isEngineTurn(): boolean {
    return this.engine !== null && !this.game.isGameOver() && this.game.turn() !== this.humanColor;
  }

  /**
   * Handle one submitted input line. "exit" ends the session; anything
   * else is a move for the human's side, or for either side without an engine.
   */
  async submit(input: string): Promise<SubmitResult> {
    if (input.trim().toLowerCase() === 'exit') return 'exit';
    if (this.game.isGameOver()) return 'rejected';
    if (this.engineThinking || this.isEngineTurn()) {
      this.status = 'Engine is thinking...';
      this.changed();
      return 'rejected';
    }

    try {
      this.game.playText(input);
    } catch (err) {
      if (err instanceof IllegalMoveError && err.parsed) {
        this.status = 'Illegal move.';
      } else {
        this.status = `Move error: ${describeError(err)}`;
      }
      this.changed();
      return 'rejected';
    }

    this.status = '';
    this.variants = [];
    this.changed();
    await this.checkTablebase();
    return 'played';
  }

  /**
   * Let the engine move when it is its turn
   */
  async engineMove(): Promise<void> {
    const engine = this.engine;
    if (!engine || !this.isEngineTurn() || this.engineThinking) return;

    this.engineThinking = true;
    this.changed();
    try {
      const uci = await engine.play(this.game.fen(), { depth: this.engineDepth });
      if (uci === null) {
        this.status = 'Engine error: no move returned';
      } else {
        const move = this.game.playUci(uci);
        this.status = `Engine move: ${move.san}`;
        this.variants = [];
      }
    } catch (err) {
      this.status = `Engine error: ${describeError(err)}`;
    } finally {
      this.engineThinking = false;
      this.changed();
    }
    await this.checkTablebase();
  }

  /**
   * One short multi-PV analysis of the current position. Results for a
   * position that changed meanwhile are dropped.
   */
  async runAnalysis(): Promise<void> {
    const engine = this.engine;
    if (!engine || this.analysing || this.engineThinking || this.game.isGameOver()) return;

    const fen = this.game.fen();
    this.analysing = true;
    try {
      const lines = await engine.analyse(fen, { movetimeMs: this.analysisTimeMs }, this.multiPv);
      if (this.game.fen() === fen) {
        this.variants = toVariants(fen, lines);
      }
    } catch (err) {
      this.status = `Analysis error: ${describeError(err)}`;
    } finally {
      this.analysing = false;
      this.changed();
    }
  }

  /**
   * Probe the tablebase for small positions
   */
  async checkTablebase(): Promise<void> {
    const tablebase = this.tablebase;
    if (!tablebase?.enabled) return;
    const fen = this.game.fen();
    if (!tablebase.covers(fen)) return;

    try {
      const wdl = await tablebase.probeWdl(fen);
      this.tablebaseStatus = wdl === null ? '(Syzygy) WDL = unknown' : `(Syzygy) WDL = ${wdl}`;
    } catch (err) {
      this.tablebaseStatus = `Syzygy error: ${describeError(err)}`;
    }
    this.changed();
  }

  /** Line shown once the game has ended */
  endMessage(): string {
    return `Game over. Result: ${this.game.result()}`;
  }

  /** Report a failed engine start; play continues without one */
  engineUnavailable(reason: string): void {
    this.engine = null;
    this.status = `Engine could not start: ${reason}`;
    this.changed();
  }

  private changed(): void {
    this.emit('change');
  }
}

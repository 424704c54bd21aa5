/**
 * EngineMatch - hub game against the UCI engine
 *
 * The human picks squares on the board; the engine answers at a fixed
 * depth, falling back to a random legal move when it has none to give.
 * Emits 'change' on every visible update and 'finished' (result) once.
 */

import { EventEmitter } from 'node:events';
import { setTimeout as delay } from 'node:timers/promises';
import { ChessGame } from '../chess/ChessGame.js';
import { formatRelativeScore } from '../chess/notation.js';
import type { Color, Move, ResultString, Square } from '../chess/types.js';
import { describeError } from '../core/errors.js';
import type { ChessEngine } from '../engine/UciEngine.js';
import { BoardSelection } from './BoardSelection.js';

export interface EngineMatchOptions {
  engine: ChessEngine | null;
  humanColor?: Color;
  /** Engine reply depth (default: 15) */
  depth?: number;
  /** Budget of the evaluation shown beside the board (default: 300) */
  evalTimeMs?: number;
  /** Pause before the engine replies (default: 500) */
  replyDelayMs?: number;
  random?: () => number;
}

/** Centipawns standing in for a mate on the evaluation bar */
const MATE_CP = 10000;

export class EngineMatch extends EventEmitter {
  readonly game = new ChessGame();
  readonly humanColor: Color;
  readonly selection: BoardSelection;

  message = '';
  evalText = '';
  /** Side-to-move evaluation for the bar, null when unknown */
  evalCp: number | null = null;
  engineThinking = false;

  private engine: ChessEngine | null;
  private readonly depth: number;
  private readonly evalTimeMs: number;
  private readonly replyDelayMs: number;
  private readonly random: () => number;
  private finished = false;
  private evaluating = false;

  constructor(options: EngineMatchOptions) {
    super();
    this.engine = options.engine;
    this.humanColor = options.humanColor ?? 'w';
    this.depth = options.depth ?? 15;
    this.evalTimeMs = options.evalTimeMs ?? 300;
    this.replyDelayMs = options.replyDelayMs ?? 500;
    this.random = options.random ?? Math.random;
    this.selection = new BoardSelection(this.game);
    this.evalText = this.engine ? '' : 'No engine';
  }

  isHumanTurn(): boolean {
    return !this.game.isGameOver() && this.game.turn() === this.humanColor;
  }

  /** Moves played so far, in UCI */
  moveList(): string {
    return this.game.historyUci().join(' ');
  }

  result(): ResultString {
    return this.game.result();
  }

  /**
   * Board pick by the human
   * @returns the move played, if the pick completed one
   */
  pick(square: Square): Move | null {
    if (!this.isHumanTurn()) return null;

    const outcome = this.selection.pick(square, this.humanColor);
    switch (outcome.kind) {
      case 'move': {
        const move = this.game.play(outcome.move);
        this.message = '';
        this.afterMove();
        return move;
      }
      case 'invalid':
        this.message = 'Invalid move! Try again.';
        break;
      case 'selected':
      case 'deselected':
        this.message = '';
        break;
      case 'ignored':
        break;
    }
    this.changed();
    return null;
  }

  /**
   * Engine's turn: ask for a move, or play a random legal one when the
   * engine is missing, fails, or answers with an illegal move.
   */
  async engineReply(): Promise<Move | null> {
    if (this.engineThinking || this.game.isGameOver() || this.game.turn() === this.humanColor) {
      return null;
    }

    this.engineThinking = true;
    this.changed();
    const fen = this.game.fen();
    let uci: string | null = null;
    try {
      if (this.replyDelayMs > 0) await delay(this.replyDelayMs);
      if (this.engine) {
        uci = await this.engine.play(fen, { depth: this.depth });
      }
    } catch (err) {
      this.message = `Engine error: ${describeError(err)}`;
      console.error('[EngineMatch] Engine move failed:', describeError(err));
    } finally {
      this.engineThinking = false;
    }

    if (this.game.fen() !== fen) return null;

    let move: Move | null = null;
    if (uci !== null && this.game.isLegalUci(uci)) {
      move = this.game.playUci(uci);
    } else {
      const fallback = this.game.randomLegalMove(this.random);
      if (fallback) move = this.game.play(fallback);
    }
    this.afterMove();
    return move;
  }

  /**
   * Evaluation of the current position from the side to move's view
   */
  async refreshEvaluation(): Promise<void> {
    const engine = this.engine;
    if (!engine) {
      this.evalText = 'No engine';
      this.evalCp = null;
      this.changed();
      return;
    }
    if (this.evaluating || this.engineThinking) return;

    const fen = this.game.fen();
    this.evaluating = true;
    try {
      const [best] = await engine.analyse(fen, { movetimeMs: this.evalTimeMs }, 1);
      if (this.game.fen() !== fen) return;
      if (best) {
        this.evalText = formatRelativeScore(best.score);
        this.evalCp = best.score.kind === 'cp' ? best.score.value : Math.sign(best.score.value) * MATE_CP;
      }
    } catch (err) {
      this.evalText = `Analysis error: ${describeError(err)}`;
      this.evalCp = null;
    } finally {
      this.evaluating = false;
      this.changed();
    }
  }

  /** Start over from the initial position */
  restart(): void {
    this.game.reset();
    this.selection.clear();
    this.finished = false;
    this.message = '';
    this.evalCp = null;
    this.changed();
  }

  private afterMove(): void {
    if (this.game.isGameOver() && !this.finished) {
      this.finished = true;
      this.message = `Game over: ${this.game.result()}`;
      this.emit('finished', this.game.result());
    }
    this.changed();
  }

  private changed(): void {
    this.emit('change');
  }
}

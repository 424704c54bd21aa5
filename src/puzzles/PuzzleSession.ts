/**
 * PuzzleSession - plays one puzzle against its scripted solution
 *
 * The solver's moves must match the solution move for move; each correct
 * move is answered by the next solution move for the other side.
 */

import { ChessGame } from '../chess/ChessGame.js';
import type { Color, Move, MoveInput } from '../chess/types.js';
import type { Puzzle } from './PuzzleService.js';

export type PuzzleStatus = 'playing' | 'solved' | 'broken';

export type PuzzleMoveResult =
  | { kind: 'incorrect'; expected: string; message: string }
  | { kind: 'correct'; move: Move; reply: Move; message: string }
  | { kind: 'solved'; move: Move; message: string }
  | { kind: 'broken'; move: Move; reply: string; message: string }
  | { kind: 'finished'; message: string };

export class PuzzleSession {
  readonly game: ChessGame;
  /** Side the user plays */
  readonly solver: Color;
  /** Incorrect moves tried so far */
  mistakes = 0;
  private index = 0;
  private currentStatus: PuzzleStatus = 'playing';

  constructor(readonly puzzle: Puzzle) {
    this.game = new ChessGame(puzzle.fen);
    this.solver = this.game.turn();
  }

  get status(): PuzzleStatus {
    return this.currentStatus;
  }

  /** Solution moves played so far, both sides */
  get progress(): number {
    return this.index;
  }

  /** Next expected move in UCI, null once finished */
  expectedMove(): string | null {
    return this.currentStatus === 'playing' ? this.puzzle.solution[this.index] ?? null : null;
  }

  /**
   * Check a move against the solution. A wrong move leaves the board
   * unchanged.
   */
  tryMove(input: MoveInput | Move): PuzzleMoveResult {
    const expected = this.expectedMove();
    if (expected === null) {
      return { kind: 'finished', message: 'Puzzle already finished.' };
    }

    if (!this.game.isLegalUci(expected)) {
      this.currentStatus = 'broken';
      return { kind: 'finished', message: `Illegal solution move in puzzle: ${expected}` };
    }

    const uci = `${input.from}${input.to}${input.promotion ?? ''}`;
    if (uci !== expected.toLowerCase()) {
      this.mistakes++;
      return { kind: 'incorrect', expected, message: `Incorrect move! Expected: ${expected}` };
    }

    const move = this.game.playUci(expected);
    this.index++;

    const replyUci = this.puzzle.solution[this.index];
    if (replyUci === undefined) {
      this.currentStatus = 'solved';
      return { kind: 'solved', move, message: 'Puzzle solved! Congratulations!' };
    }

    if (!this.game.isLegalUci(replyUci)) {
      this.currentStatus = 'broken';
      return { kind: 'broken', move, reply: replyUci, message: `Illegal opponent move in puzzle: ${replyUci}` };
    }
    const reply = this.game.playUci(replyUci);
    this.index++;

    if (this.index >= this.puzzle.solution.length) {
      this.currentStatus = 'solved';
      return { kind: 'solved', move, message: 'Puzzle solved! Congratulations!' };
    }
    return { kind: 'correct', move, reply, message: `Correct! Opponent played ${reply.san}.` };
  }
}

import type { ChessGame } from '../chess/ChessGame.js';
import type { Color, Move, Square } from '../chess/types.js';

export type SelectionOutcome =
  | { kind: 'selected'; square: Square }
  | { kind: 'deselected' }
  | { kind: 'ignored' }
  | { kind: 'move'; move: Move }
  | { kind: 'invalid'; from: Square; to: Square };

/**
 * Two-step square selection on a board: the first pick chooses one of the
 * player's pieces, the second picks the target. The move is returned, not
 * played.
 */
export class BoardSelection {
  private current: Square | null = null;

  constructor(private readonly game: ChessGame) {}

  get selected(): Square | null {
    return this.current;
  }

  /** Squares the selected piece can reach */
  targets(): Set<Square> {
    return this.current ? this.game.legalTargets(this.current) : new Set();
  }

  pick(square: Square, color: Color): SelectionOutcome {
    const piece = this.game.pieceAt(square);
    const from = this.current;

    if (from === null) {
      if (piece?.color !== color) return { kind: 'ignored' };
      this.current = square;
      return { kind: 'selected', square };
    }

    if (square === from) {
      this.current = null;
      return { kind: 'deselected' };
    }

    const move = this.game.moveFromSquares(from, square);
    if (move) {
      this.current = null;
      return { kind: 'move', move };
    }

    // Another own piece: switch the selection
    if (piece?.color === color && this.game.legalTargets(square).size > 0) {
      this.current = square;
      return { kind: 'selected', square };
    }

    this.current = null;
    return { kind: 'invalid', from, to: square };
  }

  clear(): void {
    this.current = null;
  }
}

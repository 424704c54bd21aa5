import { useEffect, useState } from 'react';
import type { EventEmitter } from 'node:events';
import { useInput } from 'ink';
import type { Square } from '../chess/types.js';
import { FILES, isSquare } from '../chess/types.js';

/**
 * Re-render whenever `emitter` emits 'change'. Sessions hold their own
 * state; the returned counter only tells React something moved.
 */
export function useChangeVersion(emitter: EventEmitter): number {
  const [version, setVersion] = useState(0);
  useEffect(() => {
    const onChange = () => setVersion(v => v + 1);
    emitter.on('change', onChange);
    return () => {
      emitter.off('change', onChange);
    };
  }, [emitter]);
  return version;
}

/** Board row (0 = rank 8) and column (0 = file a) to a square */
export function coordsToSquare(row: number, col: number): Square | null {
  const text = `${FILES[col] ?? ''}${8 - row}`;
  return isSquare(text) ? text : null;
}

export interface BoardCursor {
  row: number;
  col: number;
  square: Square | null;
}

/**
 * Arrow-key cursor over the board. Enter calls `onPick` with the square
 * under the cursor. On a flipped board the arrows follow the screen.
 */
export function useBoardCursor(options: {
  flipped: boolean;
  active: boolean;
  onPick: (square: Square) => void;
  initialRow?: number;
}): BoardCursor {
  const [row, setRow] = useState(options.initialRow ?? 6);
  const [col, setCol] = useState(4);
  const dir = options.flipped ? -1 : 1;
  const clamp = (n: number) => Math.max(0, Math.min(7, n));

  useInput((_input, key) => {
    if (key.upArrow) setRow(r => clamp(r - dir));
    if (key.downArrow) setRow(r => clamp(r + dir));
    if (key.leftArrow) setCol(c => clamp(c - dir));
    if (key.rightArrow) setCol(c => clamp(c + dir));
    if (key.return) {
      const square = coordsToSquare(row, col);
      if (square) options.onPick(square);
    }
  }, { isActive: options.active });

  return { row, col, square: coordsToSquare(row, col) };
}

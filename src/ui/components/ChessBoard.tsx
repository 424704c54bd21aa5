/**
 * ChessBoard - coloured terminal board
 *
 * Each rank is one chalk-styled string, so cells stay aligned whatever
 * width the terminal gives the piece glyphs.
 */

import React from 'react';
import { Box, Text } from 'ink';
import chalk from 'chalk';
import { fenToRows } from '../../chess/notation.js';
import type { Move, Square } from '../../chess/types.js';
import { FILES } from '../../chess/types.js';
import { coordsToSquare } from '../hooks.js';

// White pieces outlined, black pieces filled
const DISPLAY_PIECES: Record<string, string> = {
  R: '♖', N: '♘', B: '♗', Q: '♕', K: '♔', P: '♙',
  r: '♜', n: '♞', b: '♝', q: '♛', k: '♚', p: '♟',
};

type SquareColor = 'light' | 'dark' | 'cursor' | 'selected' | 'target' | 'lastMove';

const BACKGROUNDS: Record<SquareColor, (s: string) => string> = {
  light: chalk.bgWhite,
  dark: chalk.bgGray,
  cursor: chalk.bgGreen,
  selected: chalk.bgYellow,
  target: chalk.bgCyan,
  lastMove: chalk.bgBlue,
};

export interface ChessBoardProps {
  fen: string;
  /** Black at the bottom */
  flipped?: boolean;
  /** Cursor position, omitted when the board takes no input */
  cursor?: { row: number; col: number } | null;
  selected?: Square | null;
  targets?: Set<Square>;
  lastMove?: Pick<Move, 'from' | 'to'> | null;
}

export function ChessBoard({
  fen,
  flipped = false,
  cursor = null,
  selected = null,
  targets = new Set(),
  lastMove = null,
}: ChessBoardProps) {
  const board = fenToRows(fen);
  const order = flipped ? [7, 6, 5, 4, 3, 2, 1, 0] : [0, 1, 2, 3, 4, 5, 6, 7];

  // Highlight priority: cursor > selected > target > last move > base
  const squareColor = (row: number, col: number): SquareColor => {
    const sq = coordsToSquare(row, col);
    if (cursor && cursor.row === row && cursor.col === col) return 'cursor';
    if (sq && sq === selected) return 'selected';
    if (sq && selected && targets.has(sq)) return 'target';
    if (sq && lastMove && (lastMove.from === sq || lastMove.to === sq)) return 'lastMove';
    return (row + col) % 2 === 0 ? 'light' : 'dark';
  };

  const buildRow = (row: number): string => {
    const rank = 8 - row;
    let out = chalk.cyan.bold(` ${rank} `);
    for (const col of order) {
      const piece = board[row]?.[col] ?? null;
      const color = squareColor(row, col);
      let content: string;
      if (piece) {
        content = DISPLAY_PIECES[piece] ?? '?';
      } else if (color === 'cursor') {
        content = '+';
      } else if (color === 'target') {
        content = '.';
      } else {
        content = ' ';
      }
      const fg = piece
        ? (piece === piece.toUpperCase() ? chalk.blueBright : chalk.red)
        : (color === 'light' ? chalk.gray : chalk.whiteBright);
      out += BACKGROUNDS[color](fg(` ${content} `));
    }
    return out + chalk.cyan.bold(` ${rank}`);
  };

  const fileLabels = chalk.cyan('   ' + order.map(col => ` ${FILES[col]} `).join(''));

  return (
    <Box flexDirection="column">
      <Text>{fileLabels}</Text>
      {order.map(row => (
        <Text key={row}>{buildRow(row)}</Text>
      ))}
      <Text>{fileLabels}</Text>
    </Box>
  );
}

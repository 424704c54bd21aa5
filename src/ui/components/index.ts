/**
 * UI Components - reusable Ink components for the kibitz screens
 */

export { ChessBoard, type ChessBoardProps } from './ChessBoard.js';
export { EvalBar } from './EvalBar.js';
export { Menu, type MenuItem } from './Menu.js';

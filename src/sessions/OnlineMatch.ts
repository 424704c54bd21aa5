/**
 * OnlineMatch - one game against a remote opponent
 *
 * Local picks become MOVE lines; OPPONENT_MOVE lines are applied when it
 * is the opponent's turn and the move is legal. Both arrive on the same
 * event loop, so the board never sees two writers at once.
 */

import { EventEmitter } from 'node:events';
import { ChessGame } from '../chess/ChessGame.js';
import type { Color, Move, Square } from '../chess/types.js';
import { opposite } from '../chess/types.js';
import { describeError } from '../core/errors.js';
import type { GameOverMessage, MatchInfo } from '../online/OnlineClient.js';
import { BoardSelection } from './BoardSelection.js';

/** The part of OnlineClient a match uses */
export interface MatchConnection {
  sendMove(opponent: string, uci: string): void;
  reportGameOver(opponent: string, result: string): void;
  on(event: 'opponentMove', listener: (uci: string) => void): this;
  on(event: 'gameOver', listener: (message: GameOverMessage) => void): this;
  on(event: 'disconnected', listener: () => void): this;
  off(event: 'opponentMove', listener: (uci: string) => void): this;
  off(event: 'gameOver', listener: (message: GameOverMessage) => void): this;
  off(event: 'disconnected', listener: () => void): this;
}

export class OnlineMatch extends EventEmitter {
  readonly game = new ChessGame();
  readonly color: Color;
  readonly opponent: string;
  readonly selection: BoardSelection;

  message = '';
  over = false;
  /** Final result once over: "1-0", "0-1", "1/2-1/2", or what the server sent */
  result: string | null = null;

  private attached = false;
  private readonly onOpponentMove = (uci: string) => this.applyOpponentMove(uci);
  private readonly onGameOver = (message: GameOverMessage) => this.endByServer(message.result);
  private readonly onDisconnected = () => this.endByServer('*', 'Connection lost');

  constructor(private readonly connection: MatchConnection, match: MatchInfo) {
    super();
    this.color = match.color;
    this.opponent = match.opponent;
    this.selection = new BoardSelection(this.game);
    this.message = match.color === 'w' ? 'You play White. Your move.' : `You play Black. Waiting for ${match.opponent}...`;
  }

  /** Start listening to the connection */
  start(): void {
    if (this.attached) return;
    this.connection.on('opponentMove', this.onOpponentMove);
    this.connection.on('gameOver', this.onGameOver);
    this.connection.on('disconnected', this.onDisconnected);
    this.attached = true;
  }

  /** Stop listening to the connection */
  stop(): void {
    if (!this.attached) return;
    this.connection.off('opponentMove', this.onOpponentMove);
    this.connection.off('gameOver', this.onGameOver);
    this.connection.off('disconnected', this.onDisconnected);
    this.attached = false;
  }

  isMyTurn(): boolean {
    return !this.over && this.game.turn() === this.color;
  }

  /**
   * Board pick by the local player
   * @returns the move sent, if the pick completed one
   */
  pick(square: Square): Move | null {
    if (!this.isMyTurn()) return null;

    const outcome = this.selection.pick(square, this.color);
    if (outcome.kind === 'invalid') {
      this.message = 'Invalid move! Try again.';
    }
    if (outcome.kind !== 'move') {
      this.changed();
      return null;
    }

    const move = this.game.play(outcome.move);
    try {
      this.connection.sendMove(this.opponent, move.uci);
      this.message = `Waiting for ${this.opponent}...`;
    } catch (err) {
      this.message = `Cannot send move: ${describeError(err)}`;
    }
    this.checkEnd();
    this.changed();
    return move;
  }

  /**
   * Apply a move received from the server
   */
  applyOpponentMove(uci: string): boolean {
    if (this.over) return false;
    if (this.game.turn() === this.color) {
      console.log(`[OnlineMatch] Ignoring opponent move ${uci} on our turn`);
      return false;
    }
    if (!this.game.isLegalUci(uci)) {
      console.log(`[OnlineMatch] Ignoring illegal opponent move ${uci}`);
      this.message = `Opponent sent an illegal move: ${uci}`;
      this.changed();
      return false;
    }

    const move = this.game.playUci(uci);
    this.message = `${this.opponent} played ${move.san}. Your move.`;
    this.checkEnd();
    this.changed();
    return true;
  }

  /** Give up the game */
  resign(): void {
    if (this.over) return;
    const result = opposite(this.color) === 'w' ? '1-0' : '0-1';
    this.finish(result, 'You resigned.');
    this.report(result);
  }

  private checkEnd(): void {
    if (this.over || !this.game.isGameOver()) return;
    const result = this.game.result();
    this.finish(result, `Game over: ${result}`);
    this.report(result);
  }

  private endByServer(result: string, reason?: string): void {
    if (this.over) return;
    this.finish(result, reason ? `${reason}. Game over.` : `Game over: ${result}`);
    this.changed();
  }

  private finish(result: string, message: string): void {
    this.over = true;
    this.result = result;
    this.message = message;
    this.selection.clear();
    this.emit('finished', result);
  }

  private report(result: string): void {
    try {
      this.connection.reportGameOver(this.opponent, result);
    } catch (err) {
      console.error('[OnlineMatch] Cannot report result:', describeError(err));
    }
    this.changed();
  }

  private changed(): void {
    this.emit('change');
  }
}

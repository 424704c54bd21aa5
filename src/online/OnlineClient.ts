/**
 * OnlineClient - TCP client for the online play server
 *
 * Speaks the line protocol in ./protocol.ts over a plain socket. Requests
 * that expect an answer (login, match search) return promises with
 * timeouts; everything the server pushes on its own arrives as events on
 * the Node event loop:
 *
 *   'opponentMove'  (uci: string)
 *   'gameOver'      (message: { player, opponent, result })
 *   'unknown'       (line: string)
 *   'disconnected'  ()
 *   'error'         (err: ProtocolError)
 */

import net from 'node:net';
import { EventEmitter } from 'node:events';
import { ProtocolError, describeError } from '../core/errors.js';
import type { Color } from '../chess/types.js';
import { DEFAULT_SERVER_PORT, LineBuffer, decodeMessage, encodeMessage } from './protocol.js';
import type { ClientMessage, ServerMessage } from './protocol.js';

export interface OnlineClientOptions {
  /** Server host (default: localhost) */
  host?: string;
  /** Server port (default: 5555) */
  port?: number;
  /** Time allowed to establish the connection (default: 5000) */
  connectTimeoutMs?: number;
  /** Time allowed for a login reply (default: 5000) */
  replyTimeoutMs?: number;
  /** Time allowed to find an opponent (default: 60000) */
  matchTimeoutMs?: number;
}

/**
 * Connection state enum
 */
export enum ConnectionState {
  DISCONNECTED = 'disconnected',
  CONNECTING = 'connecting',
  CONNECTED = 'connected',
}

export interface MatchInfo {
  color: Color;
  opponent: string;
}

export type GameOverMessage = Extract<ServerMessage, { type: 'GAME_OVER' }>;

interface Pending<T> {
  resolve: (value: T) => void;
  reject: (reason: Error) => void;
  timeout: NodeJS.Timeout;
}

export class OnlineClient extends EventEmitter {
  private socket: net.Socket | null = null;
  private lines = new LineBuffer();
  private connectionState: ConnectionState = ConnectionState.DISCONNECTED;
  private pendingReply: Pending<string> | null = null;
  private pendingMatch: Pending<MatchInfo> | null = null;

  private readonly host: string;
  private readonly port: number;
  private readonly connectTimeoutMs: number;
  private readonly replyTimeoutMs: number;
  private readonly matchTimeoutMs: number;

  /** Name accepted by the last successful login */
  username: string | null = null;

  constructor(options: OnlineClientOptions = {}) {
    super();
    this.host = options.host ?? 'localhost';
    this.port = options.port ?? DEFAULT_SERVER_PORT;
    this.connectTimeoutMs = options.connectTimeoutMs ?? 5000;
    this.replyTimeoutMs = options.replyTimeoutMs ?? 5000;
    this.matchTimeoutMs = options.matchTimeoutMs ?? 60000;
  }

  get state(): ConnectionState {
    return this.connectionState;
  }

  get address(): string {
    return `${this.host}:${this.port}`;
  }

  /**
   * Open the connection
   * @throws ProtocolError when the server is unreachable
   */
  connect(): Promise<void> {
    if (this.connectionState === ConnectionState.CONNECTED) {
      return Promise.resolve();
    }
    this.connectionState = ConnectionState.CONNECTING;

    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host: this.host, port: this.port });
      socket.setEncoding('utf-8');
      socket.setNoDelay(true);

      const timeout = setTimeout(() => {
        socket.destroy();
        this.connectionState = ConnectionState.DISCONNECTED;
        reject(new ProtocolError(`Connection to ${this.address} timed out`));
      }, this.connectTimeoutMs);

      socket.once('connect', () => {
        clearTimeout(timeout);
        this.socket = socket;
        this.lines.clear();
        this.connectionState = ConnectionState.CONNECTED;
        console.log(`[Online] Connected to ${this.address}`);
        resolve();
      });

      socket.on('data', (chunk: Buffer | string) => {
        for (const line of this.lines.push(String(chunk))) {
          this.handleLine(line);
        }
      });

      socket.on('error', (err: Error) => {
        if (this.connectionState === ConnectionState.CONNECTING) {
          clearTimeout(timeout);
          this.connectionState = ConnectionState.DISCONNECTED;
          reject(new ProtocolError(`Cannot connect to ${this.address}: ${err.message}`, { cause: err }));
          return;
        }
        this.reportError(new ProtocolError(`Connection error: ${err.message}`, { cause: err }));
      });

      socket.on('close', () => {
        const wasConnected = this.connectionState === ConnectionState.CONNECTED;
        this.socket = null;
        this.connectionState = ConnectionState.DISCONNECTED;
        this.rejectPending(new ProtocolError('Connection closed by server'));
        if (wasConnected) {
          console.log('[Online] Disconnected');
          this.emit('disconnected');
        }
      });
    });
  }

  /**
   * Send LOGIN and wait for one reply line. A reply starting with ERROR
   * means the credentials were refused.
   * @throws ProtocolError
   */
  async login(username: string, password: string): Promise<string> {
    this.send({ type: 'LOGIN', username, password });
    const line = await this.awaitReply();
    if (line.startsWith('ERROR')) {
      const reason = line.split('|').slice(1).join('|') || 'refused';
      throw new ProtocolError(`Login failed: ${reason}`);
    }
    this.username = username;
    console.log(`[Online] Logged in as ${username}`);
    return line;
  }

  /**
   * Ask for a random opponent and wait for MATCH_FOUND
   * @throws ProtocolError on timeout, refusal or disconnect
   */
  startMatch(): Promise<MatchInfo> {
    if (this.pendingMatch) {
      return Promise.reject(new ProtocolError('Already waiting for a match'));
    }
    const match = new Promise<MatchInfo>((resolve, reject) => {
      const timeout = setTimeout(() => {
        this.pendingMatch = null;
        reject(new ProtocolError('No opponent found'));
      }, this.matchTimeoutMs);
      this.pendingMatch = { resolve, reject, timeout };
    });
    try {
      this.send({ type: 'START_MATCH' });
    } catch (err) {
      this.settleMatch(null, err instanceof Error ? err : new ProtocolError(describeError(err)));
    }
    return match;
  }

  /** Stop waiting for a match */
  cancelMatch(): void {
    this.settleMatch(null, new ProtocolError('Match search cancelled'));
  }

  /**
   * Send our move to the opponent
   * @throws ProtocolError when not connected
   */
  sendMove(opponent: string, uci: string): void {
    this.send({ type: 'MOVE', opponent, uci });
  }

  /**
   * Report the final result of a game
   * @throws ProtocolError when not connected
   */
  reportGameOver(opponent: string, result: string): void {
    this.send({ type: 'GAME_OVER', player: this.username ?? '', opponent, result });
  }

  /** Close the connection. Pending requests are rejected. */
  close(): void {
    this.rejectPending(new ProtocolError('Connection closed'));
    if (this.socket) {
      this.socket.end();
      this.socket.destroy();
      this.socket = null;
    }
    this.connectionState = ConnectionState.DISCONNECTED;
    this.username = null;
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private send(message: ClientMessage): void {
    if (!this.socket || this.connectionState !== ConnectionState.CONNECTED) {
      throw new ProtocolError('Not connected');
    }
    this.socket.write(encodeMessage(message));
  }

  private awaitReply(): Promise<string> {
    if (this.pendingReply) {
      return Promise.reject(new ProtocolError('A request is already waiting for a reply'));
    }
    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        this.pendingReply = null;
        reject(new ProtocolError('Server did not reply'));
      }, this.replyTimeoutMs);
      this.pendingReply = { resolve, reject, timeout };
    });
  }

  private handleLine(line: string): void {
    const message = decodeMessage(line);

    switch (message.type) {
      case 'OPPONENT_MOVE':
        this.emit('opponentMove', message.uci);
        return;
      case 'GAME_OVER':
        this.emit('gameOver', message);
        return;
      case 'MATCH_FOUND':
        if (this.pendingMatch) {
          this.settleMatch({ color: message.color, opponent: message.opponent });
        } else {
          console.log('[Online] Ignoring MATCH_FOUND outside a match search');
        }
        return;
      case 'ERROR':
        if (!this.pendingReply && this.pendingMatch) {
          this.settleMatch(null, new ProtocolError(message.text || 'Match refused'));
          return;
        }
        break;
    }

    if (this.pendingReply) {
      const pending = this.pendingReply;
      this.pendingReply = null;
      clearTimeout(pending.timeout);
      pending.resolve(line);
      return;
    }

    console.log(`[Online] Ignoring unexpected line: ${line}`);
    this.emit('unknown', line);
  }

  private settleMatch(match: MatchInfo | null, err?: Error): void {
    const pending = this.pendingMatch;
    if (!pending) return;
    this.pendingMatch = null;
    clearTimeout(pending.timeout);
    if (match) pending.resolve(match);
    else pending.reject(err ?? new ProtocolError('Match search ended'));
  }

  private rejectPending(err: ProtocolError): void {
    if (this.pendingReply) {
      const pending = this.pendingReply;
      this.pendingReply = null;
      clearTimeout(pending.timeout);
      pending.reject(err);
    }
    this.settleMatch(null, err);
  }

  private reportError(err: ProtocolError): void {
    console.error(`[Online] ${err.message}`);
    if (this.listenerCount('error') > 0) {
      this.emit('error', err);
    }
  }
}

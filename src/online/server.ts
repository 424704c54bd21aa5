/**
 * MatchServer - reference server for online play
 *
 * Accepts logins, pairs players who ask for a match (first come, first
 * served, the earlier player gets White) and relays moves and results
 * between the two sides of each pairing.
 *
 * Events:
 *   'login'     (username)
 *   'matched'   (white, black)
 *   'move'      (from, to, uci)
 *   'gameOver'  (player, opponent, result)
 *   'left'      (username)
 *
 * @module online/server
 */

import net from 'node:net';
import { EventEmitter } from 'node:events';
import { DEFAULT_SERVER_PORT, LineBuffer, decodeMessage, encodeMessage } from './protocol.js';
import type { ServerMessage } from './protocol.js';

export interface MatchServerOptions {
  /** Port to listen on, 0 for any free port (default: 5555) */
  port?: number;
  /** Interface to bind (default: all) */
  host?: string;
  /** Known accounts; when omitted any name and password are accepted */
  accounts?: Record<string, string>;
  verbose?: boolean;
}

interface Connection {
  socket: net.Socket;
  lines: LineBuffer;
  username: string | null;
  opponent: string | null;
}

export class MatchServer extends EventEmitter {
  private server: net.Server | null = null;
  private connections: Set<Connection> = new Set();
  private waiting: Connection | null = null;
  private readonly options: MatchServerOptions;

  constructor(options: MatchServerOptions = {}) {
    super();
    this.options = options;
  }

  get isRunning(): boolean {
    return this.server !== null;
  }

  /** Port actually bound, once started */
  get port(): number {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : this.options.port ?? DEFAULT_SERVER_PORT;
  }

  get playerCount(): number {
    let count = 0;
    for (const conn of this.connections) {
      if (conn.username) count++;
    }
    return count;
  }

  start(): Promise<void> {
    if (this.server) return Promise.resolve();

    return new Promise((resolve, reject) => {
      const server = net.createServer(socket => this.accept(socket));
      server.once('error', reject);
      server.listen(this.options.port ?? DEFAULT_SERVER_PORT, this.options.host, () => {
        server.off('error', reject);
        server.on('error', (err: Error) => console.error('[MatchServer] Server error:', err.message));
        this.server = server;
        resolve();
      });
    });
  }

  stop(): Promise<void> {
    const server = this.server;
    if (!server) return Promise.resolve();
    this.server = null;
    for (const conn of this.connections) {
      conn.socket.destroy();
    }
    this.connections.clear();
    this.waiting = null;
    return new Promise(resolve => server.close(() => resolve()));
  }

  // ===========================================================================
  // Connections
  // ===========================================================================

  private accept(socket: net.Socket): void {
    const conn: Connection = { socket, lines: new LineBuffer(), username: null, opponent: null };
    this.connections.add(conn);
    socket.setEncoding('utf-8');

    socket.on('data', (chunk: Buffer | string) => {
      for (const line of conn.lines.push(String(chunk))) {
        this.handleLine(conn, line);
      }
    });
    socket.on('error', (err: Error) => {
      if (this.options.verbose) console.error('[MatchServer] Socket error:', err.message);
    });
    socket.on('close', () => this.drop(conn));
  }

  private drop(conn: Connection): void {
    if (!this.connections.delete(conn)) return;
    if (this.waiting === conn) this.waiting = null;

    const opponent = this.findPlayer(conn.opponent);
    if (opponent && conn.username) {
      opponent.opponent = null;
      this.reply(opponent, { type: 'GAME_OVER', player: conn.username, opponent: opponent.username ?? '', result: 'abandoned' });
    }
    if (conn.username) this.emit('left', conn.username);
  }

  private handleLine(conn: Connection, line: string): void {
    if (this.options.verbose) console.log(`[MatchServer] ${conn.username ?? '?'} → ${line}`);
    const message = decodeMessage(line);

    switch (message.type) {
      case 'LOGIN': {
        const expected = this.options.accounts?.[message.username];
        if (!message.username || (this.options.accounts && expected !== message.password)) {
          this.reply(conn, { type: 'ERROR', text: 'Invalid credentials' });
          return;
        }
        if (this.findPlayer(message.username)) {
          this.reply(conn, { type: 'ERROR', text: 'Already logged in' });
          return;
        }
        conn.username = message.username;
        this.reply(conn, { type: 'OK', text: `Welcome ${message.username}` });
        this.emit('login', message.username);
        return;
      }

      case 'START_MATCH': {
        if (!conn.username) {
          this.reply(conn, { type: 'ERROR', text: 'Not logged in' });
          return;
        }
        const waiting = this.waiting;
        if (!waiting || waiting === conn || !waiting.username) {
          this.waiting = conn;
          return;
        }
        this.waiting = null;
        waiting.opponent = conn.username;
        conn.opponent = waiting.username;
        this.reply(waiting, { type: 'MATCH_FOUND', color: 'w', opponent: conn.username });
        this.reply(conn, { type: 'MATCH_FOUND', color: 'b', opponent: waiting.username });
        this.emit('matched', waiting.username, conn.username);
        return;
      }

      case 'MOVE': {
        const opponent = this.findPlayer(message.opponent);
        if (!conn.username || !opponent || conn.opponent !== message.opponent) {
          this.reply(conn, { type: 'ERROR', text: `Not playing ${message.opponent}` });
          return;
        }
        this.reply(opponent, { type: 'OPPONENT_MOVE', uci: message.uci });
        this.emit('move', conn.username, message.opponent, message.uci);
        return;
      }

      case 'GAME_OVER': {
        if (!conn.username || conn.opponent === null) return;
        const opponent = this.findPlayer(conn.opponent);
        conn.opponent = null;
        if (opponent && opponent.opponent === conn.username) {
          opponent.opponent = null;
          this.reply(opponent, { type: 'GAME_OVER', player: conn.username, opponent: opponent.username ?? '', result: message.result });
        }
        this.emit('gameOver', conn.username, message.opponent, message.result);
        return;
      }

      default:
        this.reply(conn, { type: 'ERROR', text: 'Unknown command' });
    }
  }

  private findPlayer(username: string | null): Connection | null {
    if (!username) return null;
    for (const conn of this.connections) {
      if (conn.username === username) return conn;
    }
    return null;
  }

  private reply(conn: Connection, message: ServerMessage): void {
    if (!conn.socket.destroyed) {
      conn.socket.write(encodeMessage(message));
    }
  }
}

/**
 * Online play line protocol
 *
 * Newline-terminated UTF-8 lines of `|`-separated fields:
 *
 *   client → server
 *     LOGIN|<user>|<password>
 *     START_MATCH
 *     MOVE|<opponent>|<uci>
 *     GAME_OVER|<user>|<opponent>|<result>
 *
 *   server → client
 *     OK|<text>                      login accepted
 *     ERROR|<text>                   login or request refused
 *     MATCH_FOUND|<white|black>|<opponent>
 *     OPPONENT_MOVE|<uci>
 *     GAME_OVER|<user>|<opponent>|<result>
 *
 * @module online/protocol
 */

import type { Color } from '../chess/types.js';

export const DEFAULT_SERVER_PORT = 5555;

export type ClientMessage =
  | { type: 'LOGIN'; username: string; password: string }
  | { type: 'START_MATCH' }
  | { type: 'MOVE'; opponent: string; uci: string }
  | { type: 'GAME_OVER'; player: string; opponent: string; result: string };

export type ServerMessage =
  | { type: 'OK'; text: string }
  | { type: 'ERROR'; text: string }
  | { type: 'MATCH_FOUND'; color: Color; opponent: string }
  | { type: 'OPPONENT_MOVE'; uci: string }
  | { type: 'GAME_OVER'; player: string; opponent: string; result: string };

export type Message = ClientMessage | ServerMessage;

/** A received line no message type matches */
export interface UnknownMessage {
  type: 'UNKNOWN';
  line: string;
}

/**
 * Serialise a message as one line, newline included.
 * Field separators and line breaks inside values are replaced with spaces.
 */
export function encodeMessage(message: Message): string {
  return `${fields(message).map(clean).join('|')}\n`;
}

function fields(message: Message): string[] {
  switch (message.type) {
    case 'LOGIN':
      return ['LOGIN', message.username, message.password];
    case 'START_MATCH':
      return ['START_MATCH'];
    case 'MOVE':
      return ['MOVE', message.opponent, message.uci];
    case 'GAME_OVER':
      return ['GAME_OVER', message.player, message.opponent, message.result];
    case 'OK':
    case 'ERROR':
      return [message.type, message.text];
    case 'MATCH_FOUND':
      return ['MATCH_FOUND', message.color === 'w' ? 'white' : 'black', message.opponent];
    case 'OPPONENT_MOVE':
      return ['OPPONENT_MOVE', message.uci];
  }
}

function clean(field: string): string {
  return field.replace(/[|\r\n]/g, ' ');
}

function parseColor(text: string | undefined): Color | null {
  switch (text?.toLowerCase()) {
    case 'white':
    case 'w':
      return 'w';
    case 'black':
    case 'b':
      return 'b';
    default:
      return null;
  }
}

/**
 * Parse one line (without its newline). Lines with an unknown prefix or
 * missing fields come back as UNKNOWN.
 */
export function decodeMessage(line: string): Message | UnknownMessage {
  const text = line.replace(/\r$/, '');
  const [type, ...rest] = text.split('|');
  const unknown: UnknownMessage = { type: 'UNKNOWN', line: text };

  switch (type) {
    case 'LOGIN':
      return rest.length >= 2 ? { type, username: rest[0], password: rest[1] } : unknown;
    case 'START_MATCH':
      return { type };
    case 'MOVE':
      return rest.length >= 2 ? { type, opponent: rest[0], uci: rest[1] } : unknown;
    case 'GAME_OVER':
      return rest.length >= 3
        ? { type, player: rest[0], opponent: rest[1], result: rest[2] }
        : unknown;
    case 'OK':
    case 'ERROR':
      return { type, text: rest.join('|') };
    case 'MATCH_FOUND': {
      const color = parseColor(rest[0]);
      return color && rest.length >= 2 ? { type, color, opponent: rest[1] } : unknown;
    }
    case 'OPPONENT_MOVE':
      return rest.length >= 1 && rest[0] ? { type, uci: rest[0] } : unknown;
    default:
      return unknown;
  }
}

/**
 * Splits stream chunks into complete lines. A partial line is kept until
 * the rest of it arrives.
 */
export class LineBuffer {
  private buffer = '';

  /** Append a chunk and return the lines it completed */
  push(chunk: string): string[] {
    this.buffer += chunk;
    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';
    return lines.map(line => line.replace(/\r$/, '')).filter(line => line.length > 0);
  }

  /** Text received after the last newline */
  get pending(): string {
    return this.buffer;
  }

  clear(): void {
    this.buffer = '';
  }
}

/**
 * UCI output parsing
 *
 * Turns engine `info` and `bestmove` lines into typed values.
 * @see https://www.wbec-ridderkerk.nl/html/UCIProtocol.html
 */

import type { AnalysisLine, Score } from '../chess/types.js';

export interface InfoLine extends AnalysisLine {
  seldepth?: number;
  nps?: number;
  tbhits?: number;
  /** Score is only a bound from an aspiration window */
  bound?: 'lower' | 'upper';
}

export interface BestMove {
  /** UCI move, null for "bestmove (none)" */
  move: string | null;
  ponder: string | null;
}

const INT_FIELDS = ['depth', 'seldepth', 'multipv', 'nodes', 'nps', 'tbhits', 'time'] as const;
type IntField = typeof INT_FIELDS[number];

function isIntField(token: string): token is IntField {
  return INT_FIELDS.some(field => field === token);
}

/**
 * Parse an `info` line. Lines without a score and a depth (currmove,
 * hashfull, strings) return null.
 */
export function parseInfoLine(line: string): InfoLine | null {
  const tokens = line.trim().split(/\s+/);
  if (tokens[0] !== 'info') return null;

  const ints: Partial<Record<IntField, number>> = {};
  let score: Score | null = null;
  let bound: InfoLine['bound'];
  let pv: string[] = [];

  for (let i = 1; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === 'string') break;

    if (isIntField(token)) {
      const value = parseInt(tokens[i + 1] ?? '', 10);
      if (!Number.isNaN(value)) ints[token] = value;
      i++;
    } else if (token === 'score') {
      const kind = tokens[i + 1];
      const value = parseInt(tokens[i + 2] ?? '', 10);
      if ((kind === 'cp' || kind === 'mate') && !Number.isNaN(value)) {
        score = { kind, value };
      }
      i += 2;
      if (tokens[i + 1] === 'lowerbound' || tokens[i + 1] === 'upperbound') {
        bound = tokens[i + 1] === 'lowerbound' ? 'lower' : 'upper';
        i++;
      }
    } else if (token === 'pv') {
      pv = tokens.slice(i + 1);
      break;
    }
  }

  if (score === null || ints.depth === undefined) return null;

  return {
    multipv: ints.multipv ?? 1,
    depth: ints.depth,
    seldepth: ints.seldepth,
    score,
    bound,
    pv,
    nodes: ints.nodes,
    nps: ints.nps,
    tbhits: ints.tbhits,
    timeMs: ints.time,
  };
}

/**
 * Parse a `bestmove` line
 */
export function parseBestMove(line: string): BestMove | null {
  const tokens = line.trim().split(/\s+/);
  if (tokens[0] !== 'bestmove') return null;
  const move = tokens[1] && tokens[1] !== '(none)' && tokens[1] !== '0000' ? tokens[1] : null;
  const ponderIdx = tokens.indexOf('ponder');
  const ponder = ponderIdx > 0 ? tokens[ponderIdx + 1] ?? null : null;
  return { move, ponder };
}

/**
 * Build a `position` command
 */
export function positionCommand(fen: string, moves: string[] = []): string {
  const suffix = moves.length > 0 ? ` moves ${moves.join(' ')}` : '';
  return `position fen ${fen}${suffix}`;
}

export type SearchLimit =
  | { depth: number }
  | { movetimeMs: number };

/**
 * Build a `go` command for a depth or movetime limit
 */
export function goCommand(limit: SearchLimit): string {
  return 'depth' in limit ? `go depth ${limit.depth}` : `go movetime ${limit.movetimeMs}`;
}

/**
 * PuzzleService - fetches puzzles from the lichess puzzle API
 *
 * @see https://lichess.org/api#tag/Puzzles
 */

import { z } from 'zod';
import { PuzzleFetchError, describeError } from '../core/errors.js';
import { pgnToFen } from '../chess/notation.js';

export const PuzzleResponseSchema = z.object({
  game: z.object({
    id: z.string().optional(),
    pgn: z.string().min(1),
  }),
  puzzle: z.object({
    id: z.string(),
    rating: z.number(),
    solution: z.array(z.string()).min(1),
    themes: z.array(z.string()).default([]),
    initialPly: z.number().optional(),
  }),
});

export type PuzzleResponse = z.infer<typeof PuzzleResponseSchema>;

/** A puzzle ready to play */
export interface Puzzle {
  id: string;
  rating: number;
  themes: string[];
  /** Final position of the game PGN; the side to move solves */
  fen: string;
  /** Solution in UCI, alternating solver and opponent */
  solution: string[];
}

type FetchLike = (url: string, init?: { signal?: AbortSignal; headers?: Record<string, string> }) => Promise<{
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}>;

export interface PuzzleServiceOptions {
  /** Default: https://lichess.org/api/puzzle/next */
  url?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
}

export class PuzzleService {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchLike;

  constructor(options: PuzzleServiceOptions = {}) {
    this.url = options.url ?? 'https://lichess.org/api/puzzle/next';
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.fetchFn = options.fetch ?? fetch;
  }

  /**
   * Fetch the next puzzle
   * @throws PuzzleFetchError on network, HTTP or format failures
   */
  async next(): Promise<Puzzle> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    let body: unknown;
    try {
      const response = await this.fetchFn(this.url, {
        signal: controller.signal,
        headers: { Accept: 'application/json' },
      });
      if (!response.ok) {
        throw new PuzzleFetchError(`Puzzle request failed with HTTP ${response.status}`, response.status);
      }
      body = await response.json();
    } catch (err) {
      if (err instanceof PuzzleFetchError) throw err;
      throw new PuzzleFetchError(`Puzzle service unavailable: ${describeError(err)}`, undefined, { cause: err });
    } finally {
      clearTimeout(timeoutId);
    }

    return toPuzzle(body);
  }
}

/**
 * Validate an API document and compute the starting position
 * @throws PuzzleFetchError
 */
export function toPuzzle(body: unknown): Puzzle {
  const parsed = PuzzleResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new PuzzleFetchError('Unexpected puzzle response');
  }
  const { game, puzzle } = parsed.data;

  let fen: string;
  try {
    fen = pgnToFen(game.pgn);
  } catch (err) {
    throw new PuzzleFetchError(`Puzzle ${puzzle.id} has an unreadable PGN`, undefined, { cause: err });
  }

  return {
    id: puzzle.id,
    rating: puzzle.rating,
    themes: puzzle.themes,
    fen,
    solution: puzzle.solution,
  };
}

/**
 * Tablebase - Syzygy WDL probing
 *
 * Classifies positions with few pieces left as win, draw or loss for the
 * side to move, using the Syzygy tables served over HTTP (lichess tablebase
 * format). A local Syzygy directory is not read here; it is handed to the
 * UCI engine as its `SyzygyPath` option.
 *
 * WDL values follow the Syzygy convention, side to move's view:
 *   2 win, 1 cursed win, 0 draw, -1 blessed loss, -2 loss
 */

import { z } from 'zod';
import { TablebaseError } from '../core/errors.js';

// =============================================================================
// Types
// =============================================================================

export type Wdl = -2 | -1 | 0 | 1 | 2;

export interface TablebaseConfig {
  /** Probe after every move */
  enabled: boolean;
  /** Tablebase HTTP endpoint */
  endpoint: string;
  /** Largest piece count the tables cover, kings included */
  maxPieces: number;
  /** Cache size in number of positions */
  cacheSize: number;
  /** Request timeout in ms */
  timeoutMs: number;
}

export const DEFAULT_TABLEBASE_CONFIG: TablebaseConfig = {
  enabled: false,
  endpoint: 'https://tablebase.lichess.ovh/standard',
  maxPieces: 7,
  cacheSize: 1000,
  timeoutMs: 5000,
};

type FetchLike = (url: string, init?: { signal?: AbortSignal; headers?: Record<string, string> }) => Promise<{
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}>;

const TablebaseResponseSchema = z.object({
  category: z.string(),
  dtz: z.number().nullable().optional(),
  dtm: z.number().nullable().optional(),
});

/**
 * Map a tablebase category to a WDL value. "maybe-" categories come from
 * DTZ rounding and are reported as the cursed/blessed variant.
 */
export function categoryToWdl(category: string): Wdl | null {
  switch (category) {
    case 'win':
      return 2;
    case 'cursed-win':
    case 'maybe-win':
      return 1;
    case 'draw':
      return 0;
    case 'blessed-loss':
    case 'maybe-loss':
      return -1;
    case 'loss':
      return -2;
    default:
      return null;
  }
}

/**
 * Count pieces in the placement field of a FEN
 */
export function countPieces(fen: string): number {
  const placement = fen.split(' ')[0];
  let count = 0;
  for (const char of placement) {
    if (/[pnbrqkPNBRQK]/.test(char)) count++;
  }
  return count;
}

// =============================================================================
// Cache
// =============================================================================

/** LRU cache keyed by the first four FEN fields */
class WdlCache {
  private cache: Map<string, Wdl | null> = new Map();

  constructor(private maxSize: number) {}

  has(fen: string): boolean {
    return this.cache.has(normalizeFen(fen));
  }

  get(fen: string): Wdl | null {
    const key = normalizeFen(fen);
    const value = this.cache.get(key) ?? null;
    // Move to end (most recently used)
    this.cache.delete(key);
    this.cache.set(key, value);
    return value;
  }

  set(fen: string, value: Wdl | null): void {
    while (this.cache.size >= this.maxSize) {
      const firstKey = this.cache.keys().next().value;
      if (firstKey === undefined) break;
      this.cache.delete(firstKey);
    }
    this.cache.set(normalizeFen(fen), value);
  }

  get size(): number {
    return this.cache.size;
  }
}

function normalizeFen(fen: string): string {
  return fen.split(' ').slice(0, 4).join(' ');
}

// =============================================================================
// TablebaseProbe
// =============================================================================

export class TablebaseProbe {
  private config: TablebaseConfig;
  private cache: WdlCache;
  private fetchFn: FetchLike;

  constructor(config: Partial<TablebaseConfig> = {}, fetchFn: FetchLike = fetch) {
    this.config = { ...DEFAULT_TABLEBASE_CONFIG, ...config };
    this.cache = new WdlCache(this.config.cacheSize);
    this.fetchFn = fetchFn;
  }

  get enabled(): boolean {
    return this.config.enabled;
  }

  /** Whether the position is small enough for the tables */
  covers(fen: string): boolean {
    return countPieces(fen) <= this.config.maxPieces;
  }

  /**
   * WDL for the side to move, null when the position is outside the tables
   * or the service does not know it
   * @throws TablebaseError on network or format failures
   */
  async probeWdl(fen: string): Promise<Wdl | null> {
    if (!this.covers(fen)) return null;
    if (this.cache.has(fen)) return this.cache.get(fen);

    const url = `${this.config.endpoint}?fen=${encodeURIComponent(fen)}`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);

    let body: unknown;
    try {
      const response = await this.fetchFn(url, {
        signal: controller.signal,
        headers: { Accept: 'application/json' },
      });
      if (!response.ok) {
        throw new TablebaseError(`Tablebase request failed with HTTP ${response.status}`);
      }
      body = await response.json();
    } catch (err) {
      if (err instanceof TablebaseError) throw err;
      throw new TablebaseError(`Tablebase unavailable: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    } finally {
      clearTimeout(timeoutId);
    }

    const parsed = TablebaseResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new TablebaseError('Unexpected tablebase response');
    }

    const wdl = categoryToWdl(parsed.data.category);
    this.cache.set(fen, wdl);
    return wdl;
  }

  getCacheStats(): { size: number; maxSize: number } {
    return { size: this.cache.size, maxSize: this.config.cacheSize };
  }
}

/**
 * Long-lived services shared by every screen: the engine process, the
 * tablebase probe, the puzzle client and the local database.
 */

import type { KibitzConfig } from '../core/config.js';
import { engineOptions } from '../core/config.js';
import { describeError } from '../core/errors.js';
import { TablebaseProbe } from '../chess/Tablebase.js';
import { UciEngine } from '../engine/UciEngine.js';
import type { ChessEngine } from '../engine/UciEngine.js';
import { PuzzleService } from '../puzzles/PuzzleService.js';
import { DatabaseService } from './DatabaseService.js';
import type { GameRecordInput, PuzzleAttempt } from './DatabaseService.js';

export interface AppServices {
  config: KibitzConfig;
  /** null when the engine could not be started */
  engine: ChessEngine | null;
  /** Why the engine is missing */
  engineError: string | null;
  tablebase: TablebaseProbe;
  puzzles: PuzzleService;
  /** null when the database could not be opened */
  db: DatabaseService | null;
}

/**
 * Start the engine and open the database. Failures leave the service
 * missing and are reported, never thrown: every screen works without them.
 */
export async function createServices(config: KibitzConfig): Promise<AppServices> {
  let engine: UciEngine | null = new UciEngine({
    path: config.engine.path,
    options: engineOptions(config),
    startTimeoutMs: config.engine.startTimeoutMs,
  });
  let engineError: string | null = null;
  try {
    await engine.start();
  } catch (err) {
    engineError = describeError(err);
    console.error('[Services] Engine unavailable:', engineError);
    engine = null;
  }

  let db: DatabaseService | null = null;
  try {
    db = new DatabaseService(config.database.path);
  } catch (err) {
    console.error('[Services] Database unavailable:', describeError(err));
  }

  return {
    config,
    engine,
    engineError,
    tablebase: new TablebaseProbe({
      enabled: config.tablebase.enabled,
      endpoint: config.tablebase.endpoint,
      maxPieces: config.tablebase.maxPieces,
      timeoutMs: config.tablebase.timeoutMs,
    }),
    puzzles: new PuzzleService({ url: config.puzzles.url, timeoutMs: config.puzzles.timeoutMs }),
    db,
  };
}

/**
 * Store a finished game; a database failure is logged, not thrown
 */
export function saveGame(services: AppServices, game: GameRecordInput): void {
  try {
    services.db?.recordGame(game);
  } catch (err) {
    console.error('[Services] Cannot record game:', describeError(err));
  }
}

/**
 * Store a puzzle attempt; a database failure is logged, not thrown
 */
export function savePuzzle(services: AppServices, attempt: PuzzleAttempt): void {
  try {
    services.db?.recordPuzzle(attempt);
  } catch (err) {
    console.error('[Services] Cannot record puzzle:', describeError(err));
  }
}

/**
 * Stop the engine and close the database
 */
export async function disposeServices(services: AppServices): Promise<void> {
  try {
    await services.engine?.quit();
  } catch (err) {
    console.error('[Services] Engine shutdown failed:', describeError(err));
  }
  services.db?.close();
}

import Database from 'better-sqlite3';
import path from 'node:path';
import fs from 'node:fs';
import type { Color } from '../chess/types.js';

export type GameMode = 'engine' | 'online' | 'terminal';
export type Outcome = 'win' | 'loss' | 'draw' | 'unfinished';

export interface GameRecordInput {
    mode: GameMode;
    playerColor: Color;
    opponent: string;
    /** "1-0", "0-1", "1/2-1/2" or "*" */
    result: string;
    pgn: string;
}

export interface GameRecord extends GameRecordInput {
    id: number;
    outcome: Outcome;
    createdAt: string;
}

export interface PuzzleAttempt {
    puzzleId: string;
    rating: number;
    solved: boolean;
}

export interface ModeStats {
    played: number;
    wins: number;
    losses: number;
    draws: number;
}

export interface Stats {
    games: Record<GameMode, ModeStats>;
    puzzles: {
        attempted: number;
        solved: number;
        failed: number;
        /** Highest rating among solved puzzles, null before the first */
        bestRating: number | null;
    };
}

interface GameRow {
    id: number;
    mode: string;
    player_color: string;
    opponent: string;
    result: string;
    outcome: string;
    pgn: string;
    created_at: string;
}

interface ModeRow {
    mode: string;
    outcome: string;
    count: number;
}

interface PuzzleRow {
    attempted: number;
    solved: number | null;
    best_rating: number | null;
}

const GAME_MODES: readonly GameMode[] = ['engine', 'online', 'terminal'];

function isGameMode(value: string): value is GameMode {
    return GAME_MODES.some(mode => mode === value);
}

function toOutcome(value: string): Outcome {
    return value === 'win' || value === 'loss' || value === 'draw' ? value : 'unfinished';
}

/**
 * Outcome of a result string for the player of `color`
 */
export function outcomeFor(result: string, color: Color): Outcome {
    switch (result) {
        case '1-0':
            return color === 'w' ? 'win' : 'loss';
        case '0-1':
            return color === 'b' ? 'win' : 'loss';
        case '1/2-1/2':
            return 'draw';
        default:
            return 'unfinished';
    }
}

const emptyModeStats = (): ModeStats => ({ played: 0, wins: 0, losses: 0, draws: 0 });

/**
 * Local record of finished games and puzzle attempts
 */
export class DatabaseService {
    private db: Database.Database;

    /**
     * @param dbPath - SQLite file, or ":memory:"
     */
    constructor(dbPath: string) {
        if (dbPath !== ':memory:') {
            fs.mkdirSync(path.dirname(dbPath), { recursive: true });
        }
        this.db = new Database(dbPath);
        // WAL lets a second kibitz process read while this one writes
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('synchronous = NORMAL');
        this.init();
    }

    private init(): void {
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS game_records (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                mode TEXT NOT NULL,
                player_color TEXT NOT NULL,
                opponent TEXT NOT NULL,
                result TEXT NOT NULL,
                outcome TEXT NOT NULL,
                pgn TEXT NOT NULL DEFAULT '',
                created_at DATETIME DEFAULT CURRENT_TIMESTAMP
            )
        `);

        this.db.exec(`
            CREATE TABLE IF NOT EXISTS puzzle_attempts (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                puzzle_id TEXT NOT NULL,
                rating INTEGER NOT NULL,
                solved INTEGER NOT NULL,
                created_at DATETIME DEFAULT CURRENT_TIMESTAMP
            )
        `);

        this.db.exec('CREATE INDEX IF NOT EXISTS idx_game_records_created ON game_records(created_at)');
    }

    /**
     * Store a finished (or abandoned) game
     * @returns the new record's id
     */
    recordGame(game: GameRecordInput): number {
        const info = this.db.prepare(`
            INSERT INTO game_records (mode, player_color, opponent, result, outcome, pgn)
            VALUES (?, ?, ?, ?, ?, ?)
        `).run(game.mode, game.playerColor, game.opponent, game.result, outcomeFor(game.result, game.playerColor), game.pgn);
        return Number(info.lastInsertRowid);
    }

    recordPuzzle(attempt: PuzzleAttempt): void {
        this.db.prepare(`
            INSERT INTO puzzle_attempts (puzzle_id, rating, solved)
            VALUES (?, ?, ?)
        `).run(attempt.puzzleId, attempt.rating, attempt.solved ? 1 : 0);
    }

    getRecentGames(limit: number = 10): GameRecord[] {
        const rows = this.db.prepare<[number], GameRow>(`
            SELECT id, mode, player_color, opponent, result, outcome, pgn, created_at
            FROM game_records
            ORDER BY id DESC
            LIMIT ?
        `).all(limit);

        const records: GameRecord[] = [];
        for (const row of rows) {
            if (!isGameMode(row.mode)) continue;
            records.push({
                id: row.id,
                mode: row.mode,
                playerColor: row.player_color === 'b' ? 'b' : 'w',
                opponent: row.opponent,
                result: row.result,
                outcome: toOutcome(row.outcome),
                pgn: row.pgn,
                createdAt: row.created_at,
            });
        }
        return records;
    }

    getStats(): Stats {
        const games: Record<GameMode, ModeStats> = {
            engine: emptyModeStats(),
            online: emptyModeStats(),
            terminal: emptyModeStats(),
        };

        const modeRows = this.db.prepare<[], ModeRow>(`
            SELECT mode, outcome, COUNT(*) AS count
            FROM game_records
            GROUP BY mode, outcome
        `).all();

        for (const row of modeRows) {
            if (!isGameMode(row.mode)) continue;
            const stats = games[row.mode];
            stats.played += row.count;
            const outcome = toOutcome(row.outcome);
            if (outcome === 'win') stats.wins += row.count;
            else if (outcome === 'loss') stats.losses += row.count;
            else if (outcome === 'draw') stats.draws += row.count;
        }

        const puzzleRow = this.db.prepare<[], PuzzleRow>(`
            SELECT
                COUNT(*) AS attempted,
                SUM(solved) AS solved,
                MAX(CASE WHEN solved = 1 THEN rating END) AS best_rating
            FROM puzzle_attempts
        `).get();

        const attempted = puzzleRow?.attempted ?? 0;
        const solved = puzzleRow?.solved ?? 0;

        return {
            games,
            puzzles: {
                attempted,
                solved,
                failed: attempted - solved,
                bestRating: puzzleRow?.best_rating ?? null,
            },
        };
    }

    close(): void {
        if (this.db.open) {
            this.db.close();
        }
    }
}

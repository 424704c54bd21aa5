import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { DatabaseService, outcomeFor } from '../src/services/DatabaseService.js';
import type { GameRecordInput } from '../src/services/DatabaseService.js';

const game = (overrides: Partial<GameRecordInput>): GameRecordInput => ({
    mode: 'engine',
    playerColor: 'w',
    opponent: 'stockfish',
    result: '1-0',
    pgn: '1. e4 e5',
    ...overrides,
});

describe('outcomeFor', () => {
    it('should score results from the player\'s side', () => {
        expect(outcomeFor('1-0', 'w')).toBe('win');
        expect(outcomeFor('1-0', 'b')).toBe('loss');
        expect(outcomeFor('0-1', 'b')).toBe('win');
        expect(outcomeFor('0-1', 'w')).toBe('loss');
        expect(outcomeFor('1/2-1/2', 'b')).toBe('draw');
        expect(outcomeFor('*', 'w')).toBe('unfinished');
        expect(outcomeFor('abandoned', 'w')).toBe('unfinished');
    });
});

describe('DatabaseService', () => {
    let db: DatabaseService;

    beforeEach(() => {
        db = new DatabaseService(':memory:');
    });

    afterEach(() => {
        db.close();
    });

    // =========================================================================
    // Games
    // =========================================================================

    it('should start with empty statistics', () => {
        const stats = db.getStats();
        expect(stats.games.engine).toEqual({ played: 0, wins: 0, losses: 0, draws: 0 });
        expect(stats.puzzles).toEqual({ attempted: 0, solved: 0, failed: 0, bestRating: null });
        expect(db.getRecentGames()).toEqual([]);
    });

    it('should store games and return the newest first', () => {
        expect(db.recordGame(game({ opponent: 'first' }))).toBe(1);
        expect(db.recordGame(game({ opponent: 'second', playerColor: 'b' }))).toBe(2);

        const recent = db.getRecentGames();
        expect(recent.map(r => r.opponent)).toEqual(['second', 'first']);
        expect(recent[0]).toMatchObject({
            id: 2,
            mode: 'engine',
            playerColor: 'b',
            result: '1-0',
            outcome: 'loss',
            pgn: '1. e4 e5',
        });
        expect(typeof recent[0].createdAt).toBe('string');
    });

    it('should honour the limit', () => {
        for (let i = 0; i < 5; i++) db.recordGame(game({ opponent: `opponent-${i}` }));
        expect(db.getRecentGames(2).map(r => r.opponent)).toEqual(['opponent-4', 'opponent-3']);
    });

    it('should count outcomes per mode', () => {
        db.recordGame(game({ mode: 'engine', result: '1-0' }));
        db.recordGame(game({ mode: 'engine', result: '0-1' }));
        db.recordGame(game({ mode: 'engine', result: '1-0', playerColor: 'b' }));
        db.recordGame(game({ mode: 'online', result: '1/2-1/2', opponent: 'bob' }));
        db.recordGame(game({ mode: 'terminal', result: '*' }));

        const { games } = db.getStats();
        expect(games.engine).toEqual({ played: 3, wins: 1, losses: 2, draws: 0 });
        expect(games.online).toEqual({ played: 1, wins: 0, losses: 0, draws: 1 });
        expect(games.terminal).toEqual({ played: 1, wins: 0, losses: 0, draws: 0 });
    });

    // =========================================================================
    // Puzzles
    // =========================================================================

    it('should count puzzle attempts and the best solved rating', () => {
        db.recordPuzzle({ puzzleId: 'p1', rating: 1500, solved: true });
        db.recordPuzzle({ puzzleId: 'p2', rating: 1800, solved: false });
        db.recordPuzzle({ puzzleId: 'p3', rating: 1700, solved: true });

        expect(db.getStats().puzzles).toEqual({ attempted: 3, solved: 2, failed: 1, bestRating: 1700 });
    });

    it('should close once', () => {
        db.close();
        expect(() => db.close()).not.toThrow();
    });
});

describe('DatabaseService on disk', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'kibitz-db-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should create missing directories and keep records across opens', () => {
        const file = path.join(dir, 'nested', 'kibitz.db');

        const first = new DatabaseService(file);
        first.recordGame(game({ opponent: 'kept' }));
        first.close();

        const second = new DatabaseService(file);
        expect(second.getRecentGames().map(r => r.opponent)).toEqual(['kept']);
        second.close();
    });
});

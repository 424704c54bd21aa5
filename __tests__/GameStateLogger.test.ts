import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ChessGame } from '../src/chess/ChessGame.js';
import {
    clearStateFile,
    formatStateFile,
    getCurrentState,
    getStateHistory,
    logGameState,
    setFileLoggingEnabled,
    setStateFilePath,
    subscribeToState,
} from '../src/core/GameStateLogger.js';
import { stateManager } from '../src/core/state.js';

describe('formatStateFile', () => {
    it('should write the header and controls', () => {
        const content = formatStateFile(
            { pid: 42, timestamp: 1000, screen: 'Engine Game', status: 'Your move' },
            'Esc to go back.'
        );
        expect(content).toBe(
            'PROCESS ID: 42\nTIMESTAMP: 1000\nCURRENT SCREEN: Engine Game\nSTATUS: Your move\n\nCONTROLS: Esc to go back.\n'
        );
    });

    it('should add the board, position and extra text', () => {
        const game = new ChessGame();
        game.playText('e4');
        const content = formatStateFile(
            { pid: 42, timestamp: 1000, screen: 'Analysis Terminal', status: '', game: game.getState() },
            'Esc',
            'Best: +0.35'
        );

        const lines = content.split('\n');
        expect(lines[5]).toBe('BOARD:');
        expect(lines[6]).toBe('    a   b   c   d   e   f   g   h');
        expect(lines).toContain('4 | . | . | . | . | P | . | . | . | 4');
        expect(content.endsWith(`FEN: ${game.fen()}\nTURN: Black\nMOVES: e4\n\nBest: +0.35\n\nCONTROLS: Esc\n`)).toBe(true);
    });
});

describe('logGameState', () => {
    let dir: string;
    let file: string;

    beforeEach(() => {
        stateManager.reset();
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'kibitz-state-'));
        file = path.join(dir, 'kibitz-state.txt');
        setStateFilePath(file);
        setFileLoggingEnabled(true);
    });

    afterEach(() => {
        setFileLoggingEnabled(false);
        fs.rmSync(dir, { recursive: true, force: true });
        vi.restoreAllMocks();
    });

    it('should record the state and write the file', () => {
        logGameState('Main Menu', 'Choose an activity', undefined, 'Enter to select.');

        expect(getCurrentState()?.screen).toBe('Main Menu');
        const content = fs.readFileSync(file, 'utf-8');
        expect(content.startsWith(`PROCESS ID: ${process.pid}\n`)).toBe(true);
        expect(content.endsWith('CURRENT SCREEN: Main Menu\nSTATUS: Choose an activity\n\nCONTROLS: Enter to select.\n')).toBe(true);
    });

    it('should only update the state when file logging is off', () => {
        setFileLoggingEnabled(false);
        logGameState('Puzzles', 'Loading puzzle...');
        expect(getCurrentState()?.status).toBe('Loading puzzle...');
        expect(fs.existsSync(file)).toBe(false);
    });

    it('should notify subscribers and keep a history', () => {
        const received: string[] = [];
        const unsubscribe = subscribeToState(state => received.push(state.screen));

        logGameState('Main Menu', '');
        logGameState('Statistics', '');
        unsubscribe();
        logGameState('Main Menu', '');

        expect(received).toEqual(['Main Menu', 'Statistics']);
        expect(getStateHistory().map(s => s.screen)).toEqual(['Main Menu', 'Statistics', 'Main Menu']);
        expect(getStateHistory(1).map(s => s.screen)).toEqual(['Main Menu']);
    });

    it('should stop writing after a failed write', () => {
        const errors = vi.spyOn(console, 'error').mockImplementation(() => {});
        setStateFilePath(path.join(dir, 'missing', 'state.txt'));

        logGameState('Main Menu', '');
        logGameState('Main Menu', '');

        expect(errors).toHaveBeenCalledTimes(1);
        expect(errors.mock.calls[0][0]).toBe('[StateLogger] Cannot write state file:');
        expect(getStateHistory()).toHaveLength(2);
    });

    it('should mark the file as closed on exit', () => {
        logGameState('Main Menu', '');
        clearStateFile();
        expect(fs.readFileSync(file, 'utf-8')).toBe(
            'PROCESS ID: TERMINATED\nCURRENT SCREEN: Application Closed\nSTATUS: kibitz has exited.\n\nCONTROLS: N/A\n'
        );
    });
});

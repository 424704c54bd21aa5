import fs from 'node:fs';
import path from 'node:path';
import { asciiBoard } from '../chess/notation.js';
import type { ChessState } from '../chess/types.js';
import { stateManager, type ScreenState } from './state.js';

let fileLoggingEnabled = true;
let stateFilePath = path.join(process.cwd(), 'kibitz-state.txt');

/**
 * Enable or disable file logging
 */
export const setFileLoggingEnabled = (enabled: boolean): void => {
    fileLoggingEnabled = enabled;
};

/**
 * Change where the state file is written (defaults to ./kibitz-state.txt)
 */
export const setStateFilePath = (file: string): void => {
    stateFilePath = file;
};

/**
 * Render the state file contents
 */
export const formatStateFile = (
    state: ScreenState,
    controls: string,
    extra: string = ''
): string => {
    let content = `PROCESS ID: ${state.pid}\n`;
    content += `TIMESTAMP: ${state.timestamp}\n`;
    content += `CURRENT SCREEN: ${state.screen}\n`;
    content += `STATUS: ${state.status}\n`;

    if (state.game) {
        content += `\nBOARD:\n`;
        content += asciiBoard(state.game.fen);
        content += `FEN: ${state.game.fen}\n`;
        content += `TURN: ${state.game.turn === 'w' ? 'White' : 'Black'}\n`;
        content += `MOVES: ${state.game.history.join(' ') || '-'}\n`;
    }
    if (extra) {
        content += `\n${extra}\n`;
    }
    content += `\nCONTROLS: ${controls}\n`;
    return content;
};

/**
 * Record what the current screen shows: updates the state manager
 * (notifying subscribers) and, when enabled, rewrites the state file so
 * another process can follow along.
 *
 * @param screenName - e.g. "Engine Game"
 * @param status - e.g. "Engine move: Nf6"
 * @param game - Position on screen, if any
 * @param controls - Key help for the screen
 * @param extra - Free text appended to the file (analysis lines, lobby)
 */
export const logGameState = (
    screenName: string,
    status: string,
    game?: ChessState,
    controls: string = 'Use Arrows to move, Enter to select, Esc to go back.',
    extra: string = ''
): void => {
    const state = stateManager.update({ screen: screenName, status, game });

    if (fileLoggingEnabled) {
        try {
            fs.writeFileSync(stateFilePath, formatStateFile(state, controls, extra), 'utf-8');
        } catch (err) {
            // The screen keeps running without a state file
            console.error('[StateLogger] Cannot write state file:', err instanceof Error ? err.message : String(err));
            fileLoggingEnabled = false;
        }
    }
};

/**
 * Get the current state from the state manager
 */
export const getCurrentState = (): ScreenState | null => {
    return stateManager.get();
};

/**
 * Get recent state history
 */
export const getStateHistory = (limit?: number): ScreenState[] => {
    return stateManager.getHistory(limit);
};

/**
 * Subscribe to state updates
 * Returns an unsubscribe function
 */
export const subscribeToState = (callback: (state: ScreenState) => void): () => void => {
    return stateManager.subscribe(callback);
};

/**
 * Mark the state file as belonging to no running process
 */
export const clearStateFile = (): void => {
    if (!fileLoggingEnabled) return;
    const content = `PROCESS ID: TERMINATED\nCURRENT SCREEN: Application Closed\nSTATUS: kibitz has exited.\n\nCONTROLS: N/A\n`;
    try {
        fs.writeFileSync(stateFilePath, content, 'utf-8');
    } catch (err) {
        console.error('[StateLogger] Cannot clear state file:', err instanceof Error ? err.message : String(err));
    }
};

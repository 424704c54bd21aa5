/**
 * Screen state tracking
 *
 * Holds the latest snapshot of what the front-end is showing, a short
 * history of snapshots, and the subscribers that want to hear about them.
 */

import type { ChessState } from '../chess/types.js';

/** Snapshot of the current screen */
export interface ScreenState {
  timestamp: number;
  pid: number;
  /** Screen name, e.g. "Analysis Terminal" */
  screen: string;
  /** One-line status, e.g. "Engine move: Nf6" */
  status: string;
  /** Position on screen, when there is one */
  game?: ChessState;
}

class StateManager {
  private currentState: ScreenState | null = null;
  private stateHistory: ScreenState[] = [];
  private maxHistorySize = 100;
  private subscribers: Set<(state: ScreenState) => void> = new Set();
  private updateCount = 0;

  /**
   * Replace the current state. Notifies all subscribers and maintains history.
   */
  update(state: Omit<ScreenState, 'timestamp' | 'pid'>): ScreenState {
    this.currentState = {
      ...state,
      timestamp: Date.now(),
      pid: process.pid,
    };

    this.stateHistory.push(this.currentState);
    if (this.stateHistory.length > this.maxHistorySize) {
      this.stateHistory.shift();
    }

    this.updateCount++;

    for (const subscriber of this.subscribers) {
      try {
        subscriber(this.currentState);
      } catch (err) {
        console.error('[StateManager] Subscriber error:', err);
      }
    }

    return this.currentState;
  }

  get(): ScreenState | null {
    return this.currentState;
  }

  getHistory(limit?: number): ScreenState[] {
    if (limit) {
      return this.stateHistory.slice(-limit);
    }
    return [...this.stateHistory];
  }

  /**
   * Subscribe to state updates
   * Returns unsubscribe function
   */
  subscribe(callback: (state: ScreenState) => void): () => void {
    this.subscribers.add(callback);
    return () => {
      this.subscribers.delete(callback);
    };
  }

  getStats(): { updateCount: number; historySize: number; subscriberCount: number } {
    return {
      updateCount: this.updateCount,
      historySize: this.stateHistory.length,
      subscriberCount: this.subscribers.size,
    };
  }

  /**
   * Clear state, history, and subscribers
   */
  reset(): void {
    this.currentState = null;
    this.stateHistory = [];
    this.subscribers.clear();
    this.updateCount = 0;
  }
}

export const stateManager = new StateManager();

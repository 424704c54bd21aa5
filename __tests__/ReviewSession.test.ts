/**
 * Game review tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { STARTING_FEN } from '../src/chess/types.js';
import { KibitzError } from '../src/core/errors.js';
import { ReviewSession, positionsFromPgn } from '../src/sessions/ReviewSession.js';
import { ScriptedEngine, cpLine } from './fakes.js';

const PGN = `[Event "Club night"]
[White "Alice"]
[Black "Bob"]
[Result "1-0"]

1. e4 e5 2. Nf3 Nc6 1-0
`;

describe('positionsFromPgn', () => {
  it('should list the initial position and one per move', () => {
    const { positions, headers } = positionsFromPgn(PGN);
    expect(positions).toHaveLength(5);
    expect(positions[0]).toEqual({ fen: STARTING_FEN, san: null, uci: null, ply: 0 });
    expect(positions[1]).toMatchObject({ san: 'e4', uci: 'e2e4', ply: 1 });
    expect(positions[1].fen.startsWith('rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq ')).toBe(true);
    expect(positions[4].san).toBe('Nc6');
    expect(headers.White).toBe('Alice');
  });

  it('should reject an unreadable PGN', () => {
    expect(() => positionsFromPgn('1. e4 e5 2. Ke3')).toThrow(/^Cannot read PGN: /);
  });
});

describe('ReviewSession', () => {
  let engine: ScriptedEngine;
  let session: ReviewSession;

  beforeEach(() => {
    engine = new ScriptedEngine();
    session = new ReviewSession(PGN, { engine });
  });

  it('should title the game from its headers', () => {
    expect(session.title()).toBe('Alice vs Bob (1-0)');
    expect(new ReviewSession('1. d4 d5', { engine }).title()).toBe('? vs ? (*)');
  });

  it('should bracket the current move', () => {
    expect(session.moveText()).toBe('1. e4 e5 2. Nf3 Nc6');
    session.next();
    expect(session.moveText()).toBe('1. [e4] e5 2. Nf3 Nc6');
    session.next();
    session.next();
    expect(session.moveText()).toBe('1. e4 e5 2. [Nf3] Nc6');
  });

  it('should clamp navigation to the game', () => {
    const onChange = vi.fn();
    session.on('change', onChange);

    session.prev();
    expect(session.currentIndex).toBe(0);
    expect(onChange).not.toHaveBeenCalled();

    session.last();
    expect(session.currentIndex).toBe(4);
    session.next();
    expect(session.currentIndex).toBe(4);

    session.first();
    expect(session.current.fen).toBe(STARTING_FEN);
    expect(onChange).toHaveBeenCalledTimes(2);
  });

  it('should analyse the current position', async () => {
    session.next();
    engine.analyses.push([cpLine(20, ['e7e5', 'g1f3'])]);

    await session.analyse();

    expect(engine.analyseCalls[0]).toEqual({
      fen: session.positions[1].fen,
      limit: { movetimeMs: 1000 },
      multiPv: 3,
    });
    expect(session.variants).toEqual([{ cp: -20, scoreText: '-0.20', line: 'e5 Nf3' }]);
  });

  it('should drop analysis of a position already left', async () => {
    engine.analyses.push(async () => {
      session.next();
      return [cpLine(20, ['e2e4'])];
    });
    await session.analyse();
    expect(session.variants).toEqual([]);
  });

  it('should clear the variants when moving on', async () => {
    engine.analyses.push([cpLine(20, ['e2e4'])]);
    await session.analyse();
    expect(session.variants).toHaveLength(1);
    session.next();
    expect(session.variants).toEqual([]);
  });

  it('should report a failed analysis', async () => {
    engine.analyses.push(new Error('Engine is not running'));
    await session.analyse();
    expect(session.status).toBe('Analysis error: Engine is not running');
  });

  it('should say when there is no engine', async () => {
    session = new ReviewSession(PGN, { engine: null });
    expect(session.status).toBe('No engine: analysis unavailable');
    await session.analyse();
    expect(session.variants).toEqual([]);
  });
});

describe('ReviewSession.fromFile', () => {
  it('should read a PGN file', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'kibitz-review-'));
    try {
      const file = path.join(dir, 'game.pgn');
      fs.writeFileSync(file, PGN, 'utf-8');
      expect(ReviewSession.fromFile(file, { engine: null }).positions).toHaveLength(5);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('should report a missing file', () => {
    const file = path.join(os.tmpdir(), 'kibitz-no-such-dir', 'game.pgn');
    const open = () => ReviewSession.fromFile(file, { engine: null });
    expect(open).toThrow(KibitzError);
    expect(open).toThrow(`Cannot open ${file}: `);
  });
});

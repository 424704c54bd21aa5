/**
 * UCI adapter tests against an in-process fake engine
 */

import { describe, it, expect, afterEach } from 'vitest';
import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import { UciEngine } from '../src/engine/UciEngine.js';
import type { EngineProcess } from '../src/engine/UciEngine.js';
import { goCommand, parseBestMove, parseInfoLine, positionCommand } from '../src/engine/uciParser.js';
import { STARTING_FEN } from '../src/chess/types.js';
import { EngineError } from '../src/core/errors.js';

// =============================================================================
// Fake engine process
// =============================================================================

class FakeEngineProcess extends EventEmitter implements EngineProcess {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly commands: string[] = [];
  /** Output for each "go", in order */
  goReplies: string[][] = [];
  /** Ignore "uci" entirely */
  silent = false;
  onGo: (() => void) | null = null;
  killed = false;
  private buffer = '';

  constructor() {
    super();
    this.stdin.setEncoding('utf-8');
    this.stdin.on('data', (chunk: string) => {
      this.buffer += chunk;
      const lines = this.buffer.split('\n');
      this.buffer = lines.pop() ?? '';
      for (const line of lines) this.handle(line);
    });
  }

  kill(): boolean {
    this.killed = true;
    this.emit('exit', null);
    return true;
  }

  private handle(command: string): void {
    this.commands.push(command);
    if (command === 'uci' && !this.silent) {
      this.reply('id name FakeFish 1.0', 'id author nobody', 'uciok');
    } else if (command === 'isready') {
      this.reply('readyok');
    } else if (command.startsWith('go')) {
      if (this.onGo) {
        this.onGo();
        return;
      }
      this.reply(...(this.goReplies.shift() ?? ['bestmove (none)']));
    } else if (command === 'quit') {
      setImmediate(() => this.emit('exit', 0));
    }
  }

  private reply(...lines: string[]): void {
    this.stdout.write(lines.map(line => `${line}\n`).join(''));
  }
}

function createEngine(proc: FakeEngineProcess, options: Record<string, string | number | boolean> = {}) {
  return new UciEngine({
    path: 'fakefish',
    options,
    startTimeoutMs: 200,
    commandTimeoutMs: 200,
    quitTimeoutMs: 100,
    spawn: () => proc,
  });
}

// =============================================================================
// Parser
// =============================================================================

describe('parseInfoLine', () => {
  it('should read a full multi-PV line', () => {
    const info = parseInfoLine('info depth 12 seldepth 18 multipv 2 score cp -35 nodes 12345 nps 100000 time 123 pv e7e5 g1f3');
    expect(info).toEqual({
      multipv: 2,
      depth: 12,
      seldepth: 18,
      score: { kind: 'cp', value: -35 },
      bound: undefined,
      pv: ['e7e5', 'g1f3'],
      nodes: 12345,
      nps: 100000,
      tbhits: undefined,
      timeMs: 123,
    });
  });

  it('should default multipv to 1 and read mate scores', () => {
    const info = parseInfoLine('info depth 20 score mate -3 pv a1a2');
    expect(info?.multipv).toBe(1);
    expect(info?.score).toEqual({ kind: 'mate', value: -3 });
  });

  it('should mark aspiration bounds', () => {
    expect(parseInfoLine('info depth 5 score cp 20 lowerbound pv e2e4')?.bound).toBe('lower');
    expect(parseInfoLine('info depth 5 score cp 20 upperbound pv e2e4')?.bound).toBe('upper');
  });

  it('should skip lines without a score', () => {
    expect(parseInfoLine('info currmove e2e4 currmovenumber 1')).toBeNull();
    expect(parseInfoLine('info string NNUE evaluation enabled')).toBeNull();
    expect(parseInfoLine('bestmove e2e4')).toBeNull();
  });
});

describe('parseBestMove', () => {
  it('should read the move and ponder move', () => {
    expect(parseBestMove('bestmove e2e4 ponder e7e5')).toEqual({ move: 'e2e4', ponder: 'e7e5' });
    expect(parseBestMove('bestmove g1f3')).toEqual({ move: 'g1f3', ponder: null });
  });

  it('should return a null move when there is none', () => {
    expect(parseBestMove('bestmove (none)')?.move).toBeNull();
    expect(parseBestMove('bestmove 0000')?.move).toBeNull();
    expect(parseBestMove('readyok')).toBeNull();
  });
});

describe('UCI commands', () => {
  it('should build position and go commands', () => {
    expect(positionCommand('8/8/8/8/8/8/8/K6k w - - 0 1')).toBe('position fen 8/8/8/8/8/8/8/K6k w - - 0 1');
    expect(positionCommand(STARTING_FEN, ['e2e4'])).toBe(`position fen ${STARTING_FEN} moves e2e4`);
    expect(goCommand({ depth: 10 })).toBe('go depth 10');
    expect(goCommand({ movetimeMs: 300 })).toBe('go movetime 300');
  });
});

// =============================================================================
// UciEngine
// =============================================================================

describe('UciEngine', () => {
  let engine: UciEngine | null = null;

  afterEach(async () => {
    await engine?.quit();
    engine = null;
  });

  it('should complete the handshake and apply options', async () => {
    const proc = new FakeEngineProcess();
    engine = createEngine(proc, { Threads: 2, SyzygyPath: '/tb' });
    await engine.start();

    expect(engine.name).toBe('FakeFish 1.0');
    expect(engine.isRunning).toBe(true);
    expect(proc.commands).toEqual([
      'uci',
      'setoption name Threads value 2',
      'setoption name SyzygyPath value /tb',
      'isready',
    ]);
  });

  it('should play the best move at a depth', async () => {
    const proc = new FakeEngineProcess();
    proc.goReplies.push(['info depth 8 score cp 25 pv e2e4', 'bestmove e2e4 ponder e7e5']);
    engine = createEngine(proc);
    await engine.start();

    await expect(engine.play(STARTING_FEN, { depth: 8 })).resolves.toBe('e2e4');
    expect(proc.commands).toContain(`position fen ${STARTING_FEN}`);
    expect(proc.commands).toContain('go depth 8');
  });

  it('should return null when the engine has no move', async () => {
    const proc = new FakeEngineProcess();
    proc.goReplies.push(['bestmove (none)']);
    engine = createEngine(proc);
    await engine.start();

    await expect(engine.play('k7/8/1Q6/8/8/8/8/7K b - - 0 1', { depth: 5 })).resolves.toBeNull();
  });

  it('should keep the last line per PV index', async () => {
    const proc = new FakeEngineProcess();
    proc.goReplies.push([
      'info depth 1 multipv 1 score cp 10 pv e2e4',
      'info depth 1 multipv 2 score cp 5 pv d2d4',
      'info depth 2 multipv 1 score cp 30 pv e2e4 e7e5',
      'info depth 2 multipv 2 score cp 20 pv d2d4',
      'info depth 3 multipv 1 score cp 99 lowerbound pv g1f3',
      'bestmove e2e4',
    ]);
    engine = createEngine(proc);
    await engine.start();

    const lines = await engine.analyse(STARTING_FEN, { movetimeMs: 50 }, 2);
    expect(lines.map(l => [l.multipv, l.depth, l.score, l.pv])).toEqual([
      [1, 2, { kind: 'cp', value: 30 }, ['e2e4', 'e7e5']],
      [2, 2, { kind: 'cp', value: 20 }, ['d2d4']],
    ]);
    expect(proc.commands).toContain('setoption name MultiPV value 2');
    expect(proc.commands).toContain('go movetime 50');
  });

  it('should set MultiPV only when it changes', async () => {
    const proc = new FakeEngineProcess();
    proc.goReplies.push(['bestmove e2e4'], ['bestmove e2e4']);
    engine = createEngine(proc);
    await engine.start();

    await engine.analyse(STARTING_FEN, { movetimeMs: 10 }, 3);
    await engine.analyse(STARTING_FEN, { movetimeMs: 10 }, 3);
    expect(proc.commands.filter(c => c.startsWith('setoption name MultiPV'))).toEqual(['setoption name MultiPV value 3']);
  });

  it('should run concurrent requests one after the other', async () => {
    const proc = new FakeEngineProcess();
    proc.goReplies.push(['bestmove e2e4'], ['bestmove d2d4']);
    engine = createEngine(proc);
    await engine.start();

    const [first, second] = await Promise.all([
      engine.play(STARTING_FEN, { depth: 1 }),
      engine.play(STARTING_FEN, { depth: 2 }),
    ]);
    expect([first, second]).toEqual(['e2e4', 'd2d4']);

    const sequence = proc.commands.filter(c => c.startsWith('go') || c.startsWith('position'));
    expect(sequence).toEqual([
      `position fen ${STARTING_FEN}`,
      'go depth 1',
      `position fen ${STARTING_FEN}`,
      'go depth 2',
    ]);
  });

  it('should fail the start when the engine never answers', async () => {
    const proc = new FakeEngineProcess();
    proc.silent = true;
    engine = createEngine(proc);

    await expect(engine.start()).rejects.toThrow('Engine did not answer "uci handshake" within 200ms');
    expect(proc.killed).toBe(true);
    expect(engine.isRunning).toBe(false);
  });

  it('should report a binary that cannot be spawned', async () => {
    engine = new UciEngine({
      path: 'missing-engine',
      spawn: () => {
        throw new Error('spawn missing-engine ENOENT');
      },
    });
    await expect(engine.start()).rejects.toThrow('Cannot start engine missing-engine: spawn missing-engine ENOENT');
  });

  it('should reject a search when the engine dies', async () => {
    const proc = new FakeEngineProcess();
    engine = createEngine(proc);
    await engine.start();
    proc.onGo = () => proc.emit('exit', 1);

    const search = engine.play(STARTING_FEN, { depth: 10 });
    await expect(search).rejects.toBeInstanceOf(EngineError);
    await expect(search).rejects.toThrow('Engine exited with code 1');
    await expect(engine.play(STARTING_FEN, { depth: 1 })).rejects.toThrow('Engine is not running');
  });

  it('should fail queued requests at once when the engine dies', async () => {
    const proc = new FakeEngineProcess();
    engine = new UciEngine({ path: 'fakefish', commandTimeoutMs: 60000, spawn: () => proc });
    await engine.start();
    proc.onGo = () => proc.emit('exit', 1);

    const first = engine.play(STARTING_FEN, { depth: 10 });
    const second = engine.play(STARTING_FEN, { depth: 10 });
    const third = engine.analyse(STARTING_FEN, { movetimeMs: 100 }, 3);

    await expect(first).rejects.toThrow('Engine exited with code 1');
    await expect(second).rejects.toThrow('Engine is not running');
    await expect(third).rejects.toBeInstanceOf(EngineError);
    expect(proc.commands.filter(command => command.startsWith('go'))).toHaveLength(1);
  });

  it('should send quit and stop running', async () => {
    const proc = new FakeEngineProcess();
    engine = createEngine(proc);
    await engine.start();

    await engine.quit();
    expect(proc.commands[proc.commands.length - 1]).toBe('quit');
    expect(engine.isRunning).toBe(false);
    await engine.quit();
  });
});

/**
 * UciEngine - UCI engine subprocess adapter
 *
 * Starts an engine binary, speaks the UCI line protocol over its stdio and
 * exposes the two requests the front-ends need: `play` (best move under a
 * depth or movetime limit) and `analyse` (multi-PV search). Requests are
 * queued, so a search never interleaves with another on the wire.
 */

import { spawn } from 'node:child_process';
import { EventEmitter } from 'node:events';
import type { Readable, Writable } from 'node:stream';
import { EngineError, describeError } from '../core/errors.js';
import type { AnalysisLine } from '../chess/types.js';
import {
  type InfoLine,
  type SearchLimit,
  goCommand,
  parseBestMove,
  parseInfoLine,
  positionCommand,
} from './uciParser.js';

/** The part of ChildProcess the adapter uses */
export interface EngineProcess extends EventEmitter {
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnFn = (path: string, args: string[]) => EngineProcess;

export type EngineOptionValue = string | number | boolean;

export interface UciEngineOptions {
  /** Engine binary */
  path: string;
  args?: string[];
  /** UCI options applied after the handshake (e.g. Threads, Hash, SyzygyPath) */
  options?: Record<string, EngineOptionValue>;
  /** Time allowed for the uci/uciok handshake (default: 10000) */
  startTimeoutMs?: number;
  /** Extra time allowed beyond a search's own limit (default: 30000) */
  commandTimeoutMs?: number;
  /** Time allowed for the process to exit after "quit" (default: 1000) */
  quitTimeoutMs?: number;
  /** Log every line sent and received */
  verbose?: boolean;
  spawn?: SpawnFn;
}

/**
 * Requests the front-ends make of an engine. Sessions depend on this
 * interface so tests can supply a scripted engine.
 */
export interface ChessEngine {
  play(fen: string, limit: SearchLimit): Promise<string | null>;
  analyse(fen: string, limit: SearchLimit, multiPv?: number): Promise<AnalysisLine[]>;
  quit(): Promise<void>;
}

interface Waiter {
  onLine: (line: string) => void;
  onFailure: (err: EngineError) => void;
}

const defaultSpawn: SpawnFn = (path, args) => spawn(path, args, { stdio: ['pipe', 'pipe', 'pipe'] });

export class UciEngine implements ChessEngine {
  private proc: EngineProcess | null = null;
  private outputBuffer = '';
  private waiters: Set<Waiter> = new Set();
  private queue: Promise<unknown> = Promise.resolve();
  private currentMultiPv = 1;
  private exited = false;
  private readonly opts: Required<UciEngineOptions>;

  /** Engine name from "id name", once started */
  name: string | null = null;

  constructor(options: UciEngineOptions) {
    this.opts = {
      path: options.path,
      args: options.args ?? [],
      options: options.options ?? {},
      startTimeoutMs: options.startTimeoutMs ?? 10000,
      commandTimeoutMs: options.commandTimeoutMs ?? 30000,
      quitTimeoutMs: options.quitTimeoutMs ?? 1000,
      verbose: options.verbose ?? false,
      spawn: options.spawn ?? defaultSpawn,
    };
  }

  get isRunning(): boolean {
    return this.proc !== null && !this.exited;
  }

  /**
   * Spawn the engine and complete the UCI handshake
   * @throws EngineError when the binary cannot be started or does not answer
   */
  async start(): Promise<void> {
    if (this.proc) return;

    let proc: EngineProcess;
    try {
      proc = this.opts.spawn(this.opts.path, this.opts.args);
    } catch (err) {
      throw new EngineError(`Cannot start engine ${this.opts.path}: ${describeError(err)}`, { cause: err });
    }
    this.proc = proc;
    this.exited = false;

    proc.stdout?.on('data', (data: Buffer | string) => this.handleOutput(String(data)));
    proc.stderr?.on('data', (data: Buffer | string) => {
      console.error('[UCI] stderr:', String(data).trim());
    });
    proc.stdin?.on('error', (err: Error) => {
      this.fail(new EngineError(`Engine input closed: ${err.message}`, { cause: err }));
    });
    proc.on('error', (err: Error) => {
      this.exited = true;
      this.fail(new EngineError(`Cannot start engine ${this.opts.path}: ${err.message}`, { cause: err }));
    });
    proc.on('exit', (code: number | null) => {
      this.exited = true;
      this.fail(new EngineError(`Engine exited with code ${code}`));
    });

    const handshake = this.waitFor(
      line => line === 'uciok',
      this.opts.startTimeoutMs,
      'uci handshake',
      line => {
        if (line.startsWith('id name ')) this.name = line.slice('id name '.length);
      }
    );
    this.send('uci');
    try {
      await handshake;
      for (const [name, value] of Object.entries(this.opts.options)) {
        this.setOption(name, value);
      }
      await this.sync(this.opts.startTimeoutMs);
    } catch (err) {
      this.kill();
      throw err;
    }
    console.log(`[UCI] Engine ready: ${this.name ?? this.opts.path}`);
  }

  /**
   * Best move under the limit, in UCI; null when the side to move has none
   */
  play(fen: string, limit: SearchLimit): Promise<string | null> {
    return this.enqueue(async () => {
      const best = await this.search(fen, limit);
      return parseBestMove(best)?.move ?? null;
    });
  }

  /**
   * Multi-PV search. Returns the last scored line per PV index, ordered by
   * index.
   */
  analyse(fen: string, limit: SearchLimit, multiPv: number = 1): Promise<AnalysisLine[]> {
    return this.enqueue(async () => {
      if (multiPv !== this.currentMultiPv) {
        this.setOption('MultiPV', multiPv);
        this.currentMultiPv = multiPv;
      }

      const lines: Map<number, InfoLine> = new Map();
      await this.search(fen, limit, line => {
        const info = parseInfoLine(line);
        if (!info) return;
        if (info.bound && lines.has(info.multipv)) return;
        lines.set(info.multipv, info);
      });

      return [...lines.values()]
        .filter(info => info.multipv <= multiPv)
        .sort((a, b) => a.multipv - b.multipv);
    });
  }

  /**
   * Send "quit", then kill the process if it has not exited in time.
   * Safe to call more than once.
   */
  async quit(): Promise<void> {
    const proc = this.proc;
    if (!proc) return;

    if (!this.exited) {
      const exited = new Promise<void>(resolve => {
        const timer = setTimeout(resolve, this.opts.quitTimeoutMs);
        proc.once('exit', () => {
          clearTimeout(timer);
          resolve();
        });
      });
      this.send('quit');
      await exited;
    }

    this.kill();
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async search(fen: string, limit: SearchLimit, onLine?: (line: string) => void): Promise<string> {
    this.send(positionCommand(fen));
    // Any bestmove from an earlier, abandoned search arrives before readyok
    await this.sync(this.opts.commandTimeoutMs);

    const budget = ('movetimeMs' in limit ? limit.movetimeMs : 0) + this.opts.commandTimeoutMs;
    const best = this.waitFor(line => line.startsWith('bestmove'), budget, goCommand(limit), onLine);
    this.send(goCommand(limit));
    try {
      return await best;
    } catch (err) {
      if (this.isRunning) this.send('stop');
      throw err;
    }
  }

  private async sync(timeoutMs: number): Promise<void> {
    const ready = this.waitFor(line => line === 'readyok', timeoutMs, 'isready');
    this.send('isready');
    await ready;
  }

  private setOption(name: string, value: EngineOptionValue): void {
    this.send(`setoption name ${name} value ${String(value)}`);
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    if (!this.isRunning) {
      return Promise.reject(new EngineError('Engine is not running'));
    }
    const run = this.queue.then(task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  private send(command: string): void {
    if (!this.proc?.stdin || this.exited) return;
    if (this.opts.verbose) console.log('[UCI] →', command);
    this.proc.stdin.write(`${command}\n`);
  }

  private handleOutput(data: string): void {
    this.outputBuffer += data;
    const lines = this.outputBuffer.split(/\r?\n/);
    this.outputBuffer = lines.pop() ?? '';

    for (const raw of lines) {
      const line = raw.trim();
      if (!line) continue;
      if (this.opts.verbose) console.log('[UCI] ←', line);
      for (const waiter of [...this.waiters]) {
        waiter.onLine(line);
      }
    }
  }

  private waitFor(
    predicate: (line: string) => boolean,
    timeoutMs: number,
    label: string,
    onLine?: (line: string) => void
  ): Promise<string> {
    if (!this.proc || this.exited) {
      return Promise.reject(new EngineError('Engine is not running'));
    }
    return new Promise((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timer);
        this.waiters.delete(waiter);
      };
      const waiter: Waiter = {
        onLine: line => {
          onLine?.(line);
          if (predicate(line)) {
            cleanup();
            resolve(line);
          }
        },
        onFailure: err => {
          cleanup();
          reject(err);
        },
      };
      const timer = setTimeout(() => {
        cleanup();
        reject(new EngineError(`Engine did not answer "${label}" within ${timeoutMs}ms`));
      }, timeoutMs);
      this.waiters.add(waiter);
    });
  }

  private fail(err: EngineError): void {
    for (const waiter of [...this.waiters]) {
      waiter.onFailure(err);
    }
  }

  private kill(): void {
    if (this.proc && !this.exited) {
      this.proc.kill();
    }
    this.exited = true;
    this.proc = null;
  }
}

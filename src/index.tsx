#!/usr/bin/env node
import React from 'react';
import { render, useApp } from 'ink';
import meow from 'meow';
import { loadConfig } from './core/config.js';
import type { KibitzConfig } from './core/config.js';
import { ConfigError, describeError } from './core/errors.js';
import { clearStateFile, setFileLoggingEnabled } from './core/GameStateLogger.js';
import { createServices, disposeServices } from './services/AppServices.js';
import type { AppServices } from './services/AppServices.js';
import KibitzHub from './ui/KibitzHub.js';
import AnalysisTerminal from './ui/screens/AnalysisTerminal.js';

// ============================================================
// ANSI Escape Codes for Terminal Control
// ============================================================
const ANSI = {
  CLEAR_SCREEN: '\x1b[2J',
  CURSOR_HOME: '\x1b[H',
  CURSOR_HIDE: '\x1b[?25l',
  CURSOR_SHOW: '\x1b[?25h',
  // Alternate screen buffer keeps the shell's scrollback clean
  ALT_BUFFER_ON: '\x1b[?1049h',
  ALT_BUFFER_OFF: '\x1b[?1049l',
  SCROLL_REGION_FULL: '\x1b[r',
  SET_TITLE: (title: string) => `\x1b]0;${title}\x07`,
};

// ============================================================
// Stream Guard - keeps console output from tearing the TUI
// ============================================================
const originalConsoleLog = console.log;
const originalConsoleError = console.error;
const originalConsoleWarn = console.warn;

const logsBuffer: string[] = [];

const guardStreams = () => {
  console.log = (...args: unknown[]) => {
    logsBuffer.push(args.map(String).join(' '));
  };
  console.warn = (...args: unknown[]) => {
    logsBuffer.push(`[WARN] ${args.map(String).join(' ')}`);
  };
  console.error = (...args: unknown[]) => {
    logsBuffer.push(`[ERROR] ${args.map(String).join(' ')}`);
  };
};

const restoreStreams = () => {
  console.log = originalConsoleLog;
  console.error = originalConsoleError;
  console.warn = originalConsoleWarn;
};

const cli = meow(`
	Usage
	  $ kibitz [terminal|hub] [options]

	Commands
	  hub            Menu with engine games, review, puzzles, online play (default)
	  terminal       Type moves against the engine with live analysis

	Options
	  --engine <path>      UCI engine binary (default: stockfish)
	  --syzygy <dir>       Syzygy tablebase directory, enables tablebase probing
	  --multipv <n>        Number of analysis lines (default: 3)
	  --color <w|b>        Side you play in the terminal (default: w)
	  --server <host:port> Online play server (default: localhost:5555)
	  --user <name>        Online user name
	  --password <pw>      Online password
	  --db <file>          Statistics database (default: ~/.kibitz/kibitz.db)
	  --config <file>      JSON config file (default: ~/.kibitz/config.json)
	  --no-file            Do not write kibitz-state.txt
	  --verbose            Print all buffered log lines on exit, not only errors

	Environment
	  KIBITZ_ENGINE, KIBITZ_SYZYGY, KIBITZ_SERVER, KIBITZ_USER, KIBITZ_PASSWORD

	Examples
	  $ kibitz
	  $ kibitz terminal --engine /usr/bin/stockfish --color b
	  $ kibitz hub --server chess.example.org:5555 --user alice
`, {
  importMeta: import.meta,
  flags: {
    engine: { type: 'string' },
    syzygy: { type: 'string' },
    multipv: { type: 'number' },
    color: { type: 'string' },
    server: { type: 'string' },
    user: { type: 'string' },
    password: { type: 'string' },
    db: { type: 'string' },
    config: { type: 'string' },
    file: { type: 'boolean', default: true },
    verbose: { type: 'boolean', default: false },
  },
});

type Mode = 'hub' | 'terminal';

function parseMode(input: string[]): Mode {
  const command = input[0] ?? 'hub';
  if (command === 'hub' || command === 'terminal') return command;
  throw new ConfigError(`Unknown command "${command}". Use "hub" or "terminal".`);
}

// ============================================================
// Fullscreen Mode
// ============================================================
const initFullscreen = (title: string) => {
  process.stdout.write(ANSI.ALT_BUFFER_ON);
  process.stdout.write(ANSI.CURSOR_HIDE);
  process.stdout.write(ANSI.CLEAR_SCREEN + ANSI.CURSOR_HOME);
  process.stdout.write(ANSI.SCROLL_REGION_FULL);
  process.stdout.write(ANSI.SET_TITLE(`${title} [${process.pid}]`));
};

const exitFullscreen = () => {
  process.stdout.write(ANSI.CURSOR_SHOW);
  process.stdout.write(ANSI.ALT_BUFFER_OFF);
};

function prepare(): { mode: Mode; config: KibitzConfig } {
  const mode = parseMode(cli.input);
  const { config: configFile, verbose: _verbose, ...flags } = cli.flags;
  const config = loadConfig({ flags, configFile });
  return { mode, config };
}

async function main(): Promise<void> {
  let mode: Mode;
  let config: KibitzConfig;
  try {
    ({ mode, config } = prepare());
  } catch (err) {
    console.error(err instanceof ConfigError ? err.message : `Startup failed: ${describeError(err)}`);
    process.exitCode = 1;
    return;
  }

  setFileLoggingEnabled(config.ui.stateFile);

  const services: AppServices = await createServices(config);

  let cleanedUp = false;
  const cleanupSync = () => {
    if (cleanedUp) return;
    cleanedUp = true;
    clearStateFile();
    exitFullscreen();
    restoreStreams();
  };

  process.on('exit', cleanupSync);
  process.on('SIGINT', () => { cleanupSync(); process.exit(0); });
  process.on('SIGTERM', () => { cleanupSync(); process.exit(0); });
  process.on('uncaughtException', err => {
    cleanupSync();
    console.error('Uncaught exception:', err);
    process.exit(1);
  });

  initFullscreen(mode === 'terminal' ? 'kibitz terminal' : 'kibitz');
  guardStreams();

  const inkInstance = render(
    mode === 'terminal'
      ? <TerminalApp services={services} />
      : <KibitzHub services={services} />,
    { patchConsole: false }
  );

  await inkInstance.waitUntilExit();
  await disposeServices(services);
  cleanupSync();

  for (const line of logsBuffer) {
    if (cli.flags.verbose || line.startsWith('[ERROR]')) console.log(line);
  }
  process.exit(0);
}

function TerminalApp({ services }: { services: AppServices }) {
  const { exit } = useApp();
  return <AnalysisTerminal services={services} onExit={exit} />;
}

main().catch(err => {
  restoreStreams();
  exitFullscreen();
  console.error('[kibitz] Fatal:', describeError(err));
  process.exit(1);
});

#!/usr/bin/env node
/**
 * kibitz match server CLI
 *
 * Standalone server for online play between two kibitz clients.
 *
 * Usage:
 *   kibitz-server                    # Listen on port 5555
 *   kibitz-server --port 6000        # Custom port
 *   kibitz-server --accounts a.json  # Only accept listed accounts
 *
 * @module online/cli
 */

import fs from 'node:fs';
import meow from 'meow';
import { z } from 'zod';
import { describeError } from '../core/errors.js';
import { DEFAULT_SERVER_PORT } from './protocol.js';
import { MatchServer } from './server.js';

const cli = meow(`
	Usage
	  $ kibitz-server [options]

	Options
	  --port, -p      Port to listen on (default: ${DEFAULT_SERVER_PORT})
	  --host          Interface to bind (default: all)
	  --accounts      JSON file mapping user names to passwords
	  --verbose, -v   Log every received line

	Protocol
	  Newline-terminated lines, fields separated by "|":
	    LOGIN|<user>|<password>      -> OK|... or ERROR|...
	    START_MATCH                  -> MATCH_FOUND|<white|black>|<opponent>
	    MOVE|<opponent>|<uci>        -> opponent receives OPPONENT_MOVE|<uci>
	    GAME_OVER|<user>|<opp>|<res> -> opponent receives the same line
`, {
  importMeta: import.meta,
  flags: {
    port: { type: 'number', shortFlag: 'p', default: DEFAULT_SERVER_PORT },
    host: { type: 'string' },
    accounts: { type: 'string' },
    verbose: { type: 'boolean', shortFlag: 'v', default: false },
  },
});

const AccountsSchema = z.record(z.string());

function readAccounts(file: string): Record<string, string> {
  const parsed = AccountsSchema.safeParse(JSON.parse(fs.readFileSync(file, 'utf-8')));
  if (!parsed.success) {
    throw new Error(`${file} must map user names to password strings`);
  }
  return parsed.data;
}

async function main(): Promise<void> {
  const { port, host, accounts, verbose } = cli.flags;

  const server = new MatchServer({
    port,
    host,
    accounts: accounts ? readAccounts(accounts) : undefined,
    verbose,
  });

  server.on('login', (username: string) => {
    console.log(`[+] ${username} logged in (${server.playerCount} online)`);
  });
  server.on('left', (username: string) => {
    console.log(`[-] ${username} left`);
  });
  server.on('matched', (white: string, black: string) => {
    console.log(`[GAME] ${white} (white) vs ${black} (black)`);
  });
  server.on('move', (from: string, to: string, uci: string) => {
    if (verbose) console.log(`[GAME] ${from} -> ${to}: ${uci}`);
  });
  server.on('gameOver', (player: string, opponent: string, result: string) => {
    console.log(`[GAME] ${player} vs ${opponent}: ${result}`);
  });

  const shutdown = async () => {
    console.log('\n[*] Shutting down server...');
    await server.stop();
    console.log('[*] Server stopped.');
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());

  await server.start();
  console.log(`[*] Listening on ${host ?? '0.0.0.0'}:${server.port}`);
  if (!accounts) {
    console.log('[*] No accounts file: any user name and password are accepted');
  }
}

main().catch((err: unknown) => {
  console.error('[!] Failed to start server:', describeError(err));
  process.exit(1);
});

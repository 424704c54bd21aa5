/**
 * Configuration
 *
 * Defaults, overridden in order by a JSON config file, environment
 * variables and command-line flags. The merged result is validated once
 * at startup.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';

const EngineOptionValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export const KibitzConfigSchema = z.object({
  engine: z.object({
    /** UCI engine binary */
    path: z.string().min(1),
    /** Extra UCI options (Threads, Hash, ...) */
    options: z.record(EngineOptionValueSchema),
    /** Depth of the engine's replies in the analysis terminal */
    terminalDepth: z.number().int().positive(),
    /** Depth of the engine's replies in hub games */
    hubDepth: z.number().int().positive(),
    /** Wall-clock budget of one background analysis */
    analysisTimeMs: z.number().int().positive(),
    /** Principal variations shown in the analysis terminal */
    multiPv: z.number().int().min(1).max(10),
    startTimeoutMs: z.number().int().positive(),
  }),
  tablebase: z.object({
    enabled: z.boolean(),
    /** Local Syzygy directory, passed to the engine as SyzygyPath */
    syzygyPath: z.string().nullable(),
    endpoint: z.string().url(),
    maxPieces: z.number().int().min(3).max(7),
    timeoutMs: z.number().int().positive(),
  }),
  puzzles: z.object({
    url: z.string().url(),
    timeoutMs: z.number().int().positive(),
  }),
  server: z.object({
    host: z.string().min(1),
    port: z.number().int().min(1).max(65535),
    username: z.string(),
    password: z.string(),
    connectTimeoutMs: z.number().int().positive(),
    replyTimeoutMs: z.number().int().positive(),
    matchTimeoutMs: z.number().int().positive(),
  }),
  ui: z.object({
    /** How often the analysis terminal refreshes its analysis */
    refreshIntervalMs: z.number().int().positive(),
    /** Side the human plays in the analysis terminal */
    humanColor: z.enum(['w', 'b']),
    /** Write the state file for external viewers */
    stateFile: z.boolean(),
  }),
  database: z.object({
    /** SQLite file, or ":memory:" */
    path: z.string().min(1),
  }),
});

export type KibitzConfig = z.infer<typeof KibitzConfigSchema>;

export const CONFIG_DIR = path.join(os.homedir(), '.kibitz');
export const DEFAULT_CONFIG_FILE = path.join(CONFIG_DIR, 'config.json');

export const DEFAULT_CONFIG: KibitzConfig = {
  engine: {
    path: 'stockfish',
    options: {},
    terminalDepth: 10,
    hubDepth: 15,
    analysisTimeMs: 300,
    multiPv: 3,
    startTimeoutMs: 10000,
  },
  tablebase: {
    enabled: false,
    syzygyPath: null,
    endpoint: 'https://tablebase.lichess.ovh/standard',
    maxPieces: 7,
    timeoutMs: 5000,
  },
  puzzles: {
    url: 'https://lichess.org/api/puzzle/next',
    timeoutMs: 10000,
  },
  server: {
    host: 'localhost',
    port: 5555,
    username: '',
    password: '',
    connectTimeoutMs: 5000,
    replyTimeoutMs: 5000,
    matchTimeoutMs: 60000,
  },
  ui: {
    refreshIntervalMs: 500,
    humanColor: 'w',
    stateFile: true,
  },
  database: {
    path: path.join(CONFIG_DIR, 'kibitz.db'),
  },
};

/** Values taken from the command line; unset flags are undefined */
export interface ConfigFlags {
  engine?: string;
  syzygy?: string;
  multipv?: number;
  server?: string;
  user?: string;
  password?: string;
  color?: string;
  file?: boolean;
  db?: string;
}

/** A JSON object whose nested values may be partial */
type DeepPartial<T> = { [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K] };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge `override` into `base` section by section. Arrays and scalars
 * replace; objects merge.
 */
export function mergeConfig(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = out[key];
    out[key] = isRecord(current) && isRecord(value) ? mergeConfig(current, value) : value;
  }
  return out;
}

/**
 * "host:port" or "host"
 */
export function parseServerAddress(address: string): { host: string; port?: number } {
  const idx = address.lastIndexOf(':');
  if (idx <= 0) return { host: address };
  const port = parseInt(address.slice(idx + 1), 10);
  if (Number.isNaN(port)) return { host: address };
  return { host: address.slice(0, idx), port };
}

/**
 * Read a JSON config file. A missing default file is not an error; a
 * missing explicit file is.
 * @throws ConfigError
 */
export function readConfigFile(file: string, required: boolean): Record<string, unknown> {
  if (!fs.existsSync(file)) {
    if (required) throw new ConfigError(`Config file not found: ${file}`);
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file ${file} must contain a JSON object`);
  }
  return parsed;
}

function fromEnv(env: NodeJS.ProcessEnv): DeepPartial<KibitzConfig> {
  const server = env.KIBITZ_SERVER ? parseServerAddress(env.KIBITZ_SERVER) : {};
  return {
    engine: { path: env.KIBITZ_ENGINE },
    tablebase: env.KIBITZ_SYZYGY ? { enabled: true, syzygyPath: env.KIBITZ_SYZYGY } : {},
    server: {
      ...server,
      username: env.KIBITZ_USER,
      password: env.KIBITZ_PASSWORD,
    },
  };
}

function fromFlags(flags: ConfigFlags): DeepPartial<KibitzConfig> {
  const server = flags.server ? parseServerAddress(flags.server) : {};
  return {
    engine: { path: flags.engine, multiPv: flags.multipv },
    tablebase: flags.syzygy ? { enabled: true, syzygyPath: flags.syzygy } : {},
    server: { ...server, username: flags.user, password: flags.password },
    ui: {
      humanColor: flags.color === 'b' || flags.color === 'black' ? 'b'
        : flags.color === 'w' || flags.color === 'white' ? 'w'
        : undefined,
      // file defaults to true in the CLI; only --no-file overrides
      stateFile: flags.file === false ? false : undefined,
    },
    database: { path: flags.db },
  };
}

/**
 * Build the effective configuration
 * @throws ConfigError when the merged values do not validate
 */
export function loadConfig(options: {
  flags?: ConfigFlags;
  env?: NodeJS.ProcessEnv;
  configFile?: string;
} = {}): KibitzConfig {
  const fileValues = options.configFile
    ? readConfigFile(options.configFile, true)
    : readConfigFile(DEFAULT_CONFIG_FILE, false);

  let merged = mergeConfig(DEFAULT_CONFIG, fileValues);
  merged = mergeConfig(merged, fromEnv(options.env ?? process.env));
  merged = mergeConfig(merged, fromFlags(options.flags ?? {}));

  const result = KibitzConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(
      'Invalid configuration',
      result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Engine options including SyzygyPath when a local tablebase is configured
 */
export function engineOptions(config: KibitzConfig): Record<string, string | number | boolean> {
  const options = { ...config.engine.options };
  if (config.tablebase.syzygyPath) {
    options.SyzygyPath = config.tablebase.syzygyPath;
  }
  return options;
}

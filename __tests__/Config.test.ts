/**
 * Configuration loading tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  DEFAULT_CONFIG,
  engineOptions,
  loadConfig,
  mergeConfig,
  parseServerAddress,
  readConfigFile,
} from '../src/core/config.js';
import { ConfigError } from '../src/core/errors.js';

describe('mergeConfig', () => {
  it('should merge objects and replace everything else', () => {
    const merged = mergeConfig(
      { a: { b: 1, c: 2 }, d: [1], e: 'keep' },
      { a: { c: 3 }, d: [2], e: undefined }
    );
    expect(merged).toEqual({ a: { b: 1, c: 3 }, d: [2], e: 'keep' });
  });
});

describe('parseServerAddress', () => {
  it('should split host and port', () => {
    expect(parseServerAddress('chess.test:6000')).toEqual({ host: 'chess.test', port: 6000 });
  });

  it('should keep a bare host', () => {
    expect(parseServerAddress('chess.test')).toEqual({ host: 'chess.test' });
    expect(parseServerAddress('chess.test:http')).toEqual({ host: 'chess.test:http' });
  });
});

describe('config files', () => {
  let dir: string;

  const writeConfig = (name: string, content: string): string => {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content, 'utf-8');
    return file;
  };

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'kibitz-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('readConfigFile', () => {
    it('should treat a missing optional file as empty', () => {
      expect(readConfigFile(path.join(dir, 'none.json'), false)).toEqual({});
    });

    it('should fail on a missing explicit file', () => {
      const file = path.join(dir, 'none.json');
      expect(() => readConfigFile(file, true)).toThrow(`Config file not found: ${file}`);
    });

    it('should fail on broken JSON', () => {
      const file = writeConfig('broken.json', '{ "engine": ');
      expect(() => readConfigFile(file, true)).toThrow(`Cannot read config file ${file}: `);
    });

    it('should require an object', () => {
      const file = writeConfig('list.json', '[1, 2]');
      expect(() => readConfigFile(file, true)).toThrow(`Config file ${file} must contain a JSON object`);
    });
  });

  describe('loadConfig', () => {
    it('should start from the defaults', () => {
      const config = loadConfig({ configFile: writeConfig('empty.json', '{}'), env: {} });
      expect(config).toEqual(DEFAULT_CONFIG);
    });

    it('should layer file, environment and flags', () => {
      const configFile = writeConfig('config.json', JSON.stringify({
        engine: { path: '/opt/file-engine', options: { Threads: 4 } },
        server: { port: 6000 },
      }));

      const fromFile = loadConfig({ configFile, env: {} });
      expect(fromFile.engine.path).toBe('/opt/file-engine');
      expect(fromFile.engine.hubDepth).toBe(15);
      expect(fromFile.server).toMatchObject({ host: 'localhost', port: 6000 });

      const env = { KIBITZ_ENGINE: '/opt/env-engine', KIBITZ_SERVER: 'chess.test:7000', KIBITZ_USER: 'alice' };
      const fromEnv = loadConfig({ configFile, env });
      expect(fromEnv.engine.path).toBe('/opt/env-engine');
      expect(fromEnv.server).toMatchObject({ host: 'chess.test', port: 7000, username: 'alice', password: '' });

      const fromFlags = loadConfig({ configFile, env, flags: { engine: '/opt/flag-engine', server: 'other.test' } });
      expect(fromFlags.engine.path).toBe('/opt/flag-engine');
      expect(fromFlags.server).toMatchObject({ host: 'other.test', port: 7000 });
    });

    it('should map the remaining flags', () => {
      const config = loadConfig({
        configFile: writeConfig('empty.json', '{}'),
        env: {},
        flags: { color: 'black', file: false, multipv: 5, syzygy: '/data/syzygy', db: ':memory:', password: 'test-secret' },
      });
      expect(config.ui.humanColor).toBe('b');
      expect(config.ui.stateFile).toBe(false);
      expect(config.engine.multiPv).toBe(5);
      expect(config.tablebase).toMatchObject({ enabled: true, syzygyPath: '/data/syzygy' });
      expect(config.database.path).toBe(':memory:');
      expect(config.server.password).toBe('test-secret');
    });

    it('should keep the state file setting from the config file unless --no-file is given', () => {
      const configFile = writeConfig('nofile.json', JSON.stringify({ ui: { stateFile: false } }));
      expect(loadConfig({ configFile, env: {}, flags: { file: true } }).ui.stateFile).toBe(false);

      const enabled = writeConfig('empty.json', '{}');
      expect(loadConfig({ configFile: enabled, env: {}, flags: { file: true } }).ui.stateFile).toBe(true);
      expect(loadConfig({ configFile: enabled, env: {}, flags: { file: false } }).ui.stateFile).toBe(false);
    });

    it('should list every invalid value', () => {
      const configFile = writeConfig('bad.json', JSON.stringify({
        engine: { multiPv: 20 },
        server: { port: 'high' },
      }));

      const error = (() => {
        try {
          loadConfig({ configFile, env: {} });
        } catch (err) {
          return err;
        }
        return null;
      })();

      expect(error).toBeInstanceOf(ConfigError);
      const issues = error instanceof ConfigError ? error.issues : [];
      expect(issues).toHaveLength(2);
      expect(issues[0].startsWith('engine.multiPv: ')).toBe(true);
      expect(issues[1].startsWith('server.port: ')).toBe(true);
      expect(error instanceof Error && error.message.startsWith('Invalid configuration\n  - engine.multiPv: ')).toBe(true);
    });
  });
});

describe('engineOptions', () => {
  it('should add SyzygyPath for a local tablebase', () => {
    const config = {
      ...DEFAULT_CONFIG,
      engine: { ...DEFAULT_CONFIG.engine, options: { Threads: 2 } },
      tablebase: { ...DEFAULT_CONFIG.tablebase, syzygyPath: '/data/syzygy' },
    };
    expect(engineOptions(config)).toEqual({ Threads: 2, SyzygyPath: '/data/syzygy' });
    expect(engineOptions(DEFAULT_CONFIG)).toEqual({});
  });
});

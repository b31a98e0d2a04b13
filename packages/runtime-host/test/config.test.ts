/**
 * Stratum Runtime Host — Configuration Resolution Tests
 *
 * Precedence for both values: option → env var → OS config file → default.
 *
 * Isolation: every test points configPath at a temp file, and STRATUM_HOME
 * and STRATUM_POLICY_DIR are saved and restored around each test.
 */

import { describe, it, expect, afterEach, beforeEach } from 'vitest';
import { mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir, tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { ConfigError, readOsConfig, resolveConfig, writeOsConfig } from '../src/config.js';

// ---------------------------------------------------------------------------
// Env var save/restore
// ---------------------------------------------------------------------------

const ENV_KEYS = ['STRATUM_HOME', 'STRATUM_POLICY_DIR'] as const;
const saved = new Map<string, string | undefined>();

beforeEach(() => {
  for (const key of ENV_KEYS) {
    saved.set(key, process.env[key]);
    delete process.env[key];
  }
});

afterEach(() => {
  for (const key of ENV_KEYS) {
    const value = saved.get(key);
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
});

let root = '';
let configPath = '';

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'stratum-config-'));
  configPath = join(root, 'config', 'config.json');
});

function writeConfigFile(content: string): void {
  writeOsConfig({}, configPath);
  writeFileSync(configPath, content, 'utf-8');
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('resolveConfig precedence', () => {
  it('prefers explicit options over everything else', () => {
    process.env['STRATUM_HOME'] = join(root, 'env-home');
    writeConfigFile(JSON.stringify({ home: join(root, 'file-home') }));

    const config = resolveConfig({ policyDir: join(root, 'opt-policies'), home: join(root, 'opt-home'), configPath });

    expect(config).toEqual({
      policyDir: join(root, 'opt-policies'),
      home: join(root, 'opt-home'),
      sources: { policyDir: 'option', home: 'option' },
    });
  });

  it('uses the env vars when no option is given', () => {
    process.env['STRATUM_HOME'] = join(root, 'env-home');
    process.env['STRATUM_POLICY_DIR'] = join(root, 'env-policies');
    writeConfigFile(JSON.stringify({ home: join(root, 'file-home') }));

    const config = resolveConfig({ configPath });

    expect(config.home).toBe(join(root, 'env-home'));
    expect(config.policyDir).toBe(join(root, 'env-policies'));
    expect(config.sources).toEqual({ policyDir: 'env', home: 'env' });
  });

  it('ignores empty values', () => {
    process.env['STRATUM_HOME'] = '';

    const config = resolveConfig({ home: '', cwd: root, configPath });

    expect(config.sources.home).toBe('default');
  });

  it('falls back to the OS config file', () => {
    writeConfigFile(JSON.stringify({ policyDir: join(root, 'file-policies'), home: join(root, 'file-home') }));

    const config = resolveConfig({ configPath });

    expect(config.policyDir).toBe(join(root, 'file-policies'));
    expect(config.home).toBe(join(root, 'file-home'));
    expect(config.sources).toEqual({ policyDir: 'config-file', home: 'config-file' });
  });

  it('defaults to <cwd>/policies and ~/.stratum', () => {
    const config = resolveConfig({ cwd: root, configPath });

    expect(config.policyDir).toBe(join(root, 'policies'));
    expect(config.home).toBe(join(homedir(), '.stratum'));
    expect(config.sources).toEqual({ policyDir: 'default', home: 'default' });
  });

  it('resolves relative values against cwd', () => {
    const config = resolveConfig({ policyDir: 'rules', home: 'state', cwd: root, configPath });

    expect(config.policyDir).toBe(resolve(root, 'rules'));
    expect(config.home).toBe(resolve(root, 'state'));
  });
});

describe('OS config file', () => {
  it('is empty when the file does not exist', () => {
    expect(readOsConfig(configPath)).toEqual({});
  });

  it('rejects a file that is not valid JSON', () => {
    writeConfigFile('{ home: ');

    expect(() => resolveConfig({ cwd: root, configPath })).toThrow(ConfigError);
  });

  it('rejects a value of the wrong type', () => {
    writeConfigFile(JSON.stringify({ home: 42 }));

    expect(() => readOsConfig(configPath)).toThrow(`${configPath}: "home" must be a non-empty string`);
  });

  it('is not read when options and env supply both values', () => {
    writeConfigFile('not json');
    process.env['STRATUM_POLICY_DIR'] = join(root, 'env-policies');

    expect(resolveConfig({ home: join(root, 'opt-home'), configPath }).sources).toEqual({
      policyDir: 'env',
      home: 'option',
    });
  });

  it('persists explicit options, keeping existing values', () => {
    writeConfigFile(JSON.stringify({ home: join(root, 'kept-home') }));

    resolveConfig({ policyDir: join(root, 'chosen'), persist: true, configPath });

    expect(JSON.parse(readFileSync(configPath, 'utf-8'))).toEqual({
      home: join(root, 'kept-home'),
      policyDir: join(root, 'chosen'),
    });
  });
});

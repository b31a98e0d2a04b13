/**
 * Stratum Runtime Host — Configuration Resolution
 *
 * Resolves the two locations Stratum needs, each with the same precedence:
 *
 *   policy directory                      home (state and logs)
 *   1. opts.policyDir (--policies)        1. opts.home (--home)
 *   2. STRATUM_POLICY_DIR                 2. STRATUM_HOME
 *   3. OS config file `policyDir`         3. OS config file `home`
 *   4. <cwd>/policies                     4. ~/.stratum
 *
 * Relative values are resolved against `cwd`. The home directory is not
 * created here; FileStateIO creates its subdirectories on first write.
 */

import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir, platform } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import { isNodeError } from './state/state-io.js';

// ---------------------------------------------------------------------------
// OS config file
// ---------------------------------------------------------------------------

/** Values persisted in the OS config file. Both are optional. */
export interface StratumOsConfig {
  readonly policyDir?: string;
  readonly home?: string;
}

/** The OS config file exists but cannot be used. */
export class ConfigError extends Error {
  constructor(readonly configPath: string, message: string) {
    super(`${configPath}: ${message}`);
    this.name = 'ConfigError';
  }
}

/**
 * Platform-specific location of the Stratum config file.
 *
 *   macOS:   ~/Library/Preferences/stratum/config.json
 *   Windows: %APPDATA%\stratum\config.json (fallback ~/AppData/Roaming)
 *   Linux:   ~/.config/stratum/config.json
 */
export function getOsConfigPath(): string {
  const home = homedir();
  switch (platform()) {
    case 'darwin':
      return join(home, 'Library', 'Preferences', 'stratum', 'config.json');
    case 'win32': {
      const appData = process.env['APPDATA'] ?? join(home, 'AppData', 'Roaming');
      return join(appData, 'stratum', 'config.json');
    }
    default:
      return join(home, '.config', 'stratum', 'config.json');
  }
}

/**
 * Read the OS config file. A missing file is an empty config.
 *
 * @throws {ConfigError} If the file is not valid JSON, is not an object, or
 *   holds a non-string or empty value for a known key
 */
export function readOsConfig(configPath: string = getOsConfigPath()): StratumOsConfig {
  let raw: string;
  try {
    raw = readFileSync(configPath, 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) {
      return {};
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    if (err instanceof SyntaxError) {
      throw new ConfigError(configPath, `not valid JSON (${err.message})`);
    }
    throw err;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(configPath, 'expected a JSON object');
  }

  const fields: Record<string, unknown> = { ...parsed };
  const policyDir = optionalPath(configPath, fields, 'policyDir');
  const home = optionalPath(configPath, fields, 'home');
  return {
    ...(policyDir !== undefined ? { policyDir } : {}),
    ...(home !== undefined ? { home } : {}),
  };
}

/**
 * Merge `update` into the OS config file, creating it if needed.
 */
export function writeOsConfig(update: StratumOsConfig, configPath: string = getOsConfigPath()): void {
  const merged: StratumOsConfig = { ...readOsConfig(configPath), ...update };
  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, JSON.stringify(merged, null, 2) + '\n', 'utf-8');
}

function optionalPath(
  configPath: string,
  fields: Record<string, unknown>,
  key: keyof StratumOsConfig,
): string | undefined {
  const value = fields[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(configPath, `"${key}" must be a non-empty string`);
  }
  return value;
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/** Where a resolved value came from. */
export type ConfigSource = 'option' | 'env' | 'config-file' | 'default';

export interface ResolveConfigOptions {
  /** Highest precedence; typically --policies. */
  readonly policyDir?: string | undefined;
  /** Highest precedence; typically --home. */
  readonly home?: string | undefined;
  /**
   * Persist the explicitly given values to the OS config file so later
   * invocations without flags reuse them. Default: false.
   */
  readonly persist?: boolean | undefined;
  /** Base for relative paths and the default policy directory. Default: process.cwd(). */
  readonly cwd?: string | undefined;
  /** Config file to consult. Default: getOsConfigPath(). */
  readonly configPath?: string | undefined;
}

export interface StratumConfig {
  readonly policyDir: string;
  readonly home: string;
  readonly sources: { readonly policyDir: ConfigSource; readonly home: ConfigSource };
}

/**
 * @throws {ConfigError} If the OS config file is consulted and unusable
 */
export function resolveConfig(opts: ResolveConfigOptions = {}): StratumConfig {
  const cwd = opts.cwd ?? process.cwd();
  const configPath = opts.configPath ?? getOsConfigPath();

  // Read lazily: an explicit value or env var never touches the file.
  let fileConfig: StratumOsConfig | undefined;
  const fromFile = (key: keyof StratumOsConfig): string | undefined => {
    fileConfig ??= readOsConfig(configPath);
    return fileConfig[key];
  };

  const policyDir = pick(
    opts.policyDir,
    process.env['STRATUM_POLICY_DIR'],
    () => fromFile('policyDir'),
    () => join(cwd, 'policies'),
  );
  const home = pick(
    opts.home,
    process.env['STRATUM_HOME'],
    () => fromFile('home'),
    () => join(homedir(), '.stratum'),
  );

  const config: StratumConfig = {
    policyDir: resolve(cwd, policyDir.value),
    home: resolve(cwd, home.value),
    sources: { policyDir: policyDir.source, home: home.source },
  };

  if (opts.persist === true) {
    writeOsConfig(
      {
        ...(policyDir.source === 'option' ? { policyDir: config.policyDir } : {}),
        ...(home.source === 'option' ? { home: config.home } : {}),
      },
      configPath,
    );
  }

  return config;
}

function pick(
  option: string | undefined,
  env: string | undefined,
  file: () => string | undefined,
  fallback: () => string,
): { value: string; source: ConfigSource } {
  if (option !== undefined && option !== '') return { value: option, source: 'option' };
  if (env !== undefined && env !== '') return { value: env, source: 'env' };
  const fromFile = file();
  if (fromFile !== undefined) return { value: fromFile, source: 'config-file' };
  return { value: fallback(), source: 'default' };
}

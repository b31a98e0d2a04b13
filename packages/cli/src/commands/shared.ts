/**
 * Plumbing shared by every command: global options, configuration, the
 * policy host, and the single place command failures are reported.
 */

import type { Command } from 'commander';
import { CycleError, NotFoundError, PolicyError, SchemaError } from '@stratum/kernel';
import {
  ConfigError,
  FileStateIO,
  PolicyDirectoryError,
  PolicyHost,
  resolveConfig,
  type StratumConfig,
} from '@stratum/runtime-host';
import { printError, printJson } from '../output/print.js';
import { t } from '../output/theme.js';

/** Options declared on the root program and visible to every subcommand. */
export interface GlobalOptions {
  readonly policies?: string;
  readonly home?: string;
  readonly json?: boolean;
  readonly save?: boolean;
}

export function globalOptions(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

export function configFor(options: GlobalOptions): StratumConfig {
  return resolveConfig({ policyDir: options.policies, home: options.home, persist: options.save === true });
}

/**
 * Open the policy directory named by the options. Queries are logged and
 * snapshots recorded under the configured home.
 */
export function openHost(config: StratumConfig): PolicyHost {
  return PolicyHost.open({ policyDir: config.policyDir, stateIO: new FileStateIO(config.home) });
}

/**
 * Run a command body. Expected failures (bad documents, cycles, unknown
 * names, configuration problems) are printed and set exit code 1; anything
 * else propagates.
 */
export function runCommand(options: GlobalOptions, body: () => void): void {
  try {
    body();
  } catch (err: unknown) {
    if (!isReportable(err)) throw err;
    reportFailure(options, err);
  }
}

export function reportFailure(options: GlobalOptions, err: ReportableError): void {
  process.exitCode = 1;
  if (options.json === true) {
    printJson({ ok: false, error: describeError(err) });
    return;
  }
  printError(t.red('✗ ') + err.message);
  if (err instanceof SchemaError) {
    for (const detail of err.details) {
      printError(t.dim('    ') + (detail.context !== undefined ? `${detail.context}: ` : '') + detail.message);
    }
  }
}

export type ReportableError = PolicyError | ConfigError | PolicyDirectoryError;

function isReportable(err: unknown): err is ReportableError {
  return err instanceof PolicyError || err instanceof ConfigError || err instanceof PolicyDirectoryError;
}

/** JSON form of a failure: a stable code plus whatever locates the problem. */
export function describeError(err: ReportableError): Record<string, unknown> {
  if (err instanceof ConfigError) {
    return { code: 'CONFIG', message: err.message, path: err.configPath };
  }
  if (err instanceof PolicyDirectoryError) {
    return { code: 'POLICY_DIR', message: err.message, path: err.directory };
  }
  if (err instanceof SchemaError) {
    return { code: err.code, message: err.message, document: err.document, details: err.details };
  }
  if (err instanceof CycleError) {
    return { code: err.code, message: err.message, path: err.path };
  }
  if (err instanceof NotFoundError) {
    return { code: err.code, message: err.message, document: err.documentName };
  }
  return { code: err.code, message: err.message };
}

/**
 * @stratum/runtime-host
 *
 * Stratum runtime host: everything with a side effect. Reads policy
 * directories, resolves configuration, persists state and resolution logs,
 * and hosts a PolicyEngine with reload.
 *
 * The kernel defines interfaces (LogSink); this package implements them.
 * No kernel code imports from this package.
 */

// Policy sources
export { PolicyDirectoryError, readPolicyDirectory } from './sources/directory-reader.js';

// Configuration
export type {
  ConfigSource,
  ResolveConfigOptions,
  StratumConfig,
  StratumOsConfig,
} from './config.js';
export {
  ConfigError,
  getOsConfigPath,
  readOsConfig,
  resolveConfig,
  writeOsConfig,
} from './config.js';

// StateIO
export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO } from './state/state-io.js';

// Logging
export { FileLogSink, RESOLUTION_LOG_FILE } from './logging/file-log-sink.js';
export { ulid } from './logging/ulid.js';
export type { LogEvent, LogReadResult, LogReadStats } from './logging/log-reader.js';
export { readLog } from './logging/log-reader.js';

// Host
export type { PolicyHostOptions, RefreshOutcome, SnapshotRecord } from './host/policy-host.js';
export { PolicyHost, SNAPSHOT_RECORD_FILE, readSnapshotRecord } from './host/policy-host.js';

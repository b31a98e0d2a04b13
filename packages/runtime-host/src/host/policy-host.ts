/**
 * Stratum Runtime Host — Policy Host
 *
 * Binds a policy directory to a PolicyEngine: reads the directory, builds a
 * snapshot, and swaps it in atomically on reload.
 *
 * A reload builds a complete new snapshot before touching the engine. If
 * reading or building fails, the error propagates and the engine keeps
 * answering from the snapshot it already had.
 *
 * When a StateIO is supplied, every query is logged to resolutions.jsonl and
 * every installed snapshot is recorded in `state/snapshot.json`.
 */

import {
  type ConflictResolver,
  PolicyEngine,
  ResolutionLogger,
  buildSnapshot,
  type Context,
  type PolicySnapshot,
  type QueryResult,
} from '@stratum/kernel';
import { FileLogSink } from '../logging/file-log-sink.js';
import { readPolicyDirectory } from '../sources/directory-reader.js';
import type { StateIO } from '../state/state-io.js';

export const SNAPSHOT_RECORD_FILE = 'snapshot.json';

/** What `state/snapshot.json` holds about the last installed snapshot. */
export interface SnapshotRecord {
  readonly hash: string;
  readonly policyDir: string;
  readonly documents: ReadonlyArray<string>;
  readonly installedAt: string;
}

export interface PolicyHostOptions {
  readonly policyDir: string;
  /** Enables resolution logging and the snapshot record. */
  readonly stateIO?: StateIO | undefined;
  readonly resolver?: ConflictResolver | undefined;
  /** Injectable clock for log and record timestamps. */
  readonly clock?: (() => string) | undefined;
}

export interface RefreshOutcome {
  readonly changed: boolean;
  readonly snapshot: PolicySnapshot;
}

export class PolicyHost {
  readonly engine: PolicyEngine;
  private readonly policyDir: string;
  private readonly stateIO: StateIO | undefined;
  private readonly clock: () => string;

  private constructor(initial: PolicySnapshot, options: PolicyHostOptions, clock: () => string) {
    this.policyDir = options.policyDir;
    this.stateIO = options.stateIO;
    this.clock = clock;
    this.engine = new PolicyEngine(initial, {
      logger: new ResolutionLogger(
        options.stateIO !== undefined ? new FileLogSink(options.stateIO) : undefined,
      ),
      resolver: options.resolver,
      clock,
    });
  }

  /**
   * Read the policy directory and build the first snapshot.
   *
   * @throws {PolicyDirectoryError} If the directory is missing
   * @throws {SchemaError | CycleError} If the documents do not build
   */
  static open(options: PolicyHostOptions): PolicyHost {
    const clock = options.clock ?? (() => new Date().toISOString());
    const host = new PolicyHost(buildSnapshot(readPolicyDirectory(options.policyDir)), options, clock);
    host.record(host.snapshot);
    return host;
  }

  /** The snapshot new queries observe. */
  get snapshot(): PolicySnapshot {
    return this.engine.current();
  }

  query(context: Context): QueryResult {
    return this.engine.query(context);
  }

  /**
   * Rebuild from the directory and install the result unconditionally.
   *
   * @returns The previous snapshot
   */
  reload(): PolicySnapshot {
    const next = buildSnapshot(readPolicyDirectory(this.policyDir));
    const previous = this.engine.swap(next);
    this.record(next);
    return previous;
  }

  /**
   * Rebuild from the directory and install the result only if its content
   * hash differs from the current snapshot's.
   */
  refresh(): RefreshOutcome {
    const next = buildSnapshot(readPolicyDirectory(this.policyDir));
    if (next.hash === this.snapshot.hash) {
      return { changed: false, snapshot: this.snapshot };
    }
    this.engine.swap(next);
    this.record(next);
    return { changed: true, snapshot: next };
  }

  private record(snapshot: PolicySnapshot): void {
    if (this.stateIO === undefined) return;
    const record: SnapshotRecord = {
      hash: snapshot.hash,
      policyDir: this.policyDir,
      documents: snapshot.store.list().map((d) => d.name),
      installedAt: this.clock(),
    };
    this.stateIO.writeJson(SNAPSHOT_RECORD_FILE, record);
  }
}

/**
 * The last snapshot record, or null if none exists or it is unreadable.
 */
export function readSnapshotRecord(stateIO: StateIO): SnapshotRecord | null {
  const raw = stateIO.readJson(SNAPSHOT_RECORD_FILE);
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return null;
  const fields: Record<string, unknown> = { ...raw };
  const { hash, policyDir, documents, installedAt } = fields;
  if (
    typeof hash !== 'string' ||
    typeof policyDir !== 'string' ||
    typeof installedAt !== 'string' ||
    !Array.isArray(documents) ||
    !documents.every((d): d is string => typeof d === 'string')
  ) {
    return null;
  }
  return { hash, policyDir, documents, installedAt };
}

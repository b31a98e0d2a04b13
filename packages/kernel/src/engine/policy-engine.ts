/**
 * Stratum Kernel — Policy Engine
 *
 * Holds the current PolicySnapshot behind a single reference and answers
 * queries against it.
 *
 * Snapshot replacement is atomic: swap() replaces the reference wholesale.
 * A query captures the reference once, at its start, so it observes one
 * snapshot from beginning to end and never a partial update.
 */

import type { ConflictResolver } from '../composition/conflict-resolver.js';
import { ResolutionLogger, toResolutionLog } from '../logging/resolution-log.js';
import { query } from '../query/query.js';
import type { Context } from '../types/context.js';
import type { QueryResult } from '../types/result.js';
import type { PolicySnapshot } from '../types/snapshot.js';

export interface PolicyEngineOptions {
  readonly logger?: ResolutionLogger | undefined;
  readonly resolver?: ConflictResolver | undefined;
  /** Injectable clock for deterministic log timestamps. */
  readonly clock?: (() => string) | undefined;
}

export class PolicyEngine {
  private snapshot: PolicySnapshot;
  private readonly logger: ResolutionLogger;
  private readonly resolver: ConflictResolver | undefined;
  private readonly clock: () => string;

  constructor(initial: PolicySnapshot, options: PolicyEngineOptions = {}) {
    this.snapshot = initial;
    this.logger = options.logger ?? new ResolutionLogger();
    this.resolver = options.resolver;
    this.clock = options.clock ?? (() => new Date().toISOString());
  }

  /** The snapshot new queries will observe. */
  current(): PolicySnapshot {
    return this.snapshot;
  }

  /**
   * Replace the snapshot visible to new queries.
   *
   * @returns The previous snapshot
   */
  swap(next: PolicySnapshot): PolicySnapshot {
    const previous = this.snapshot;
    this.snapshot = next;
    return previous;
  }

  /**
   * Resolve a context against the current snapshot and log the outcome.
   */
  query(context: Context): QueryResult {
    const snapshot = this.snapshot;
    const outcome = query(snapshot, context, this.resolver);
    if (this.logger.enabled) {
      this.logger.record(toResolutionLog(snapshot.hash, context, outcome, this.clock()));
    }
    return outcome;
  }
}

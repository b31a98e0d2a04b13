/**
 * Stratum Kernel — Resolution Log Types
 *
 * Defines the outcome of a query and the structured log entry recorded for it.
 */

import type { PolicySnapshotHash } from './snapshot.js';

/**
 * The three possible outcomes of a query.
 */
export enum ResolutionOutcome {
  /** A ruleset was composed with no unresolved conflicts. */
  Resolved = 'resolved',
  /** A ruleset was composed, but one or more topics are in conflict. */
  Conflicted = 'conflicted',
  /** The query failed (e.g. an unknown document was requested). */
  Failed = 'failed',
}

/**
 * A structured log entry for a single query.
 *
 * Given `snapshot_hash` and the context that produced `context_hash`, the
 * result is reproducible: queries are pure functions of the two.
 */
export interface ResolutionLog {
  readonly snapshot_hash: PolicySnapshotHash;
  /** SHA-256 of the canonical context. */
  readonly context_hash: string;
  readonly identifier: string;
  readonly language: string;
  readonly outcome: ResolutionOutcome;
  /** Applied document names, tier order. Empty on failure. */
  readonly applied_documents: ReadonlyArray<string>;
  readonly override_count: number;
  readonly conflict_topics: ReadonlyArray<string>;
  /** Failure message; null unless outcome is Failed. */
  readonly error: string | null;
  /** ISO 8601 timestamp of the query. */
  readonly timestamp: string;
}

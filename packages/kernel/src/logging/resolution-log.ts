/**
 * Stratum Kernel — Resolution Logger
 *
 * Builds and records one ResolutionLog entry per query.
 *
 * The sink is optional: when omitted (tests, embedded use), record() is a
 * no-op and nothing is persisted.
 */

import { hashCanonical } from '@stratum/policy-source';
import { describeContext, type Context } from '../types/context.js';
import { ResolutionOutcome, type ResolutionLog } from '../types/log.js';
import type { QueryResult } from '../types/result.js';
import type { PolicySnapshotHash } from '../types/snapshot.js';
import type { LogSink } from './log-sink.js';

export class ResolutionLogger {
  constructor(private readonly sink?: LogSink) {}

  record(entry: ResolutionLog): void {
    this.sink?.append(entry);
  }

  /** Whether entries go anywhere. Lets callers skip building them. */
  get enabled(): boolean {
    return this.sink !== undefined;
  }
}

/**
 * Build the log entry for one query outcome.
 */
export function toResolutionLog(
  snapshotHash: PolicySnapshotHash,
  context: Context,
  outcome: QueryResult,
  timestamp: string,
): ResolutionLog {
  const base = {
    snapshot_hash: snapshotHash,
    context_hash: computeContextHash(context),
    identifier: context.identifier,
    language: context.language,
    timestamp,
  };
  if (!outcome.ok) {
    return {
      ...base,
      outcome: ResolutionOutcome.Failed,
      applied_documents: [],
      override_count: 0,
      conflict_topics: [],
      error: outcome.error.message,
    };
  }
  const { result } = outcome;
  return {
    ...base,
    outcome: result.conflicts.length > 0 ? ResolutionOutcome.Conflicted : ResolutionOutcome.Resolved,
    applied_documents: result.appliedDocuments,
    override_count: result.overrides.length,
    conflict_topics: result.conflicts.map((c) => c.topic),
    error: null,
  };
}

/** SHA-256 over the canonical form of a context. */
export function computeContextHash(context: Context): string {
  return hashCanonical(describeContext(context));
}

/**
 * Stratum Kernel — Query API
 *
 * The engine's boundary: accepts a context, returns a composed ruleset or a
 * structured failure.
 *
 * query() is a pure function of (snapshot, context). It has no hidden state
 * beyond the immutable snapshot, so the same inputs always produce the same
 * output and many queries may share one snapshot without coordination.
 */

import { NotFoundError, type PolicyDocument } from '@stratum/policy-source';
import { compose } from '../composition/composer.js';
import type { ConflictResolver } from '../composition/conflict-resolver.js';
import { match } from '../match/matcher.js';
import type { Context } from '../types/context.js';
import type { CompositionResult, QueryResult, SerializedResult } from '../types/result.js';
import type { PolicySnapshot } from '../types/snapshot.js';

/**
 * Resolve the effective ruleset for a context.
 *
 * A context naming an unknown document in `include` yields
 * `{ ok: false, error: NotFoundError }` rather than an empty or default result.
 */
export function query(
  snapshot: PolicySnapshot,
  context: Context,
  resolver?: ConflictResolver,
): QueryResult {
  let matched: ReadonlyArray<PolicyDocument>;
  try {
    matched = match(snapshot.graph, context);
  } catch (err: unknown) {
    if (err instanceof NotFoundError) {
      return { ok: false, error: err };
    }
    throw err;
  }
  return {
    ok: true,
    result: compose(snapshot.graph, matched, { resolver, snapshotHash: snapshot.hash }),
  };
}

/**
 * Wire form of a result:
 * `{appliedDocuments, directives: {topic: [{statement, source}]}, conflicts: [{topic, candidates}]}`.
 */
export function serializeResult(result: CompositionResult): SerializedResult {
  const pick = (d: { readonly statement: string; readonly source: string }) => ({
    statement: d.statement,
    source: d.source,
  });
  return {
    appliedDocuments: [...result.appliedDocuments],
    directives: Object.fromEntries(
      Object.entries(result.directives).map(([topic, list]) => [topic, list.map(pick)]),
    ),
    conflicts: result.conflicts.map((c) => ({ topic: c.topic, candidates: c.candidates.map(pick) })),
  };
}

/**
 * Stratum Kernel — Policy Snapshot Types
 *
 * The PolicySnapshot is the unit of determinism: every query is evaluated
 * against one snapshot, and identical snapshot plus identical context always
 * produce an identical result.
 *
 * A snapshot is built once at process start, or rebuilt wholesale when the
 * document sources change. It is never mutated in place.
 */

import type { DocumentStore } from '../store/document-store.js';
import type { PrecedenceGraph } from '../graph/precedence.js';

/** Opaque brand symbol for PolicySnapshotHash. */
declare const __policySnapshotHashBrand: unique symbol;

/**
 * A branded SHA-256 hex digest over the canonical form of a snapshot's
 * documents. Only the snapshot builder produces one.
 */
export type PolicySnapshotHash = string & {
  readonly [__policySnapshotHashBrand]: 'PolicySnapshotHash';
};

/**
 * An immutable store-plus-graph pair with its content hash.
 */
export interface PolicySnapshot {
  readonly store: DocumentStore;
  readonly graph: PrecedenceGraph;
  /** Changes whenever any document's content changes; stable under source order. */
  readonly hash: PolicySnapshotHash;
}

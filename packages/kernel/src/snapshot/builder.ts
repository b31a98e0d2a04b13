/**
 * Stratum Kernel — Snapshot Builder
 *
 * Constructs and hashes PolicySnapshots: a validated document store, its
 * precedence graph, and a content hash.
 *
 * The snapshot is the unit of determinism. Every query is evaluated against
 * exactly one snapshot; content changes require building a new snapshot, never
 * mutating the current one.
 */

import {
  hashCanonical,
  type DocumentSource,
  type PolicyDocument,
} from '@stratum/policy-source';
import { buildPrecedenceGraph } from '../graph/precedence.js';
import { DocumentStore } from '../store/document-store.js';
import type { PolicySnapshot, PolicySnapshotHash } from '../types/snapshot.js';

/**
 * Load, validate and order a batch of document sources.
 *
 * Construction is all-or-nothing: a SchemaError from the store or a
 * CycleError from the graph aborts it, and no partial snapshot exists.
 *
 * @throws {SchemaError} On an invalid document or unresolved relation
 * @throws {CycleError} On a relation cycle
 */
export function buildSnapshot(sources: ReadonlyArray<DocumentSource>): PolicySnapshot {
  return snapshotOf(DocumentStore.load(sources));
}

/**
 * Build a snapshot from already-compiled documents.
 *
 * @throws {SchemaError} On a duplicate name or unresolved relation
 * @throws {CycleError} On a relation cycle
 */
export function buildSnapshotFromDocuments(documents: ReadonlyArray<PolicyDocument>): PolicySnapshot {
  return snapshotOf(DocumentStore.fromDocuments(documents));
}

/**
 * Compute the snapshot hash of a set of documents.
 *
 * SHA-256 over the canonical JSON (sorted keys) of the documents sorted by
 * name. `origin` is excluded: moving a file without changing it does not
 * change the policy. Input order does not matter.
 */
export function hashDocuments(documents: ReadonlyArray<PolicyDocument>): PolicySnapshotHash {
  const content = [...documents]
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .map(({ origin: _origin, ...rest }) => rest);
  // The only place a PolicySnapshotHash is produced.
  return hashCanonical(content) as PolicySnapshotHash;
}

function snapshotOf(store: DocumentStore): PolicySnapshot {
  const documents = store.list();
  const graph = buildPrecedenceGraph(documents);
  return Object.freeze({ store, graph, hash: hashDocuments(documents) });
}

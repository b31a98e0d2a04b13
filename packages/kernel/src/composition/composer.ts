/**
 * Stratum Kernel — Composition Engine
 *
 * Merges the matched documents' directives, in precedence order, into one
 * effective ruleset.
 *
 * For a directive d of document D on topic T, against the entries already
 * merged for T:
 *
 *   1. No entries              → insert d.
 *   2. Entries from ancestors  → override: replaced by d (an OverrideRecord is kept)
 *      of D                      augment:  kept, d appended after them
 *   3. Entries from D itself   → kept (a section's bullets accumulate)
 *   4. Entries from documents  → grouped with d and handed to the ConflictResolver;
 *      unrelated to D            a conflict marks T conflicted
 *
 * After every step a topic is conflicted iff two of its entries come from
 * unrelated documents and are incompatible, so an override that replaces
 * one side of a conflict can clear it. Conflicted topics are reported,
 * never merged.
 */

import { deepFreeze, type PolicyDocument } from '@stratum/policy-source';
import type { PrecedenceGraph } from '../graph/precedence.js';
import { compareNames } from '../store/document-store.js';
import { attribute } from '../types/result.js';
import type {
  CompositionResult,
  ConflictReport,
  EffectiveDirective,
  OverrideRecord,
} from '../types/result.js';
import type { PolicySnapshotHash } from '../types/snapshot.js';
import { ConflictResolver } from './conflict-resolver.js';

export interface ComposeOptions {
  /** Same-tier arbitration. Default: a textual ConflictResolver. */
  readonly resolver?: ConflictResolver | undefined;
  /** Recorded on the result; null when composing outside a snapshot. */
  readonly snapshotHash?: PolicySnapshotHash | null | undefined;
}

interface TopicState {
  entries: ReadonlyArray<EffectiveDirective>;
  conflicted: boolean;
}

/**
 * Compose matched documents into a CompositionResult.
 *
 * Documents are processed in (tier, name) order whatever order they are
 * given in; a document listed twice is applied once. The result is
 * deep-frozen.
 *
 * @throws {NotFoundError} If a document is not part of `graph`
 */
export function compose(
  graph: PrecedenceGraph,
  matched: ReadonlyArray<PolicyDocument>,
  options: ComposeOptions = {},
): CompositionResult {
  const resolver = options.resolver ?? new ConflictResolver();
  const applied = inPrecedenceOrder(graph, matched);
  const topics = new Map<string, TopicState>();
  const overrides: OverrideRecord[] = [];

  for (const doc of applied) {
    for (const directive of doc.directives) {
      const entry = attribute(directive, doc.name);
      const state = topics.get(directive.topic);
      if (state === undefined) {
        topics.set(directive.topic, { entries: [entry], conflicted: false });
        continue;
      }

      const replaced = directive.mode === 'override'
        ? state.entries.filter((e) => graph.precedes(e.source, doc.name))
        : [];
      const kept = state.entries.filter((e) => !replaced.includes(e));
      const unrelated = kept.filter(
        (e) => e.source !== doc.name && !graph.precedes(e.source, doc.name),
      );

      if (replaced.length > 0) {
        overrides.push({
          topic: directive.topic,
          by: doc.name,
          replaced: [...new Set(replaced.map((e) => e.source))],
        });
      }

      if (unrelated.length === 0) {
        state.entries = [...kept, entry];
      } else {
        const verdict = resolver.resolve(directive.topic, [...unrelated, entry]);
        state.entries = verdict.kind === 'resolved' && !verdict.directives.includes(entry)
          ? kept
          : [...kept, entry];
      }
      state.conflicted = hasConflict(graph, resolver, state.entries);
    }
  }

  const directives: [string, ReadonlyArray<EffectiveDirective>][] = [];
  const conflicts: ConflictReport[] = [];
  for (const topic of [...topics.keys()].sort(compareNames)) {
    const state = topics.get(topic);
    if (state === undefined) continue;
    if (state.conflicted) {
      conflicts.push({ kind: 'conflict', topic, candidates: state.entries });
    } else {
      directives.push([topic, state.entries]);
    }
  }

  return deepFreeze({
    appliedDocuments: applied.map((d) => d.name),
    directives: Object.fromEntries(directives),
    conflicts,
    overrides,
    snapshotHash: options.snapshotHash ?? null,
  });
}

function hasConflict(
  graph: PrecedenceGraph,
  resolver: ConflictResolver,
  entries: ReadonlyArray<EffectiveDirective>,
): boolean {
  return entries.some((a, i) =>
    entries.slice(i + 1).some((b) =>
      a.source !== b.source && graph.incomparable(a.source, b.source) && !resolver.compatible(a, b),
    ),
  );
}

function inPrecedenceOrder(
  graph: PrecedenceGraph,
  documents: ReadonlyArray<PolicyDocument>,
): ReadonlyArray<PolicyDocument> {
  const unique = new Map<string, PolicyDocument>();
  for (const doc of documents) {
    unique.set(doc.name, doc);
  }
  return [...unique.values()].sort(
    (a, b) => graph.tierOf(a.name) - graph.tierOf(b.name) || compareNames(a.name, b.name),
  );
}

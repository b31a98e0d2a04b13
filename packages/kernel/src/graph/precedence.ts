/**
 * Stratum Kernel — Precedence Graph Builder
 *
 * Turns each document's declared relations into directed edges and derives
 * a precedence partial order from them.
 *
 * Edge direction is dependency: "python extends general" is an edge from
 * general to python. Tiers are derived, never asserted:
 *
 *   tier(d) = 0                               if d declares no relations
 *   tier(d) = max(tier(t) for t in targets) + 1  otherwise
 *
 * Documents with no relation path between them are incomparable, whatever
 * their tier numbers. Composition relies on this distinction: only a
 * document's ancestors may be overridden by it.
 */

import {
  CycleError,
  NotFoundError,
  SchemaError,
  type PolicyDocument,
} from '@stratum/policy-source';
import { compareNames } from '../store/document-store.js';

/** One node of the precedence graph. */
export interface PrecedenceNode {
  readonly document: PolicyDocument;
  readonly tier: number;
  /** Names of the documents this one declares relations to, sorted, unique. */
  readonly targets: ReadonlyArray<string>;
  /** Names of the documents declaring a relation to this one, sorted. */
  readonly dependents: ReadonlyArray<string>;
}

/**
 * An immutable, acyclic precedence graph over a set of documents.
 */
export class PrecedenceGraph {
  private readonly nodes: ReadonlyMap<string, PrecedenceNode>;
  private readonly ancestors: ReadonlyMap<string, ReadonlySet<string>>;
  private readonly ordered: ReadonlyArray<PolicyDocument>;

  /** @internal Use buildPrecedenceGraph(). */
  constructor(
    nodes: ReadonlyMap<string, PrecedenceNode>,
    ancestors: ReadonlyMap<string, ReadonlySet<string>>,
  ) {
    this.nodes = nodes;
    this.ancestors = ancestors;
    this.ordered = Object.freeze(
      [...nodes.values()]
        .sort((a, b) => a.tier - b.tier || compareNames(a.document.name, b.document.name))
        .map((n) => n.document),
    );
  }

  /** Every document, tier ascending then name. */
  get order(): ReadonlyArray<PolicyDocument> {
    return this.ordered;
  }

  /** @throws {NotFoundError} If the document is not in the graph */
  node(name: string): PrecedenceNode {
    const node = this.nodes.get(name);
    if (node === undefined) {
      throw new NotFoundError(name);
    }
    return node;
  }

  /** @throws {NotFoundError} If the document is not in the graph */
  tierOf(name: string): number {
    return this.node(name).tier;
  }

  /** Names of every document `name` transitively declares a relation to. */
  ancestorsOf(name: string): ReadonlySet<string> {
    const set = this.ancestors.get(name);
    if (set === undefined) {
      throw new NotFoundError(name);
    }
    return set;
  }

  /** True iff `a` is a strict ancestor of `b` (b reaches a through relations). */
  precedes(a: string, b: string): boolean {
    return this.ancestorsOf(b).has(a);
  }

  /** True iff neither document is an ancestor of the other. */
  incomparable(a: string, b: string): boolean {
    return a !== b && !this.precedes(a, b) && !this.precedes(b, a);
  }

  dependentsOf(name: string): ReadonlyArray<string> {
    return this.node(name).dependents;
  }

  /** Documents grouped by tier, index = tier. */
  tiers(): ReadonlyArray<ReadonlyArray<PolicyDocument>> {
    const groups: PolicyDocument[][] = [];
    for (const doc of this.ordered) {
      const tier = this.tierOf(doc.name);
      while (groups.length <= tier) groups.push([]);
      groups[tier]?.push(doc);
    }
    return groups;
  }

  get size(): number {
    return this.nodes.size;
  }
}

/**
 * Build the precedence graph for a set of documents.
 *
 * Algorithm: depth-first topological sort with a recursion-stack marker,
 * visiting documents and relation targets in name order so the reported
 * cycle is deterministic. A cycle is never broken silently.
 *
 * @throws {CycleError} With the exact cycle path, closed (`[a, b, a]`)
 * @throws {SchemaError} If a relation names a document not in `documents`
 */
export function buildPrecedenceGraph(documents: ReadonlyArray<PolicyDocument>): PrecedenceGraph {
  const byName = new Map<string, PolicyDocument>();
  for (const doc of documents) {
    byName.set(doc.name, doc);
  }

  const targetsOf = new Map<string, ReadonlyArray<string>>();
  for (const doc of byName.values()) {
    const targets = [...new Set(doc.relations.map((r) => r.target))].sort(compareNames);
    const missing = targets.filter((t) => !byName.has(t));
    if (missing.length > 0) {
      throw new SchemaError(
        doc.name,
        missing.map((t) => ({ message: `relation target "${t}" is not a loaded document`, context: 'relation' })),
      );
    }
    targetsOf.set(doc.name, targets);
  }

  const state = new Map<string, 'visiting' | 'done'>();
  const stack: string[] = [];
  const tiers = new Map<string, number>();
  const topological: string[] = [];

  const visit = (name: string): void => {
    const mark = state.get(name);
    if (mark === 'done') return;
    if (mark === 'visiting') {
      throw new CycleError([...stack.slice(stack.indexOf(name)), name]);
    }

    state.set(name, 'visiting');
    stack.push(name);
    let tier = 0;
    for (const target of targetsOf.get(name) ?? []) {
      visit(target);
      tier = Math.max(tier, (tiers.get(target) ?? 0) + 1);
    }
    stack.pop();
    state.set(name, 'done');
    tiers.set(name, tier);
    topological.push(name);
  };

  for (const name of [...byName.keys()].sort(compareNames)) {
    visit(name);
  }

  // Dependencies precede dependents in `topological`, so each target's
  // ancestor set is complete before it is read.
  const ancestors = new Map<string, ReadonlySet<string>>();
  const dependents = new Map<string, string[]>();
  for (const name of topological) {
    const set = new Set<string>();
    for (const target of targetsOf.get(name) ?? []) {
      set.add(target);
      for (const a of ancestors.get(target) ?? []) set.add(a);
      const list = dependents.get(target) ?? [];
      list.push(name);
      dependents.set(target, list);
    }
    ancestors.set(name, set);
  }

  const nodes = new Map<string, PrecedenceNode>();
  for (const [name, document] of byName) {
    nodes.set(name, Object.freeze({
      document,
      tier: tiers.get(name) ?? 0,
      targets: targetsOf.get(name) ?? [],
      dependents: [...(dependents.get(name) ?? [])].sort(compareNames),
    }));
  }

  return new PrecedenceGraph(nodes, ancestors);
}

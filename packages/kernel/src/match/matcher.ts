/**
 * Stratum Kernel — Match Engine
 *
 * Decides which documents apply to a context, and in what order.
 *
 * A document applies when its applicability predicate is satisfied, or when
 * the context requests it by name. The selection is ordered by tier
 * ascending, ties broken by document name, so repeated calls with an
 * unchanged graph and context always return the same sequence.
 */

import { matchesGlob, type Applicability, type PolicyDocument } from '@stratum/policy-source';
import type { Context } from '../types/context.js';
import type { PrecedenceGraph } from '../graph/precedence.js';

/**
 * Select and order the documents that apply to `context`.
 *
 * `graph.order` is already (tier, name) ordered, so filtering it preserves
 * the required ordering.
 *
 * @throws {NotFoundError} If `context.include` names a document not in the graph
 */
export function match(graph: PrecedenceGraph, context: Context): ReadonlyArray<PolicyDocument> {
  const requested = new Set<string>();
  for (const name of context.include) {
    requested.add(graph.node(name).document.name);
  }

  return graph.order.filter(
    (doc) => requested.has(doc.name) || isApplicable(doc.appliesTo, context),
  );
}

/**
 * Evaluate an applicability predicate against a context.
 *
 * Every declared dimension must hold; an empty predicate always holds.
 * - languages:  the context language is one of them
 * - frameworks: at least one is among the context's framework signals
 * - paths:      at least one glob matches the context identifier
 */
export function isApplicable(appliesTo: Applicability, context: Context): boolean {
  const { languages, frameworks, paths } = appliesTo;

  if (languages !== undefined && !languages.includes(context.language)) {
    return false;
  }
  if (frameworks !== undefined && !frameworks.some((f) => context.frameworkSignals.has(f))) {
    return false;
  }
  if (paths !== undefined && !paths.some((p) => matchesGlob(p, context.identifier))) {
    return false;
  }
  return true;
}

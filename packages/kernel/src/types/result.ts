/**
 * Stratum Kernel — Composition Result Types
 *
 * A CompositionResult is produced fresh per query and never mutated after
 * construction. It carries the applied documents in tier order, the merged
 * effective directives keyed by topic, the unresolved same-tier conflicts,
 * and a record of the cross-tier overrides that shaped the result.
 */

import type { Directive, MergeMode, NotFoundError } from '@stratum/policy-source';
import type { PolicySnapshotHash } from './snapshot.js';

/** A directive attributed to the document that declared it. */
export interface EffectiveDirective {
  readonly statement: string;
  /** Name of the declaring document. */
  readonly source: string;
  readonly mode: MergeMode;
  readonly examples: ReadonlyArray<string>;
  readonly antiPatterns: ReadonlyArray<string>;
}

/**
 * Same-tier directives on one topic that disagree. Not an error: a normal
 * output of composition, surfaced so a policy author or the agent's own
 * arbitration step can decide. The topic is absent from the merged
 * directives while the conflict stands.
 */
export interface ConflictReport {
  readonly kind: 'conflict';
  readonly topic: string;
  /** Every directive contributing to the topic, in arrival order. */
  readonly candidates: ReadonlyArray<EffectiveDirective>;
}

/**
 * A compatible same-tier group: the distinct directives to keep, in arrival
 * order. Textually identical statements appear once.
 */
export interface ResolvedGroup {
  readonly kind: 'resolved';
  readonly topic: string;
  readonly directives: ReadonlyArray<EffectiveDirective>;
}

/**
 * A cross-tier override that occurred during composition. Recorded for
 * observability only: cross-tier override is intended behavior, never a conflict.
 */
export interface OverrideRecord {
  readonly topic: string;
  /** Document whose override directive replaced the lower-tier guidance. */
  readonly by: string;
  /** Names of the documents whose directives were replaced, in arrival order. */
  readonly replaced: ReadonlyArray<string>;
}

/** The outcome of composing a tier-ordered set of matched documents. */
export interface CompositionResult {
  /** Names of the applied documents, tier order. */
  readonly appliedDocuments: ReadonlyArray<string>;
  /** Effective directives keyed by topic; keys in ascending order. */
  readonly directives: Readonly<Record<string, ReadonlyArray<EffectiveDirective>>>;
  /** Unresolved conflicts, ordered by topic. */
  readonly conflicts: ReadonlyArray<ConflictReport>;
  readonly overrides: ReadonlyArray<OverrideRecord>;
  /** Hash of the snapshot the result was computed against, when known. */
  readonly snapshotHash: PolicySnapshotHash | null;
}

/**
 * The query boundary's result: a composed ruleset, or a structured failure.
 * Query-time failures are returned, not thrown.
 */
export type QueryResult =
  | { readonly ok: true; readonly result: CompositionResult }
  | { readonly ok: false; readonly error: NotFoundError };

/** Wire form of a CompositionResult. */
export interface SerializedResult {
  readonly appliedDocuments: ReadonlyArray<string>;
  readonly directives: Readonly<
    Record<string, ReadonlyArray<{ readonly statement: string; readonly source: string }>>
  >;
  readonly conflicts: ReadonlyArray<{
    readonly topic: string;
    readonly candidates: ReadonlyArray<{ readonly statement: string; readonly source: string }>;
  }>;
}

/** Attribute a directive to its declaring document. */
export function attribute(directive: Directive, source: string): EffectiveDirective {
  return {
    statement: directive.statement,
    source,
    mode: directive.mode,
    examples: directive.examples,
    antiPatterns: directive.antiPatterns,
  };
}

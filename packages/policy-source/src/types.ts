/**
 * Stratum Policy Source — Core Type Definitions
 *
 * Defines the loaded form of a policy document: its identity, the relations
 * it declares to other documents, its applicability predicate, and the
 * topic-tagged directives its body yields.
 *
 * These types are the base layer of the Stratum type system. The kernel
 * depends on this package; this package has no internal Stratum dependencies.
 */

// ---------------------------------------------------------------------------
// Merge modes and relation kinds
// ---------------------------------------------------------------------------

/**
 * How a directive combines with a directive on the same topic declared by a
 * document lower in the precedence order.
 *
 * - `override` replaces the lower-tier directive.
 * - `augment` is kept alongside it, after it.
 */
export type MergeMode = 'override' | 'augment';

/** All merge modes, in declaration order. */
export const MERGE_MODES: ReadonlyArray<MergeMode> = ['override', 'augment'];

/** Mode applied when a section carries no explicit marker. */
export const DEFAULT_MERGE_MODE: MergeMode = 'override';

/**
 * The kind of a declared relation. Both kinds create a precedence edge from
 * the target to the declaring document; the kind is kept for display.
 */
export type RelationKind = 'supplements' | 'extends';

/** All relation kinds accepted in a metadata block. */
export const RELATION_KINDS: ReadonlyArray<RelationKind> = ['supplements', 'extends'];

// ---------------------------------------------------------------------------
// Document model
// ---------------------------------------------------------------------------

/** A structured relation to another document, named by its identity. */
export interface Relation {
  readonly kind: RelationKind;
  readonly target: string;
}

/**
 * One atomic, topic-tagged rule statement within a policy document.
 */
export interface Directive {
  /** Normalized kebab-case topic, derived from the section heading. */
  readonly topic: string;
  readonly statement: string;
  readonly examples: ReadonlyArray<string>;
  readonly antiPatterns: ReadonlyArray<string>;
  readonly mode: MergeMode;
}

/**
 * The applicability predicate a document declares over a query context.
 *
 * Every declared dimension must be satisfied; values within a dimension are
 * alternatives. A predicate with no dimensions matches every context, which
 * is how a base policy applies everywhere.
 */
export interface Applicability {
  /** Lowercased language tags; the context language must be one of them. */
  readonly languages?: ReadonlyArray<string> | undefined;
  /** Lowercased framework signals; at least one must be present in the context. */
  readonly frameworks?: ReadonlyArray<string> | undefined;
  /** Glob patterns over the context identifier; at least one must match. */
  readonly paths?: ReadonlyArray<string> | undefined;
}

/**
 * A loaded policy document. Immutable once loaded.
 */
export interface PolicyDocument {
  /** Stable, unique identity. */
  readonly name: string;
  readonly description: string;
  /** Directives in body order. */
  readonly directives: ReadonlyArray<Directive>;
  /** Relations in declaration order. */
  readonly relations: ReadonlyArray<Relation>;
  readonly appliesTo: Applicability;
  /** Where the source came from (file path or caller-supplied label). */
  readonly origin: string;
}

/** The raw, unparsed form of one document. */
export interface DocumentSource {
  readonly origin: string;
  readonly text: string;
}

// ---------------------------------------------------------------------------
// Result types
// ---------------------------------------------------------------------------

/** A single structural or semantic problem found in a document source. */
export interface ValidationError {
  readonly message: string;
  /** Where in the source the problem was found (field or section). */
  readonly context?: string | undefined;
}

/**
 * The outcome of parsing one document source.
 *
 * Parse failures are never partial: if any error is found, no document is
 * returned. `name` is reported when the metadata block yielded one, so the
 * failure can be attributed to the document rather than only its origin.
 */
export type ParseResult =
  | { readonly ok: true; readonly document: PolicyDocument }
  | {
      readonly ok: false;
      readonly name: string | null;
      readonly errors: ReadonlyArray<ValidationError>;
    };

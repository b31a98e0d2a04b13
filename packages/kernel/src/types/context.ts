/**
 * Stratum Kernel — Query Context
 *
 * The Context is the query input: which file or component the agent is
 * working on, in which language, with which framework signals detected.
 * Contexts are immutable and supplied per query.
 */

import { normalizeTag } from '@stratum/policy-source';

/**
 * The descriptor of the working situation used to decide which documents apply.
 */
export interface Context {
  /** File or component identifier, matched against `appliesTo.paths`. */
  readonly identifier: string;
  /** Lowercased language/runtime tag. */
  readonly language: string;
  /** Lowercased framework signals (e.g. 'react', 'marimo'). */
  readonly frameworkSignals: ReadonlySet<string>;
  /**
   * Documents requested by name regardless of their applicability predicate.
   * Every name must exist in the store, or the query fails with NotFoundError.
   */
  readonly include: ReadonlyArray<string>;
}

/** Caller-facing shape accepted by createContext(). */
export interface ContextInput {
  readonly identifier: string;
  readonly language: string;
  readonly frameworkSignals?: Iterable<string> | undefined;
  readonly include?: Iterable<string> | undefined;
}

/**
 * Build an immutable, normalized Context.
 *
 * Language and framework tags are trimmed and lowercased so they compare
 * equal to the tags documents declare. `include` is de-duplicated and sorted.
 */
export function createContext(input: ContextInput): Context {
  const signals = new Set<string>();
  for (const s of input.frameworkSignals ?? []) {
    const tag = normalizeTag(s);
    if (tag !== '') signals.add(tag);
  }
  const include = [...new Set(Array.from(input.include ?? [], (n) => n.trim()))]
    .filter((n) => n !== '')
    .sort();

  return Object.freeze({
    identifier: input.identifier,
    language: normalizeTag(input.language),
    frameworkSignals: new FrozenSet(signals),
    include: Object.freeze(include),
  });
}

/**
 * Canonical, JSON-safe form of a context (sets become sorted arrays).
 * Used for hashing contexts in resolution logs.
 */
export function describeContext(context: Context): {
  readonly identifier: string;
  readonly language: string;
  readonly frameworkSignals: ReadonlyArray<string>;
  readonly include: ReadonlyArray<string>;
} {
  return {
    identifier: context.identifier,
    language: context.language,
    frameworkSignals: [...context.frameworkSignals].sort(),
    include: [...context.include],
  };
}

/** A Set whose mutators throw, so a shared Context cannot be altered. */
class FrozenSet<T> extends Set<T> {
  private readonly sealed: boolean;

  constructor(values: Iterable<T>) {
    super(values);
    this.sealed = true;
  }

  override add(value: T): this {
    if (this.sealed) throw new TypeError('Context framework signals are immutable');
    return super.add(value);
  }

  override delete(_value: T): boolean {
    throw new TypeError('Context framework signals are immutable');
  }

  override clear(): void {
    throw new TypeError('Context framework signals are immutable');
  }
}

/**
 * Shared builders for kernel tests. Pure data, no I/O.
 */

import type {
  Applicability,
  Directive,
  MergeMode,
  PolicyDocument,
  RelationKind,
} from '../src/index.js';

export function directive(topic: string, statement: string, mode: MergeMode = 'override'): Directive {
  return { topic, statement, examples: [], antiPatterns: [], mode };
}

export interface DocOptions {
  readonly directives?: ReadonlyArray<Directive>;
  /** Relation targets; kind defaults to 'extends'. */
  readonly extends?: ReadonlyArray<string>;
  readonly supplements?: ReadonlyArray<string>;
  readonly appliesTo?: Applicability;
}

export function doc(name: string, options: DocOptions = {}): PolicyDocument {
  const relation = (kind: RelationKind) => (target: string) => ({ kind, target });
  return {
    name,
    description: `${name} policy`,
    directives: options.directives ?? [],
    relations: [
      ...(options.extends ?? []).map(relation('extends')),
      ...(options.supplements ?? []).map(relation('supplements')),
    ],
    appliesTo: options.appliesTo ?? {},
    origin: `test:${name}`,
  };
}

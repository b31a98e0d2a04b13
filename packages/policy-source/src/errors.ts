/**
 * Stratum Policy Source — Error Taxonomy
 *
 * Every failure the engine raises is a PolicyError with a stable `code`
 * discriminant. Load-time and graph-build failures abort construction; a
 * lookup failure is fatal only for the lookup that raised it.
 *
 * Conflicts between same-tier directives are deliberately not errors: they
 * are values in a composition result (see ConflictReport in @stratum/kernel).
 */

import type { ValidationError } from './types.js';

export type PolicyErrorCode = 'SCHEMA' | 'NOT_FOUND' | 'CYCLE';

/** Base class for all engine failures. */
export abstract class PolicyError extends Error {
  abstract readonly code: PolicyErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Malformed document metadata or body, a duplicate identity, or a relation
 * naming a document absent from the load batch. Aborts store construction.
 */
export class SchemaError extends PolicyError {
  override readonly code = 'SCHEMA' as const;

  /**
   * @param document - Offending document name, or its origin when the
   *   metadata block did not yield a name
   * @param details - Every problem found in that document
   */
  constructor(
    readonly document: string,
    readonly details: ReadonlyArray<ValidationError>,
  ) {
    super(
      `Invalid policy document "${document}": ` +
        details.map((d) => (d.context !== undefined ? `${d.context}: ${d.message}` : d.message)).join('; '),
    );
  }
}

/** A queried or referenced document name does not exist. */
export class NotFoundError extends PolicyError {
  override readonly code = 'NOT_FOUND' as const;

  constructor(readonly documentName: string) {
    super(`Policy document not found: "${documentName}"`);
  }
}

/**
 * The relation graph contains a cycle. `path` is the cycle itself, closed:
 * its first element is repeated at the end (`['a', 'b', 'a']`).
 */
export class CycleError extends PolicyError {
  override readonly code = 'CYCLE' as const;

  constructor(readonly path: ReadonlyArray<string>) {
    super(`Relation cycle detected: ${path.join(' -> ')}`);
  }
}

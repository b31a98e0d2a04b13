/**
 * Stratum Policy Source — Compiler
 *
 * Turns a document source into an immutable PolicyDocument, and provides the
 * canonical serialization used to hash documents and query contexts.
 *
 * Compiler guarantees:
 * - Deterministic: identical source produces an identical document, and
 *   structurally identical values produce identical canonical strings
 * - Rejecting: invalid sources throw SchemaError, never return a partial document
 * - Immutable: compiled documents are deep-frozen
 */

import { createHash } from 'node:crypto';
import { SchemaError } from './errors.js';
import { parseDocumentSource } from './parser.js';
import type { DocumentSource, PolicyDocument } from './types.js';

// ---------------------------------------------------------------------------
// Canonical JSON
// ---------------------------------------------------------------------------

/**
 * Produces a canonical JSON string with deterministic key ordering.
 *
 * Standard JSON.stringify preserves insertion order. This function sorts
 * object keys at every level, so identical data produces identical strings
 * regardless of how the objects were built. `undefined` serializes as null.
 *
 * @throws {TypeError} For values JSON cannot represent (functions, symbols, bigints)
 */
export function canonicalize(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }
  if (typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return '[' + value.map((v: unknown) => canonicalize(v)).join(',') + ']';
  }
  if (typeof value === 'object') {
    const pairs = Object.entries(value)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${canonicalize(v)}`);
    return '{' + pairs.join(',') + '}';
  }
  throw new TypeError(`Cannot canonicalize a value of type ${typeof value}`);
}

/** SHA-256 hex digest of the canonical form of a value. */
export function hashCanonical(value: unknown): string {
  return createHash('sha256').update(canonicalize(value)).digest('hex');
}

// ---------------------------------------------------------------------------
// Document compilation
// ---------------------------------------------------------------------------

/**
 * Compile one document source into a frozen PolicyDocument.
 *
 * The caller must use parseDocumentSource() directly if they want the
 * structured error list without an exception.
 *
 * @throws {SchemaError} If the source is malformed. The error names the
 *   document when the metadata block yielded a name, else the source origin.
 */
export function compileDocument(source: DocumentSource): PolicyDocument {
  const parsed = parseDocumentSource(source);
  if (!parsed.ok) {
    throw new SchemaError(parsed.name ?? source.origin, parsed.errors);
  }
  return deepFreeze(parsed.document);
}

/**
 * Recursively freeze a plain data structure.
 *
 * @internal
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * @stratum/policy-source
 *
 * Policy document source format: parser, compiler, core types and the
 * engine's error taxonomy.
 *
 * This package is the base layer of the Stratum type system. It defines:
 * - The PolicyDocument, Directive, Relation and Applicability model
 * - parseDocumentSource() and compileDocument()
 * - Canonical JSON serialization and hashing
 * - Identifier glob matching for `appliesTo.paths`
 * - SchemaError, NotFoundError and CycleError
 *
 * All other Stratum packages depend on this package. This package has no
 * internal Stratum dependencies.
 */

// Types
export type {
  Applicability,
  Directive,
  DocumentSource,
  MergeMode,
  ParseResult,
  PolicyDocument,
  Relation,
  RelationKind,
  ValidationError,
} from './types.js';

export { DEFAULT_MERGE_MODE, MERGE_MODES, RELATION_KINDS } from './types.js';

// Errors
export type { PolicyErrorCode } from './errors.js';
export { CycleError, NotFoundError, PolicyError, SchemaError } from './errors.js';

// Functions
export { canonicalize, compileDocument, deepFreeze, hashCanonical } from './compiler.js';
export { globToRegExp, matchesGlob } from './glob.js';
export { normalizeTag, normalizeTopic, parseDocumentSource } from './parser.js';

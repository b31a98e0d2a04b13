/**
 * @stratum/kernel
 *
 * Stratum resolution kernel — document store, precedence graph builder,
 * match engine, composition engine, conflict resolver, query API, snapshot
 * builder and resolution logger.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:child_process, node:net, or any other I/O API. node:crypto is used
 * (through @stratum/policy-source) for deterministic hashing only.
 *
 * Reading document sources from disk and persisting logs live in
 * @stratum/runtime-host.
 */

// Types
export type { Context, ContextInput } from './types/context.js';
export { createContext, describeContext } from './types/context.js';

export type {
  CompositionResult,
  ConflictReport,
  EffectiveDirective,
  OverrideRecord,
  QueryResult,
  ResolvedGroup,
  SerializedResult,
} from './types/result.js';

export type { PolicySnapshot, PolicySnapshotHash } from './types/snapshot.js';

export type { ResolutionLog } from './types/log.js';
export { ResolutionOutcome } from './types/log.js';

// Log sink interface (implementation lives in runtime-host)
export type { LogSink } from './logging/log-sink.js';
export { ResolutionLogger, computeContextHash, toResolutionLog } from './logging/resolution-log.js';

// Implementations
export { DocumentStore, compareNames } from './store/document-store.js';
export type { PrecedenceNode } from './graph/precedence.js';
export { PrecedenceGraph, buildPrecedenceGraph } from './graph/precedence.js';
export { isApplicable, match } from './match/matcher.js';
export type { ComposeOptions } from './composition/composer.js';
export { compose } from './composition/composer.js';
export { ConflictResolver } from './composition/conflict-resolver.js';
export { query, serializeResult } from './query/query.js';
export { buildSnapshot, buildSnapshotFromDocuments, hashDocuments } from './snapshot/builder.js';
export type { PolicyEngineOptions } from './engine/policy-engine.js';
export { PolicyEngine } from './engine/policy-engine.js';

// Re-export the document model and error taxonomy so consumers of
// @stratum/kernel do not need a direct dependency on policy-source.
export type {
  Applicability,
  Directive,
  DocumentSource,
  MergeMode,
  PolicyDocument,
  Relation,
  RelationKind,
  ValidationError,
} from '@stratum/policy-source';
export {
  CycleError,
  NotFoundError,
  PolicyError,
  SchemaError,
} from '@stratum/policy-source';

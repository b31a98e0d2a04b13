/**
 * Stratum Runtime Host — File-backed Resolution Log Sink
 *
 * Implements the LogSink interface from @stratum/kernel by appending one
 * JSONL line per query to `logs/resolutions.jsonl` through the injected
 * StateIO.
 *
 * The write is synchronous: the entry is on disk before query() returns.
 */

import type { LogSink, ResolutionLog } from '@stratum/kernel';
import type { StateIO } from '../state/state-io.js';
import { ulid } from './ulid.js';

export const RESOLUTION_LOG_FILE = 'resolutions.jsonl';

export class FileLogSink implements LogSink {
  constructor(private readonly stateIO: StateIO) {}

  append(entry: ResolutionLog): void {
    const line = JSON.stringify({
      event_id: ulid(),
      timestamp: entry.timestamp,
      outcome: entry.outcome,
      identifier: entry.identifier,
      language: entry.language,
      applied_documents: entry.applied_documents,
      override_count: entry.override_count,
      conflict_topics: entry.conflict_topics,
      error: entry.error,
      snapshot_hash: entry.snapshot_hash,
      context_hash: entry.context_hash,
    });
    this.stateIO.appendLine(RESOLUTION_LOG_FILE, line);
  }
}

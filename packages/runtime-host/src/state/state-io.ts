/**
 * Stratum Runtime Host — StateIO Interface
 *
 * An injectable I/O abstraction over the Stratum home directory: JSON state
 * files under `state/` and append-only JSONL logs under `logs/`.
 *
 * Two implementations are provided:
 *   - FileStateIO   — durable file I/O under a home directory
 *   - MemoryStateIO — in-memory I/O for tests and embedded (non-persistent) use
 *
 * Everything that persists (the resolution log sink, the snapshot record)
 * takes a StateIO rather than touching the file system itself.
 */

import { appendFileSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

// ---------------------------------------------------------------------------
// StateIO Interface
// ---------------------------------------------------------------------------

/**
 * Reads, writes and appends state by relative filename; implementations
 * decide where the bytes live.
 */
export interface StateIO {
  /**
   * Read and parse a JSON state file.
   *
   * Returns undefined if the file does not exist or is not valid JSON.
   * The value is untrusted: callers narrow it before use.
   */
  readJson(filename: string): unknown;

  /**
   * Serialize a value as JSON and write it, replacing any existing file.
   */
  writeJson(filename: string, value: unknown): void;

  /**
   * Append one line to a log file. A newline is added after `line`.
   */
  appendLine(logfilename: string, line: string): void;

  /**
   * Raw text of a log file; empty string if it does not exist.
   */
  readLogRaw(logfilename: string): string;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

/**
 * File-system StateIO rooted at a Stratum home directory.
 *
 *   `<home>/state/<filename>`    JSON state
 *   `<home>/logs/<logfilename>`  JSONL logs
 *
 * Directories are created on first write. ENOENT and SyntaxError on read
 * are recoverable; any other I/O error is rethrown.
 */
export class FileStateIO implements StateIO {
  constructor(private readonly homeDir: string) {}

  readJson(filename: string): unknown {
    try {
      return JSON.parse(readFileSync(join(this.homeDir, 'state', filename), 'utf-8'));
    } catch (err: unknown) {
      if (err instanceof SyntaxError || isNodeError(err, 'ENOENT')) {
        return undefined;
      }
      throw err;
    }
  }

  writeJson(filename: string, value: unknown): void {
    const stateDir = join(this.homeDir, 'state');
    mkdirSync(stateDir, { recursive: true });
    writeFileSync(join(stateDir, filename), JSON.stringify(value, null, 2) + '\n', 'utf-8');
  }

  appendLine(logfilename: string, line: string): void {
    const logsDir = join(this.homeDir, 'logs');
    mkdirSync(logsDir, { recursive: true });
    appendFileSync(join(logsDir, logfilename), line + '\n', 'utf-8');
  }

  readLogRaw(logfilename: string): string {
    try {
      return readFileSync(join(this.homeDir, 'logs', logfilename), 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return '';
      }
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryStateIO
// ---------------------------------------------------------------------------

/**
 * In-memory StateIO. Instances are isolated from one another.
 *
 * writeJson round-trips through JSON so values read back exactly as
 * FileStateIO would return them (undefined fields dropped, and so on).
 */
export class MemoryStateIO implements StateIO {
  private readonly store = new Map<string, string>();
  private readonly logs = new Map<string, string[]>();

  readJson(filename: string): unknown {
    const raw = this.store.get(filename);
    return raw === undefined ? undefined : JSON.parse(raw);
  }

  writeJson(filename: string, value: unknown): void {
    this.store.set(filename, JSON.stringify(value));
  }

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /** Lines appended to a log file. Not part of StateIO; for tests. */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  readLogRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    return lines.length === 0 ? '' : lines.join('\n') + '\n';
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** True iff `err` is a Node.js errno exception with the given code. */
export function isNodeError(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}

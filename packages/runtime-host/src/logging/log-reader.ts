/**
 * Stratum Runtime Host — LogReader
 *
 * Pure function for reading JSONL log files with dedupe-on-read. Callers
 * obtain the raw text through StateIO.readLogRaw().
 *
 * Guarantees:
 * - every valid line with a string `event_id` is returned; malformed lines
 *   are dropped and counted in `parseErrors`
 * - events are de-duplicated by `event_id`, first seen wins
 * - content not ending in '\n' is a partial trailing line: the last line is
 *   dropped and flagged
 * - more than one timestamp regression in file order flags `outOfOrder`
 * - output is sorted by (timestamp asc, event_id asc)
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * One parsed log line. Only `event_id` is guaranteed; the remaining fields
 * depend on the log and are left for the caller to narrow.
 */
export interface LogEvent {
  /** ULID; the deduplication key. */
  readonly event_id: string;
  /** ISO 8601, when the line carries a string timestamp. */
  readonly timestamp: string | undefined;
  /** Every field of the line, event_id and timestamp included. */
  readonly fields: Readonly<Record<string, unknown>>;
}

export interface LogReadStats {
  /** Non-empty lines processed, excluding a dropped partial line. */
  readonly totalLines: number;
  /** Events returned, after de-duplication. */
  readonly parsedEvents: number;
  readonly duplicates: number;
  /** Lines that were not JSON objects with a string event_id. */
  readonly parseErrors: number;
  readonly partialTrailingLine: boolean;
  /** More than one timestamp regression in file order. One is tolerated as clock skew. */
  readonly outOfOrder: boolean;
}

export interface LogReadResult {
  readonly events: ReadonlyArray<LogEvent>;
  readonly stats: LogReadStats;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export function readLog(rawContent: string): LogReadResult {
  const partialTrailingLine = rawContent.length > 0 && !rawContent.endsWith('\n');
  const rawLines = rawContent.split('\n');
  const lines = (partialTrailingLine ? rawLines.slice(0, -1) : rawLines).filter((l) => l.length > 0);

  let duplicates = 0;
  let parseErrors = 0;
  const seen = new Set<string>();
  const inFileOrder: LogEvent[] = [];

  for (const line of lines) {
    const event = parseEvent(line);
    if (event === null) {
      parseErrors++;
    } else if (seen.has(event.event_id)) {
      duplicates++;
    } else {
      seen.add(event.event_id);
      inFileOrder.push(event);
    }
  }

  let regressions = 0;
  let previous: string | undefined;
  for (const event of inFileOrder) {
    if (previous !== undefined && event.timestamp !== undefined && event.timestamp < previous) {
      regressions++;
    }
    previous = event.timestamp ?? previous;
  }

  const events = [...inFileOrder].sort(
    (a, b) => compare(a.timestamp ?? '', b.timestamp ?? '') || compare(a.event_id, b.event_id),
  );

  return {
    events,
    stats: {
      totalLines: lines.length,
      parsedEvents: events.length,
      duplicates,
      parseErrors,
      partialTrailingLine,
      outOfOrder: regressions > 1,
    },
  };
}

function parseEvent(line: string): LogEvent | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (err: unknown) {
    if (err instanceof SyntaxError) return null;
    throw err;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return null;
  }
  const fields: Record<string, unknown> = { ...parsed };
  const eventId = fields['event_id'];
  if (typeof eventId !== 'string') {
    return null;
  }
  const timestamp = fields['timestamp'];
  return {
    event_id: eventId,
    timestamp: typeof timestamp === 'string' ? timestamp : undefined,
    fields,
  };
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

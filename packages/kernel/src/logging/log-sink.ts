/**
 * Stratum Kernel — Log Sink Interface
 *
 * Defines the injection point for resolution log persistence.
 *
 * The kernel owns the contract (this interface) and the ResolutionLogger
 * class. Concrete implementations live in the runtime host and are injected
 * at construction time; the kernel never writes to disk directly.
 */

import type { ResolutionLog } from '../types/log.js';

/**
 * A sink that receives and persists resolution log entries.
 *
 * append() completes before the query returns. Implementations must not
 * silently discard entries; a failing sink throws.
 */
export interface LogSink {
  append(entry: ResolutionLog): void;
}

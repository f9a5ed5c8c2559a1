/**
 * synthctl Engine — Log Sink Interface
 *
 * The engine owns this contract and the SelectionLogger. Concrete sinks
 * live in runtime-host and are injected at construction time; the engine
 * never writes to disk itself.
 */

import type { SelectionLogEntry } from './selection-log.js';

/**
 * A sink that receives and persists selection log entries.
 * Implementations must not silently discard entries.
 */
export interface LogSink {
  append(entry: SelectionLogEntry): void;
}

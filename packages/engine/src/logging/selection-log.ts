/**
 * synthctl Engine — Selection Logger
 *
 * Every plan records one entry: which rules ran, how many devices they
 * matched, and the targets and agents that came out. Given the same
 * inventory, an entry's rule hashes reproduce its selection.
 *
 * Without an injected sink (tests, previews) record() is a no-op.
 */

import type { LogSink } from './log-sink.js';

export interface SelectionLogEntry {
  readonly test_name: string;
  readonly test_type: string;
  /** SHA-256 of the compiled target rule list; null when targets are not rule-selected. */
  readonly target_rules_hash: string | null;
  /** SHA-256 of the compiled agent rule list. */
  readonly agent_rules_hash: string;
  readonly device_count: number;
  readonly matched_devices: number;
  readonly targets: ReadonlyArray<string>;
  readonly agents: ReadonlyArray<string>;
  /** Set when the plan failed; the entry is recorded either way. */
  readonly error?: string | undefined;
  /** ISO-8601 */
  readonly timestamp: string;
}

export class SelectionLogger {
  constructor(private readonly sink?: LogSink) {}

  record(entry: SelectionLogEntry): void {
    this.sink?.append(entry);
  }
}

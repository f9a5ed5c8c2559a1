/**
 * synthctl Runtime Host — File-backed Selection Log Sink
 *
 * Implements the LogSink interface from @synthctl/engine by appending one
 * JSONL line per plan to `<home>/logs/selections.jsonl`. Each line is the
 * engine's SelectionLogEntry prefixed with a ULID `event_id`.
 *
 * The engine owns LogSink and SelectionLogger; this is the only place
 * that writes selection entries to disk. The write is synchronous, so the
 * entry is on disk before the test is submitted.
 */

import type { LogSink, SelectionLogEntry } from '@synthctl/engine';
import type { StateIO } from '../state/state-io.js';
import { ulid } from './ulid.js';

export const SELECTION_LOG = 'selections.jsonl';

export class FileLogSink implements LogSink {
  constructor(
    private readonly stateIO: StateIO,
    private readonly nextId: () => string = ulid,
  ) {}

  append(entry: SelectionLogEntry): void {
    this.stateIO.appendLine(SELECTION_LOG, JSON.stringify({ event_id: this.nextId(), ...entry }));
  }
}

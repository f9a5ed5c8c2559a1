/**
 * synthctl Runtime Host — FileLogSink Tests
 *
 *   LOG-U1: each entry becomes one selections.jsonl line prefixed by an event_id
 *   LOG-U2: distinct entries get distinct, increasing event_ids
 *   LOG-U3: lines written by the sink are read back by readLog
 *
 * Isolation: uses MemoryStateIO, no filesystem I/O.
 */

import { describe, it, expect } from 'vitest';
import { SelectionLogger } from '@synthctl/engine';
import type { SelectionLogEntry } from '@synthctl/engine';
import { FileLogSink, SELECTION_LOG } from '../src/logging/file-log-sink.js';
import { readLog } from '../src/logging/log-reader.js';
import { ulidFactory } from '../src/logging/ulid.js';
import { MemoryStateIO } from '../src/state/state-io.js';

function makeEntry(overrides: Partial<SelectionLogEntry> = {}): SelectionLogEntry {
  return {
    test_name: 'edge-monitor',
    test_type: 'ip',
    target_rules_hash: 'a'.repeat(64),
    agent_rules_hash: 'b'.repeat(64),
    device_count: 4,
    matched_devices: 2,
    targets: ['192.0.2.1'],
    agents: ['101'],
    timestamp: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('FileLogSink', () => {
  it('LOG-U1: appends the entry with an event_id first', () => {
    const io = new MemoryStateIO();
    const sink = new FileLogSink(io, () => '01HX0000000000000000000001');

    sink.append(makeEntry());

    expect(io.readLines(SELECTION_LOG)).toEqual([
      '{"event_id":"01HX0000000000000000000001","test_name":"edge-monitor","test_type":"ip",' +
        `"target_rules_hash":"${'a'.repeat(64)}","agent_rules_hash":"${'b'.repeat(64)}",` +
        '"device_count":4,"matched_devices":2,"targets":["192.0.2.1"],"agents":["101"],' +
        '"timestamp":"2026-01-01T00:00:00.000Z"}',
    ]);
  });

  it('LOG-U2: two entries get distinct, increasing event_ids', () => {
    const io = new MemoryStateIO();
    const sink = new FileLogSink(io, ulidFactory({ now: () => 1000 }));

    sink.append(makeEntry());
    sink.append(makeEntry());

    const ids = io.readLines(SELECTION_LOG).map((line) => readLog(line + '\n').records[0]?.event_id);
    expect(ids[0]).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
    expect(ids[1]).not.toBe(ids[0]);
    expect(String(ids[1]) > String(ids[0])).toBe(true);
  });

  it('LOG-U3: entries logged through SelectionLogger read back as records', () => {
    const io = new MemoryStateIO();
    const logger = new SelectionLogger(new FileLogSink(io));

    logger.record(makeEntry({ target_rules_hash: null, error: 'no agents selected for test "edge-monitor"' }));

    const { records, stats } = readLog(io.readLogRaw(SELECTION_LOG));
    expect(stats.parseErrors).toBe(0);
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      test_name: 'edge-monitor',
      target_rules_hash: null,
      error: 'no agents selected for test "edge-monitor"',
    });
  });
});

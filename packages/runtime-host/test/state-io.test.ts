/**
 * synthctl Runtime Host — StateIO Contract Tests
 *
 * Verifies both implementations against the same contract:
 *
 *   SIO-U1: readJson returns undefined for a document never written
 *   SIO-U2: writeJson then readJson round-trips through JSON
 *   SIO-U3: readLogRaw returns '' for a log never written
 *   SIO-U4: readLogRaw returns appended lines, each terminated by '\n'
 *   SIO-U5: FileStateIO lays files out under the home directory
 *
 * Isolation: MemoryStateIO tests have no I/O. FileStateIO tests use temp dirs.
 */

import { describe, it, expect } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FileStateIO, MemoryStateIO } from '../src/state/state-io.js';
import type { StateIO } from '../src/state/state-io.js';

function tempHome(): string {
  return mkdtempSync(join(tmpdir(), 'synthctl-sio-'));
}

const implementations: ReadonlyArray<{ name: string; create: () => StateIO }> = [
  { name: 'MemoryStateIO', create: () => new MemoryStateIO() },
  { name: 'FileStateIO', create: () => new FileStateIO(tempHome()) },
];

describe.each(implementations)('$name', ({ create }) => {
  it('SIO-U1: readJson returns undefined for a missing document', () => {
    expect(create().readJson('profiles/default.json')).toBeUndefined();
  });

  it('SIO-U2: writeJson then readJson round-trips, dropping undefined fields', () => {
    const io = create();
    io.writeJson('profiles/default.json', { email: 'ops@example.com', api_url: undefined });
    expect(io.readJson('profiles/default.json')).toEqual({ email: 'ops@example.com' });
  });

  it('SIO-U3: readLogRaw returns an empty string for an unwritten log', () => {
    const io = create();
    io.appendLine('other.jsonl', '{"event_id":"A"}');
    expect(io.readLogRaw('selections.jsonl')).toBe('');
  });

  it('SIO-U4: readLogRaw returns appended lines with a terminal newline', () => {
    const io = create();
    io.appendLine('selections.jsonl', '{"event_id":"A"}');
    io.appendLine('selections.jsonl', '{"event_id":"B"}');
    expect(io.readLogRaw('selections.jsonl')).toBe('{"event_id":"A"}\n{"event_id":"B"}\n');
  });
});

describe('FileStateIO — SIO-U5: layout', () => {
  it('writes documents relative to the home directory', () => {
    const home = tempHome();
    new FileStateIO(home).writeJson('profiles/lab.json', { email: 'ops@example.com' });
    expect(JSON.parse(readFileSync(join(home, 'profiles', 'lab.json'), 'utf-8'))).toEqual({
      email: 'ops@example.com',
    });
  });

  it('appends log lines under logs/', () => {
    const home = tempHome();
    new FileStateIO(home).appendLine('selections.jsonl', 'x');
    expect(existsSync(join(home, 'logs', 'selections.jsonl'))).toBe(true);
  });

  it('reads a log written by another process', () => {
    const home = tempHome();
    mkdirSync(join(home, 'logs'));
    writeFileSync(join(home, 'logs', 'selections.jsonl'), 'a\nb');
    expect(new FileStateIO(home).readLogRaw('selections.jsonl')).toBe('a\nb');
  });

  it('rethrows malformed JSON instead of treating it as missing', () => {
    const home = tempHome();
    mkdirSync(join(home, 'profiles'));
    writeFileSync(join(home, 'profiles', 'default.json'), '{ not json');
    expect(() => new FileStateIO(home).readJson('profiles/default.json')).toThrow(SyntaxError);
  });
});

describe('MemoryStateIO.readLines', () => {
  it('returns the appended lines without newlines', () => {
    const io = new MemoryStateIO();
    io.appendLine('selections.jsonl', 'a');
    io.appendLine('selections.jsonl', 'b');
    expect(io.readLines('selections.jsonl')).toEqual(['a', 'b']);
  });
});

/**
 * synthctl Runtime Host — StateIO Interface
 *
 * An injectable I/O abstraction for the files synthctl keeps under its
 * home directory: JSON documents (profiles) and append-only JSONL logs.
 *
 * Two implementations are provided:
 *   - FileStateIO   — durable file I/O under a home directory
 *   - MemoryStateIO — in-memory I/O for tests
 *
 * Callers never build absolute paths; they name a file relative to the
 * home directory (JSON) or to its `logs/` subdirectory (JSONL).
 */

import { appendFileSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';

// ---------------------------------------------------------------------------
// StateIO Interface
// ---------------------------------------------------------------------------

/**
 * Invariants:
 * - readJson and writeJson address paths relative to the home directory
 *   (e.g. `profiles/default.json`)
 * - appendLine and readLogRaw address the `logs/` subdirectory
 */
export interface StateIO {
  /**
   * Read and parse a JSON document.
   *
   * Returns undefined when the file does not exist. The parsed value is
   * returned unvalidated; callers check its shape.
   *
   * @throws SyntaxError when the file exists but is not valid JSON
   */
  readJson(path: string): unknown;

  /** Write a value as pretty-printed JSON, creating parent directories. */
  writeJson(path: string, value: unknown): void;

  /** Append one line (a newline is added) to a log file. */
  appendLine(logfile: string, line: string): void;

  /** Raw text of a log file, or '' when it does not exist. */
  readLogRaw(logfile: string): string;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

/**
 * StateIO over the file system, rooted at a home directory.
 *
 * Synchronous I/O matches the CLI's single-command lifetime. A missing
 * file is the only recoverable error; anything else is rethrown.
 */
export class FileStateIO implements StateIO {
  constructor(private readonly homeDir: string) {}

  readJson(path: string): unknown {
    const filePath = join(this.homeDir, path);
    let raw: string;
    try {
      raw = readFileSync(filePath, 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return undefined;
      }
      throw err;
    }
    return JSON.parse(raw);
  }

  writeJson(path: string, value: unknown): void {
    const filePath = join(this.homeDir, path);
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(filePath, JSON.stringify(value, null, 2) + '\n', 'utf-8');
  }

  appendLine(logfile: string, line: string): void {
    const logsDir = join(this.homeDir, 'logs');
    mkdirSync(logsDir, { recursive: true });
    appendFileSync(join(logsDir, logfile), line + '\n', 'utf-8');
  }

  readLogRaw(logfile: string): string {
    try {
      return readFileSync(join(this.homeDir, 'logs', logfile), 'utf-8');
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
 * In-memory StateIO. Instances share nothing.
 *
 * Documents round-trip through JSON so tests see what FileStateIO would
 * have persisted (undefined fields dropped, and so on).
 */
export class MemoryStateIO implements StateIO {
  private readonly documents = new Map<string, string>();
  private readonly logs = new Map<string, string[]>();

  readJson(path: string): unknown {
    const raw = this.documents.get(path);
    return raw === undefined ? undefined : JSON.parse(raw);
  }

  writeJson(path: string, value: unknown): void {
    this.documents.set(path, JSON.stringify(value));
  }

  appendLine(logfile: string, line: string): void {
    const lines = this.logs.get(logfile) ?? [];
    lines.push(line);
    this.logs.set(logfile, lines);
  }

  /** Lines appended to a log file. Not part of StateIO; for test assertions. */
  readLines(logfile: string): ReadonlyArray<string> {
    return this.logs.get(logfile) ?? [];
  }

  readLogRaw(logfile: string): string {
    const lines = this.logs.get(logfile) ?? [];
    if (lines.length === 0) return '';
    return lines.join('\n') + '\n';
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function isNodeError(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

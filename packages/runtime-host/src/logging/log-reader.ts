/**
 * synthctl Runtime Host — Selection Log Reader
 *
 * Pure functions over the raw text of `selections.jsonl`.
 *
 * Guarantees:
 *   LOGR-U1: every well-formed selection record is returned; malformed
 *            lines and lines that are not selection records are counted
 *            in parseErrors and dropped
 *   LOGR-U2: records are deduplicated by event_id, first seen wins
 *   LOGR-U3: content not ending in '\n' has its last line dropped and
 *            flagged as a partial trailing line
 *   LOGR-U4: more than one timestamp regression in file order sets outOfOrder
 *   LOGR-U5: output is sorted by (timestamp, event_id)
 *   LOGR-U6: empty input yields no records and zero stats
 *
 * No I/O. Callers obtain the content through StateIO.readLogRaw().
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const SelectionRecordSchema = z.object({
  event_id: z.string().min(1),
  timestamp: z.string(),
  test_name: z.string(),
  test_type: z.string(),
  target_rules_hash: z.string().nullable(),
  agent_rules_hash: z.string(),
  device_count: z.number().int().nonnegative(),
  matched_devices: z.number().int().nonnegative(),
  targets: z.array(z.string()),
  agents: z.array(z.string()),
  error: z.string().optional(),
});

/** One line of selections.jsonl. */
export type SelectionRecord = z.infer<typeof SelectionRecordSchema>;

export interface LogReadStats {
  /** Non-empty lines processed, the dropped partial line excluded. */
  totalLines: number;
  /** Records returned, after deduplication. */
  parsedEvents: number;
  duplicates: number;
  parseErrors: number;
  partialTrailingLine: boolean;
  /** A single regression is tolerated as clock skew. */
  outOfOrder: boolean;
}

export interface LogReadResult {
  records: ReadonlyArray<SelectionRecord>;
  stats: LogReadStats;
}

// ---------------------------------------------------------------------------
// Reading
// ---------------------------------------------------------------------------

export function readLog(rawContent: string): LogReadResult {
  const partialTrailingLine = rawContent.length > 0 && !rawContent.endsWith('\n');
  const rawLines = rawContent.split('\n');
  const lineList = (partialTrailingLine ? rawLines.slice(0, -1) : rawLines).filter(
    (l) => l.length > 0,
  );

  let duplicates = 0;
  let parseErrors = 0;
  const seen = new Set<string>();
  const inFileOrder: SelectionRecord[] = [];

  for (const line of lineList) {
    const record = parseLine(line);
    if (record === undefined) {
      parseErrors++;
    } else if (seen.has(record.event_id)) {
      duplicates++;
    } else {
      seen.add(record.event_id);
      inFileOrder.push(record);
    }
  }

  let regressions = 0;
  let previous: string | undefined;
  for (const record of inFileOrder) {
    if (previous !== undefined && record.timestamp < previous) {
      regressions++;
    }
    previous = record.timestamp;
  }

  const records = [...inFileOrder].sort(
    (a, b) => compare(a.timestamp, b.timestamp) || compare(a.event_id, b.event_id),
  );

  return {
    records,
    stats: {
      totalLines: lineList.length,
      parsedEvents: records.length,
      duplicates,
      parseErrors,
      partialTrailingLine,
      outOfOrder: regressions > 1,
    },
  };
}

function parseLine(line: string): SelectionRecord | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return undefined;
  }
  const result = SelectionRecordSchema.safeParse(parsed);
  return result.success ? result.data : undefined;
}

function compare(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

// ---------------------------------------------------------------------------
// Filtering
// ---------------------------------------------------------------------------

export interface SelectionFilter {
  /** Keep only records for this test name. */
  readonly testName?: string | undefined;
  /** Keep only the most recent N records. */
  readonly limit?: number | undefined;
}

export function filterSelections(
  records: ReadonlyArray<SelectionRecord>,
  filter: SelectionFilter,
): SelectionRecord[] {
  const matching = records.filter(
    (r) => filter.testName === undefined || r.test_name === filter.testName,
  );
  if (filter.limit === undefined || filter.limit >= matching.length) {
    return matching;
  }
  return matching.slice(matching.length - filter.limit);
}

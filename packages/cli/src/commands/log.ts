/**
 * synthctl log — Query the selection log
 *
 * Every planned test, created or not, leaves one record in
 * `<home>/logs/selections.jsonl`. Records are shown oldest first.
 */

import { Command, InvalidArgumentError } from 'commander';
import { filterSelections, readLog, SELECTION_LOG } from '@synthctl/runtime-host';
import type { CliContext } from '../context.js';
import { openSession } from '../context.js';
import { formatSelection } from '../output/format.js';
import { t } from '../output/theme.js';

interface LogOptions {
  test?: string;
  limit?: number;
  json?: boolean;
}

export function parseLimit(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError('expected a positive integer');
  }
  return n;
}

export function logCommand(ctx: CliContext): Command {
  const { io } = ctx;
  return new Command('log')
    .description('Query the selection log')
    .option('--test <name>', 'Only records for this test')
    .option('--limit <n>', 'Only the most recent N records', parseLimit)
    .option('--json', 'Output as JSON lines')
    .action((options: LogOptions, cmd: Command) => {
      const { state } = openSession(ctx, cmd);
      const { records, stats } = readLog(state.readLogRaw(SELECTION_LOG));
      const selected = filterSelections(records, { testName: options.test, limit: options.limit });

      if (stats.parseErrors > 0 || stats.partialTrailingLine) {
        io.err(t.amber(
          `warning: skipped ${stats.parseErrors} malformed line(s)` +
          (stats.partialTrailingLine ? ' and a partial trailing line' : ''),
        ));
      }

      for (const record of selected) {
        if (options.json === true) {
          io.out(JSON.stringify(record));
        } else {
          const line = formatSelection(record);
          io.out(record.error === undefined ? line : t.red(line));
        }
      }
    });
}

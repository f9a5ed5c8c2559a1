/**
 * synthctl test — Manage synthetic tests
 *
 * `create` and `compare` plan a test from a configuration file: targets
 * and agents are selected from the live inventory and every plan is
 * recorded in the selection log, whether or not a test is created from it.
 */

import { Command } from 'commander';
import { diffTests } from '@synthctl/engine';
import type { TestStatus } from '@synthctl/engine';
import { loadTestConfig } from '@synthctl/runtime-host';
import type { CliContext } from '../context.js';
import { openClients, openSession, planAndLog } from '../context.js';
import { briefTest, formatDiff, formatObject, formatPlan } from '../output/format.js';
import { t } from '../output/theme.js';

interface ListOptions {
  brief?: boolean;
  json?: boolean;
}

interface CreateOptions {
  dryRun?: boolean;
  yes?: boolean;
}

export function testCommand(ctx: CliContext): Command {
  const { io } = ctx;
  const test = new Command('test').description('Manage synthetic tests');

  test
    .command('list')
    .description('List tests')
    .option('--brief', 'Show only id, name and type')
    .option('--json', 'Output as JSON')
    .action(async (options: ListOptions, cmd: Command) => {
      const { synth } = openClients(ctx, openSession(ctx, cmd));
      const tests = await synth.listTests();
      if (options.json === true) {
        io.out(JSON.stringify(tests, null, 2));
        return;
      }
      for (const item of tests) {
        if (options.brief === true) {
          io.out(briefTest(item));
        } else {
          io.out(t.blue(`${item.name}:`));
          formatObject(item, 1).forEach((line) => io.out(line));
        }
      }
    });

  test
    .command('get <id>')
    .description('Show one test')
    .option('--json', 'Output as JSON')
    .action(async (id: string, options: ListOptions, cmd: Command) => {
      const { synth } = openClients(ctx, openSession(ctx, cmd));
      const item = await synth.getTest(id);
      if (options.json === true) {
        io.out(JSON.stringify(item, null, 2));
        return;
      }
      formatObject(item).forEach((line) => io.out(line));
    });

  test
    .command('create <file>')
    .description('Plan a test from a configuration file and create it')
    .option('--dry-run', 'Show the planned test without creating it')
    .option('--yes', 'Create without asking for confirmation')
    .action(async (file: string, options: CreateOptions, cmd: Command) => {
      const config = loadTestConfig(file);
      const session = openSession(ctx, cmd);
      const clients = openClients(ctx, session);
      const plan = await planAndLog(ctx, session, clients, config);

      formatPlan(plan).forEach((line) => io.out(line));
      if (options.dryRun === true) {
        io.out(t.muted('dry run: test not created'));
        return;
      }
      if (options.yes !== true && !(await io.confirm(`Create test "${plan.test.name}"?`))) {
        io.out(t.muted('aborted'));
        return;
      }

      const created = await clients.synth.createTest(plan.test);
      io.out(t.green(`created test ${created.id} "${created.name}"`));
    });

  test
    .command('delete <id>')
    .description('Delete a test')
    .action(async (id: string, _options: object, cmd: Command) => {
      const { synth } = openClients(ctx, openSession(ctx, cmd));
      await synth.deleteTest(id);
      io.out(t.green(`deleted test ${id}`));
    });

  test
    .command('pause <id>')
    .description('Pause a test')
    .action((id: string, _options: object, cmd: Command) =>
      setStatus(ctx, cmd, id, 'TEST_STATUS_PAUSED', 'paused'),
    );

  test
    .command('resume <id>')
    .description('Resume a paused test')
    .action((id: string, _options: object, cmd: Command) =>
      setStatus(ctx, cmd, id, 'TEST_STATUS_ACTIVE', 'resumed'),
    );

  test
    .command('compare <id> <file>')
    .description('Compare a deployed test (left) with the test a configuration file plans (right)')
    .action(async (id: string, file: string, _options: object, cmd: Command) => {
      const config = loadTestConfig(file);
      const session = openSession(ctx, cmd);
      const clients = openClients(ctx, session);
      const [remote, plan] = await Promise.all([
        clients.synth.getTest(id),
        planAndLog(ctx, session, clients, config),
      ]);
      formatDiff(diffTests(remote, plan.test)).forEach((line) => io.out(line));
    });

  return test;
}

async function setStatus(
  ctx: CliContext,
  cmd: Command,
  id: string,
  status: TestStatus,
  verb: string,
): Promise<void> {
  const { synth } = openClients(ctx, openSession(ctx, cmd));
  await synth.setTestStatus(id, status);
  ctx.io.out(t.green(`test ${id} ${verb}`));
}

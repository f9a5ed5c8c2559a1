/**
 * synthctl device — Preview target selection
 */

import { Command } from 'commander';
import { isTargetless } from '@synthctl/engine';
import { ConfigurationError, describeRuleList } from '@synthctl/match-dsl';
import { loadTestConfig } from '@synthctl/runtime-host';
import type { CliContext } from '../context.js';
import { openClients, openPlanner, openSession } from '../context.js';
import { formatTargets } from '../output/format.js';
import { t } from '../output/theme.js';

export function deviceCommand(ctx: CliContext): Command {
  const { io } = ctx;
  const device = new Command('device').description('Preview target selection from the device inventory');

  device
    .command('match <file>')
    .description('Show the targets a configuration file derives, without creating a test')
    .action(async (file: string, _options: object, cmd: Command) => {
      const config = loadTestConfig(file);
      if (isTargetless(config.test.type)) {
        throw new ConfigurationError(`"${config.test.type}" tests take no targets`, 'targets');
      }
      const session = openSession(ctx, cmd);
      const clients = openClients(ctx, session);
      const selection = await openPlanner(ctx, session, clients).matchTargets(config.targets);

      if (config.targets.kind === 'devices' || config.targets.kind === 'agents') {
        io.out(t.blue('rules:'));
        describeRuleList(config.targets.rules).forEach((line) => io.out(`  ${line}`));
      }
      formatTargets(selection).forEach((line) => io.out(line));
    });

  return device;
}

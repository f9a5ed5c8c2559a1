/**
 * synthctl agent — Inspect agents and preview agent selection
 */

import { Command } from 'commander';
import { describeRuleList } from '@synthctl/match-dsl';
import { loadTestConfig } from '@synthctl/runtime-host';
import type { CliContext } from '../context.js';
import { openClients, openPlanner, openSession } from '../context.js';
import { briefAgent, formatAgentIds, formatObject } from '../output/format.js';
import { t } from '../output/theme.js';

interface ListOptions {
  brief?: boolean;
  json?: boolean;
}

export function agentCommand(ctx: CliContext): Command {
  const { io } = ctx;
  const agent = new Command('agent').description('Inspect agents');

  agent
    .command('list')
    .description('List agents')
    .option('--brief', 'Show only id, alias and type')
    .option('--json', 'Output as JSON')
    .action(async (options: ListOptions, cmd: Command) => {
      const { synth } = openClients(ctx, openSession(ctx, cmd));
      const agents = await synth.listAgents();
      if (options.json === true) {
        io.out(JSON.stringify(agents, null, 2));
        return;
      }
      for (const item of agents) {
        if (options.brief === true) {
          io.out(briefAgent(item));
        } else {
          formatObject(item).forEach((line) => io.out(line));
          io.out('');
        }
      }
    });

  agent
    .command('get <id>')
    .description('Show one agent')
    .option('--json', 'Output as JSON')
    .action(async (id: string, options: ListOptions, cmd: Command) => {
      const { synth } = openClients(ctx, openSession(ctx, cmd));
      const item = await synth.getAgent(id);
      if (options.json === true) {
        io.out(JSON.stringify(item, null, 2));
        return;
      }
      formatObject(item).forEach((line) => io.out(line));
    });

  agent
    .command('match <file>')
    .description('Show the agents the agent rules of a configuration file select')
    .action(async (file: string, _options: object, cmd: Command) => {
      const config = loadTestConfig(file);
      const session = openSession(ctx, cmd);
      const clients = openClients(ctx, session);
      const agents = await openPlanner(ctx, session, clients).matchAgents(config.agents);

      io.out(t.blue('rules:'));
      describeRuleList(config.agents).forEach((line) => io.out(`  ${line}`));
      formatAgentIds(agents).forEach((line) => io.out(line));
    });

  return agent;
}

/**
 * commands/index.ts — Commander program, configured and returned without parsing.
 *
 * Used by:
 *   src/bin/synthctl.ts   (the installed command)
 *   test/*.test.ts        (with an in-process context)
 */

import { Command } from 'commander';
import { DEFAULT_PROFILE, HOME_ENV } from '@synthctl/runtime-host';
import type { CliContext } from '../context.js';
import { processContext } from '../context.js';
import { agentCommand } from './agent.js';
import { deviceCommand } from './device.js';
import { logCommand } from './log.js';
import { profileCommand } from './profile.js';
import { testCommand } from './test.js';

export function createProgram(ctx: CliContext = processContext()): Command {
  const program = new Command()
    .name('synthctl')
    .description('Select synthetic test targets and agents from inventory, and manage the tests.')
    .version('0.1.0')
    .option('--profile <name>', 'API profile to use', DEFAULT_PROFILE)
    .option('--home <dir>', `State directory (default: $${HOME_ENV} or ~/.synthctl)`);

  program.addCommand(testCommand(ctx));
  program.addCommand(agentCommand(ctx));
  program.addCommand(deviceCommand(ctx));
  program.addCommand(logCommand(ctx));
  program.addCommand(profileCommand(ctx));

  return program;
}

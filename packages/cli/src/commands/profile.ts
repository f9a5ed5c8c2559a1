/**
 * synthctl profile — Store and show API credentials
 */

import { Command } from 'commander';
import { writeProfile } from '@synthctl/runtime-host';
import type { CliContext } from '../context.js';
import { openSession, resolveProfile } from '../context.js';
import { formatProfile } from '../output/format.js';
import { t } from '../output/theme.js';

interface SetOptions {
  email: string;
  token: string;
  apiUrl?: string;
  inventoryUrl?: string;
}

export function profileCommand(ctx: CliContext): Command {
  const { io } = ctx;
  const profile = new Command('profile').description('Manage API profiles');

  profile
    .command('set')
    .description('Store credentials under the selected profile name')
    .requiredOption('--email <email>', 'Account email')
    .requiredOption('--token <token>', 'API token')
    .option('--api-url <url>', 'Synthetics API base URL')
    .option('--inventory-url <url>', 'Device inventory API base URL')
    .action((options: SetOptions, cmd: Command) => {
      const session = openSession(ctx, cmd);
      writeProfile(session.state, session.profileName, {
        email: options.email,
        token: options.token,
        api_url: options.apiUrl,
        inventory_url: options.inventoryUrl,
      });
      io.out(t.green(`stored profile "${session.profileName}"`));
    });

  profile
    .command('show')
    .description('Show the selected profile with environment overrides applied')
    .action((_options: object, cmd: Command) => {
      const session = openSession(ctx, cmd);
      formatProfile(resolveProfile(ctx, session)).forEach((line) => io.out(line));
    });

  return profile;
}

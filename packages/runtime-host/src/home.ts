/**
 * synthctl Runtime Host — Home Directory Resolution
 *
 * Resolves the synthctl home directory using the following precedence:
 *
 *   1. Explicit `home` option (the --home CLI flag)
 *   2. SYNTHCTL_HOME environment variable
 *   3. Default: ~/.synthctl
 *
 * Everything synthctl persists lives under the resolved home:
 *
 *   <SYNTHCTL_HOME>/
 *     profiles/
 *       <name>.json
 *     logs/
 *       selections.jsonl
 */

import { mkdirSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';

export const HOME_ENV = 'SYNTHCTL_HOME';

export interface ResolveHomeOptions {
  /** Explicit override, highest precedence. */
  readonly home?: string | undefined;
  /** Environment to read SYNTHCTL_HOME from. Defaults to process.env. */
  readonly env?: NodeJS.ProcessEnv | undefined;
}

/**
 * Resolve the synthctl home directory to an absolute path, creating it
 * if it does not exist.
 */
export function resolveHome(opts: ResolveHomeOptions = {}): string {
  const env = opts.env ?? process.env;
  const fromEnv = env[HOME_ENV];

  let home: string;
  if (opts.home !== undefined && opts.home !== '') {
    home = opts.home;
  } else if (fromEnv !== undefined && fromEnv !== '') {
    home = fromEnv;
  } else {
    home = join(homedir(), '.synthctl');
  }

  const absolute = resolve(home);
  mkdirSync(absolute, { recursive: true });
  return absolute;
}

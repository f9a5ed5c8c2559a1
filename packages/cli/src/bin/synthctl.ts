#!/usr/bin/env -S node --import tsx
/**
 * bin/synthctl.ts — entry point for the `synthctl` command.
 *
 * Any error a command raises is printed to stderr in red and the process
 * exits with status 1. Usage errors are reported by Commander itself.
 */

import { createProgram } from '../commands/index.js';
import { describeError } from '../errors.js';
import { t } from '../output/theme.js';

try {
  await createProgram().parseAsync();
} catch (err: unknown) {
  process.stderr.write(t.red(`error: ${describeError(err)}`) + '\n');
  process.exitCode = 1;
}

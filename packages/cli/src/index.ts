/**
 * @synthctl/cli
 *
 * The synthctl command-line interface. The program is exported unparsed so
 * it can be driven in-process.
 */

export { createProgram } from './commands/index.js';
export type { CliContext, CliIO, GlobalOptions, Session } from './context.js';
export { processContext } from './context.js';
export { describeError } from './errors.js';

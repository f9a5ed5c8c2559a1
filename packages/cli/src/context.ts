/**
 * synthctl CLI — Command Context
 *
 * What every command needs from outside the process: where to write, how
 * to ask for confirmation, the environment, and (in tests) the HTTP
 * adapter and clock. Commands resolve the home directory, state and API
 * clients through this module so that none of them reads process globals
 * directly.
 */

import type { AxiosAdapter } from 'axios';
import type { Command } from 'commander';
import { TestPlanner } from '@synthctl/engine';
import type { TestConfig, TestPlan } from '@synthctl/engine';
import {
  connect,
  DEFAULT_PROFILE,
  FileLogSink,
  FileStateIO,
  loadProfile,
  resolveHome,
} from '@synthctl/runtime-host';
import type { ApiClients, ResolvedProfile, StateIO } from '@synthctl/runtime-host';
import { confirm } from './output/prompt.js';
import { t } from './output/theme.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  confirm(question: string): Promise<boolean>;
}

export interface CliContext {
  readonly io: CliIO;
  readonly env: NodeJS.ProcessEnv;
  readonly adapter?: AxiosAdapter | undefined;
  readonly now?: (() => Date) | undefined;
}

/** Options declared on the root program and visible to every subcommand. */
export type GlobalOptions = {
  readonly profile?: string | undefined;
  readonly home?: string | undefined;
};

export interface Session {
  readonly home: string;
  readonly state: StateIO;
  readonly profileName: string;
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

export function processContext(): CliContext {
  return {
    io: {
      out: (line) => {
        process.stdout.write(line + '\n');
      },
      err: (line) => {
        process.stderr.write(line + '\n');
      },
      confirm,
    },
    env: process.env,
  };
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

export function openSession(ctx: CliContext, cmd: Command): Session {
  const opts = cmd.optsWithGlobals<GlobalOptions>();
  const home = resolveHome({ home: opts.home, env: ctx.env });
  return {
    home,
    state: new FileStateIO(home),
    profileName: opts.profile ?? DEFAULT_PROFILE,
  };
}

export function resolveProfile(ctx: CliContext, session: Session): ResolvedProfile {
  return loadProfile(session.state, session.profileName, ctx.env);
}

export function openClients(ctx: CliContext, session: Session): ApiClients {
  return connect(resolveProfile(ctx, session), { adapter: ctx.adapter });
}

/** A planner over the API inventory that records to the session's selection log. */
export function openPlanner(ctx: CliContext, session: Session, clients: ApiClients): TestPlanner {
  return new TestPlanner(clients.source, {
    logSink: new FileLogSink(session.state),
    now: ctx.now,
  });
}

/**
 * Plan a test, warning on stderr when a failed plan could not be written
 * to the selection log.
 */
export async function planAndLog(
  ctx: CliContext,
  session: Session,
  clients: ApiClients,
  config: TestConfig,
): Promise<TestPlan> {
  const planner = openPlanner(ctx, session, clients);
  try {
    return await planner.plan(config);
  } finally {
    for (const failure of planner.logWriteFailures) {
      ctx.io.err(t.amber(`warning: selection log not written: ${failure}`));
    }
  }
}

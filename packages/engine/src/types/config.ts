/**
 * synthctl Engine — Test Configuration Types
 *
 * The compiled form of a test configuration file. Parsing and validation
 * of the file happen in runtime-host; the engine only consumes the result.
 */

import type { RuleList } from '@synthctl/match-dsl';
import type { AddressSources } from '../targets/derive.js';
import type { TestSpec } from '../tests/model.js';

/** Targets derived from matched devices' addresses. */
export interface DeviceTargets {
  readonly kind: 'devices';
  readonly rules: RuleList;
  readonly sources: AddressSources;
  /** Applied to the derived addresses, after deduplication. */
  readonly limit?: number | undefined;
}

/** Targets are the ids of matched agents (agent tests). */
export interface AgentTargets {
  readonly kind: 'agents';
  readonly rules: RuleList;
}

/** Targets listed verbatim (hostnames, URLs, addresses). */
export interface LiteralTargets {
  readonly kind: 'literal';
  readonly values: ReadonlyArray<string>;
}

export interface NoTargets {
  readonly kind: 'none';
}

export type TargetConfig = DeviceTargets | AgentTargets | LiteralTargets | NoTargets;

export interface TestConfig {
  readonly test: TestSpec;
  readonly targets: TargetConfig;
  readonly agents: RuleList;
}

/**
 * synthctl Engine — Test Planner
 *
 * Turns a compiled test configuration into a test document, reading the
 * inventory through an injected InventorySource.
 *
 * Planning contract:
 * - Devices and agents are fetched concurrently, each only when needed.
 * - Interfaces are fetched only for matched devices, and only when
 *   interface addresses are a configured source.
 * - Evaluation starts only after every collection is fully materialized.
 * - Every plan records exactly one selection log entry, including plans
 *   that fail. A plan whose entry cannot be written is not returned; a
 *   failed plan keeps its own error when the write fails as well.
 * - An empty target or agent selection fails the plan; no test document
 *   is produced from it.
 */

import { hashRuleList } from '@synthctl/match-dsl';
import type { InventoryObject, RuleList } from '@synthctl/match-dsl';
import { selectAgents } from '../agents/select.js';
import { EmptySelectionError } from '../errors.js';
import type { LogSink } from '../logging/log-sink.js';
import { SelectionLogger } from '../logging/selection-log.js';
import type { SelectionLogEntry } from '../logging/selection-log.js';
import { selectObjects } from '../selection/evaluator.js';
import { objectId } from '../selection/identity.js';
import { deriveAddresses } from '../targets/derive.js';
import { buildTest, isTargetless } from '../tests/model.js';
import type { SynTest } from '../tests/model.js';
import type { TargetConfig, TestConfig } from '../types/config.js';
import type { InventorySource, MatchedDevice } from '../types/inventory.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TargetSelection {
  readonly targets: ReadonlyArray<string>;
  /** Devices the device rules matched; empty unless targets come from devices. */
  readonly matchedDevices: ReadonlyArray<MatchedDevice>;
  /** Size of the device inventory the rules ran against. */
  readonly deviceCount: number;
}

export interface TestPlan extends TargetSelection {
  readonly test: SynTest;
  readonly agents: ReadonlyArray<string>;
}

export interface PlanOptions {
  readonly logSink?: LogSink | undefined;
  /** Clock for log timestamps. */
  readonly now?: (() => Date) | undefined;
}

// ---------------------------------------------------------------------------
// Planner
// ---------------------------------------------------------------------------

export class TestPlanner {
  /** Log write errors that occurred while a failed plan was being recorded. */
  readonly logWriteFailures: string[] = [];
  private readonly logger: SelectionLogger;
  private readonly now: () => Date;

  constructor(
    private readonly source: InventorySource,
    options: PlanOptions = {},
  ) {
    this.logger = new SelectionLogger(options.logSink);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Plan a test: select targets and agents, then build the test document.
   *
   * @throws {EmptySelectionError} when no targets or no agents are selected
   * @throws {ConfigurationError} on rules that cannot be evaluated
   */
  async plan(config: TestConfig): Promise<TestPlan> {
    const targetConfig: TargetConfig = isTargetless(config.test.type)
      ? { kind: 'none' }
      : config.targets;

    let selection: TargetSelection = { targets: [], matchedDevices: [], deviceCount: 0 };
    let agents: ReadonlyArray<string> = [];
    let plan: TestPlan;

    try {
      const [devices, agentInventory] = await Promise.all([
        targetConfig.kind === 'devices' ? this.source.listDevices() : nothing(),
        this.source.listAgents(),
      ]);

      selection = await this.selectFrom(targetConfig, devices, agentInventory);
      agents = selectAgents(config.agents, agentInventory);

      if (!isTargetless(config.test.type) && selection.targets.length === 0) {
        throw new EmptySelectionError('targets', config.test.name);
      }
      if (agents.length === 0) {
        throw new EmptySelectionError('agents', config.test.name);
      }

      plan = { ...selection, test: buildTest(config.test, selection.targets, agents), agents };
    } catch (err) {
      this.recordFailure(this.entry(config, targetConfig, selection, agents, err));
      throw err;
    }

    // A plan that cannot be logged is not returned.
    this.logger.record(this.entry(config, targetConfig, plan, plan.agents, undefined));
    return plan;
  }

  /** Select targets without planning a test (previews). */
  async matchTargets(targets: TargetConfig): Promise<TargetSelection> {
    const [devices, agentInventory] = await Promise.all([
      targets.kind === 'devices' ? this.source.listDevices() : nothing(),
      targets.kind === 'agents' ? this.source.listAgents() : nothing(),
    ]);
    return this.selectFrom(targets, devices, agentInventory);
  }

  /** Select agent ids without planning a test (previews). */
  async matchAgents(rules: RuleList): Promise<ReadonlyArray<string>> {
    return selectAgents(rules, await this.source.listAgents());
  }

  // -------------------------------------------------------------------------
  // Internal
  // -------------------------------------------------------------------------

  private async selectFrom(
    targets: TargetConfig,
    devices: ReadonlyArray<InventoryObject>,
    agentInventory: ReadonlyArray<InventoryObject>,
  ): Promise<TargetSelection> {
    switch (targets.kind) {
      case 'none':
        return { targets: [], matchedDevices: [], deviceCount: 0 };
      case 'literal':
        return { targets: [...new Set(targets.values)], matchedDevices: [], deviceCount: 0 };
      case 'agents':
        return {
          targets: selectAgents(targets.rules, agentInventory),
          matchedDevices: [],
          deviceCount: 0,
        };
      case 'devices': {
        const matched = selectObjects(targets.rules, devices);
        const withInterfaces = await this.attachInterfaces(
          matched,
          targets.sources.interface_addresses !== undefined,
        );
        const addresses = deriveAddresses(withInterfaces, targets.sources);
        return {
          targets: targets.limit === undefined ? addresses : addresses.slice(0, targets.limit),
          matchedDevices: withInterfaces,
          deviceCount: devices.length,
        };
      }
    }
  }

  private async attachInterfaces(
    devices: ReadonlyArray<InventoryObject>,
    wanted: boolean,
  ): Promise<MatchedDevice[]> {
    if (!wanted) {
      return devices.map((device) => ({ device, interfaces: [] }));
    }
    return Promise.all(
      devices.map(async (device) => {
        const id = objectId(device);
        const interfaces = id === undefined ? [] : await this.source.listInterfaces(id);
        return { device, interfaces };
      }),
    );
  }

  /** The plan's own error is what the caller sees, even if the log write fails too. */
  private recordFailure(entry: SelectionLogEntry): void {
    try {
      this.logger.record(entry);
    } catch (logError: unknown) {
      this.logWriteFailures.push(errorMessage(logError));
    }
  }

  private entry(
    config: TestConfig,
    targets: TargetConfig,
    selection: TargetSelection,
    agents: ReadonlyArray<string>,
    failure: unknown,
  ): SelectionLogEntry {
    return {
      test_name: config.test.name,
      test_type: config.test.type,
      target_rules_hash:
        targets.kind === 'devices' || targets.kind === 'agents' ? hashRuleList(targets.rules) : null,
      agent_rules_hash: hashRuleList(config.agents),
      device_count: selection.deviceCount,
      matched_devices: selection.matchedDevices.length,
      targets: selection.targets,
      agents,
      error: failure === undefined ? undefined : errorMessage(failure),
      timestamp: this.now().toISOString(),
    };
  }
}

/**
 * Plan a test with a one-off planner.
 *
 * @see TestPlanner.plan
 */
export function planTest(
  config: TestConfig,
  source: InventorySource,
  options: PlanOptions = {},
): Promise<TestPlan> {
  return new TestPlanner(source, options).plan(config);
}

function nothing(): Promise<ReadonlyArray<InventoryObject>> {
  return Promise.resolve([]);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

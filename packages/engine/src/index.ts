/**
 * @synthctl/engine
 *
 * Selection of synthetic test targets and agents from inventory, and
 * assembly of the resulting test documents.
 *
 * The engine is side-effect free apart from its injected collaborators:
 * inventory arrives through an InventorySource and log entries leave
 * through a LogSink.
 */

// Types
export type { InventorySource, MatchedDevice } from './types/inventory.js';
export type {
  AgentTargets,
  DeviceTargets,
  LiteralTargets,
  NoTargets,
  TargetConfig,
  TestConfig,
} from './types/config.js';

// Selection
export { evaluateRule, matchesAll, selectObjects } from './selection/evaluator.js';
export { combinations, selectOneOfEach } from './selection/one-of-each.js';
export { objectId } from './selection/identity.js';
export { selectAgents } from './agents/select.js';

// Targets
export type { AddressFamily } from './targets/address.js';
export {
  acceptsFamily,
  classifyAddress,
  isPublicAddress,
  normalizeAddress,
  parseAddressFamily,
} from './targets/address.js';
export type { AddressSelection, AddressSource, AddressSources } from './targets/derive.js';
export {
  ADDRESS_SOURCE_ORDER,
  collectCandidates,
  DEFAULT_ADDRESS_SELECTION,
  deriveAddresses,
} from './targets/derive.js';

// Tests
export type {
  HealthSettings,
  HttpOptions,
  HttpTask,
  IpFamily,
  MonitoringSettings,
  MultiTarget,
  PingTask,
  Protocol,
  RemoteTest,
  SingleTarget,
  SynTest,
  SynTestSettings,
  TaskName,
  TestSpec,
  TestStatus,
  TestType,
  TraceTask,
} from './tests/model.js';
export {
  buildTest,
  DEFAULT_EXPIRY,
  DEFAULT_PERIOD,
  IP_FAMILY_NAMES,
  isTargetless,
  maxPeriod,
  PROTOCOLS,
  setPeriod,
  setTimeout,
  SINGLE_TARGET_TYPES,
  TASK_NAMES,
  TEST_STATUSES,
  TEST_TYPES,
} from './tests/model.js';
export { diffTests, diffValues } from './tests/diff.js';

// Planning
export type { PlanOptions, TargetSelection, TestPlan } from './planning/planner.js';
export { planTest, TestPlanner } from './planning/planner.js';

// Errors
export type { SelectionKind } from './errors.js';
export { EmptySelectionError } from './errors.js';

// Logging
export type { LogSink } from './logging/log-sink.js';
export type { SelectionLogEntry } from './logging/selection-log.js';
export { SelectionLogger } from './logging/selection-log.js';

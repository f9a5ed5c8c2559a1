/**
 * synthctl Runtime Host — Test Configuration Files
 *
 * Loads a test configuration file (YAML or JSON, chosen by extension),
 * validates its shape with zod, and compiles it into the engine's
 * TestConfig. Rule lists are compiled by @synthctl/match-dsl.
 *
 *   test:
 *     name: edge-monitor
 *     type: ip
 *     period: 60
 *   targets:
 *     devices:
 *       - device_type: router
 *     interface_addresses:
 *       family: ipv4
 *       public_only: true
 *     limit: 10
 *   agents:
 *     - type: global
 *
 * `targets` takes exactly one of `devices`, `agents` (agent ids, for agent
 * tests) or `use` (a literal list). Mesh tests take no targets.
 */

import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { load } from 'js-yaml';
import { z } from 'zod';
import { compileRuleList, ConfigurationError, isMapping } from '@synthctl/match-dsl';
import { isTargetless, parseAddressFamily, PROTOCOLS, TEST_TYPES } from '@synthctl/engine';
import type {
  AddressSelection,
  AddressSource,
  AddressSources,
  HealthSettings,
  HttpOptions,
  TargetConfig,
  TestConfig,
  TestSpec,
  TestStatus,
} from '@synthctl/engine';
import { toConfigurationError } from './issues.js';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const HttpSchema = z
  .object({
    method: z.string().min(1).optional(),
    headers: z.record(z.string()).optional(),
    body: z.string().optional(),
    ignore_tls_errors: z.boolean().optional(),
  })
  .strict();

const HealthSchema = z
  .object({
    latency_critical: z.number().nonnegative().optional(),
    latency_warning: z.number().nonnegative().optional(),
    packet_loss_critical: z.number().nonnegative().optional(),
    packet_loss_warning: z.number().nonnegative().optional(),
    jitter_critical: z.number().nonnegative().optional(),
    jitter_warning: z.number().nonnegative().optional(),
    http_latency_critical: z.number().nonnegative().optional(),
    http_latency_warning: z.number().nonnegative().optional(),
    http_valid_codes: z.array(z.number().int()).optional(),
    dns_valid_codes: z.array(z.number().int()).optional(),
  })
  .strict();

const TestSectionSchema = z
  .object({
    name: z.string().min(1),
    type: z.enum(TEST_TYPES),
    status: z.enum(['active', 'paused']).optional(),
    period: z.number().int().positive().optional(),
    timeout: z.number().positive().optional(),
    family: z.string().optional(),
    protocol: z.enum(PROTOCOLS).optional(),
    port: z.number().int().min(0).max(65535).optional(),
    servers: z.array(z.string().min(1)).optional(),
    ping: z.boolean().optional(),
    traceroute: z.boolean().optional(),
    http: HttpSchema.optional(),
    health: HealthSchema.optional(),
  })
  .strict();

/** An empty mapping (or a bare key) selects the defaults. */
const AddressSelectionSchema = z
  .object({
    family: z.string().optional(),
    public_only: z.boolean().optional(),
  })
  .strict()
  .nullable();

const TargetsSchema = z
  .object({
    devices: z.unknown().optional(),
    agents: z.unknown().optional(),
    use: z.array(z.string().min(1)).optional(),
    interface_addresses: AddressSelectionSchema.optional(),
    sending_ips: AddressSelectionSchema.optional(),
    snmp_ip: AddressSelectionSchema.optional(),
    limit: z.number().int().positive().optional(),
  })
  .strict();

const TestConfigFileSchema = z
  .object({
    test: TestSectionSchema,
    targets: TargetsSchema.optional(),
    agents: z.unknown(),
  })
  .strict();

type TestSection = z.infer<typeof TestSectionSchema>;
type TargetsSection = z.infer<typeof TargetsSchema>;
type HealthSection = z.infer<typeof HealthSchema>;
type AddressSelectionSection = z.infer<typeof AddressSelectionSchema>;

const STATUSES: Readonly<Record<'active' | 'paused', TestStatus>> = {
  active: 'TEST_STATUS_ACTIVE',
  paused: 'TEST_STATUS_PAUSED',
};

const SOURCE_KEYS: ReadonlyArray<AddressSource> = ['interface_addresses', 'sending_ips', 'snmp_ip'];

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

export type ConfigFormat = 'yaml' | 'json';

export function formatOf(path: string): ConfigFormat {
  switch (extname(path).toLowerCase()) {
    case '.yaml':
    case '.yml':
      return 'yaml';
    case '.json':
      return 'json';
    default:
      throw new ConfigurationError(
        `unsupported configuration file "${path}" (expected .yaml, .yml or .json)`,
      );
  }
}

/** Read, validate and compile a test configuration file. */
export function loadTestConfig(path: string): TestConfig {
  return parseTestConfig(readFileSync(path, 'utf-8'), formatOf(path), path);
}

/**
 * Parse configuration text and compile it.
 *
 * @param source - Name used in syntax error messages
 */
export function parseTestConfig(text: string, format: ConfigFormat, source = 'config'): TestConfig {
  let tree: unknown;
  try {
    tree = format === 'yaml' ? load(text) : JSON.parse(text);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`cannot parse ${format.toUpperCase()}: ${reason}`, source);
  }
  return compileTestConfig(tree);
}

/** Validate an already-decoded configuration tree and compile it. */
export function compileTestConfig(tree: unknown): TestConfig {
  if (!isMapping(tree)) {
    throw new ConfigurationError('a test configuration must be a mapping with test and agents keys');
  }
  const result = TestConfigFileSchema.safeParse(tree);
  if (!result.success) {
    throw toConfigurationError(result.error);
  }
  const file = result.data;

  if (file.agents === undefined || file.agents === null) {
    throw new ConfigurationError('agent rules are required', 'agents');
  }

  const test = testSpec(file.test);
  return {
    test,
    targets: targetConfig(test, file.targets),
    agents: compileRuleList(file.agents, 'agents'),
  };
}

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

function testSpec(section: TestSection): TestSpec {
  return {
    name: section.name,
    type: section.type,
    status: section.status === undefined ? undefined : STATUSES[section.status],
    period: section.period,
    timeout: section.timeout,
    family: section.family === undefined ? undefined : parseAddressFamily(section.family, 'test.family'),
    protocol: section.protocol,
    port: section.port,
    servers: section.servers,
    ping: section.ping,
    traceroute: section.traceroute,
    http: section.http === undefined ? undefined : httpOptions(section.http),
    healthSettings: section.health === undefined ? undefined : healthSettings(section.health),
  };
}

function httpOptions(section: NonNullable<TestSection['http']>): HttpOptions {
  return {
    method: section.method,
    headers: section.headers,
    body: section.body,
    ignoreTlsErrors: section.ignore_tls_errors,
  };
}

/** Only the thresholds that are set, so the rest keep their defaults. */
function healthSettings(section: HealthSection): Partial<HealthSettings> {
  const out: { -readonly [K in keyof HealthSettings]?: HealthSettings[K] } = {};
  if (section.latency_critical !== undefined) out.latencyCritical = section.latency_critical;
  if (section.latency_warning !== undefined) out.latencyWarning = section.latency_warning;
  if (section.packet_loss_critical !== undefined) out.packetLossCritical = section.packet_loss_critical;
  if (section.packet_loss_warning !== undefined) out.packetLossWarning = section.packet_loss_warning;
  if (section.jitter_critical !== undefined) out.jitterCritical = section.jitter_critical;
  if (section.jitter_warning !== undefined) out.jitterWarning = section.jitter_warning;
  if (section.http_latency_critical !== undefined) out.httpLatencyCritical = section.http_latency_critical;
  if (section.http_latency_warning !== undefined) out.httpLatencyWarning = section.http_latency_warning;
  if (section.http_valid_codes !== undefined) out.httpValidCodes = section.http_valid_codes;
  if (section.dns_valid_codes !== undefined) out.dnsValidCodes = section.dns_valid_codes;
  return out;
}

function targetConfig(test: TestSpec, section: TargetsSection | undefined): TargetConfig {
  if (isTargetless(test.type)) {
    if (section !== undefined) {
      throw new ConfigurationError(`"${test.type}" tests take no targets`, 'targets');
    }
    return { kind: 'none' };
  }
  if (section === undefined) {
    throw new ConfigurationError(`"${test.type}" tests need a targets section`, 'targets');
  }

  const given = (['devices', 'agents', 'use'] as const).filter((key) => section[key] !== undefined);
  const [kind] = given;
  if (kind === undefined) {
    throw new ConfigurationError('expected one of devices, agents or use', 'targets');
  }
  if (given.length > 1) {
    throw new ConfigurationError(`only one of devices, agents or use may be given (got ${given.join(', ')})`, 'targets');
  }

  if (kind !== 'devices') {
    for (const key of [...SOURCE_KEYS, 'limit'] as const) {
      if (section[key] !== undefined) {
        throw new ConfigurationError('applies only to device targets', `targets.${key}`);
      }
    }
  }

  switch (kind) {
    case 'devices':
      if (test.type === 'agent') {
        throw new ConfigurationError('agent tests target agents (use targets.agents or targets.use)', 'targets.devices');
      }
      return {
        kind: 'devices',
        rules: compileRuleList(section.devices, 'targets.devices'),
        sources: addressSources(section),
        limit: section.limit,
      };
    case 'agents':
      if (test.type !== 'agent') {
        throw new ConfigurationError(`"${test.type}" tests cannot target agents`, 'targets.agents');
      }
      return { kind: 'agents', rules: compileRuleList(section.agents, 'targets.agents') };
    case 'use':
      return { kind: 'literal', values: section.use ?? [] };
  }
}

function addressSources(section: TargetsSection): AddressSources {
  const sources: { [K in AddressSource]?: AddressSelection } = {};
  for (const key of SOURCE_KEYS) {
    const value = section[key];
    if (value !== undefined) {
      sources[key] = addressSelection(value, `targets.${key}`);
    }
  }
  return sources;
}

function addressSelection(value: AddressSelectionSection, location: string): AddressSelection {
  return {
    family: value?.family === undefined ? 'dual' : parseAddressFamily(value.family, `${location}.family`),
    publicOnly: value?.public_only ?? false,
  };
}

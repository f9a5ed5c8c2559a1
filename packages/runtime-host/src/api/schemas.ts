/**
 * synthctl Runtime Host — Synthetics API Response Schemas
 *
 * Validates tests returned by the API into the engine's RemoteTest. Fields
 * the API leaves out take the values buildTest would have used; fields the
 * engine does not model are stripped.
 */

import { z } from 'zod';
import { IP_FAMILY_NAMES, PROTOCOLS, TASK_NAMES, TEST_STATUSES, TEST_TYPES } from '@synthctl/engine';
import type { RemoteTest } from '@synthctl/engine';
import { issuePath } from '../config/issues.js';
import { UnexpectedResponseError } from './errors.js';

const ProtocolSchema = z.union([z.enum(PROTOCOLS), z.literal('')]);

const PingTaskSchema = z.object({
  period: z.number(),
  count: z.number(),
  expiry: z.number(),
});

const TraceTaskSchema = z.object({
  period: z.number(),
  count: z.number(),
  protocol: ProtocolSchema,
  port: z.number().default(0),
  expiry: z.number(),
  limit: z.number(),
});

const HttpTaskSchema = z.object({
  period: z.number().default(0),
  expiry: z.number().default(0),
  method: z.string().default('GET'),
  headers: z.record(z.string()).default({}),
  body: z.string().default(''),
  ignoreTlsErrors: z.boolean().default(false),
  cssSelectors: z.record(z.string()).default({}),
});

const HealthSettingsSchema = z.object({
  latencyCritical: z.number().default(0),
  latencyWarning: z.number().default(0),
  packetLossCritical: z.number().default(0),
  packetLossWarning: z.number().default(0),
  jitterCritical: z.number().default(0),
  jitterWarning: z.number().default(0),
  httpLatencyCritical: z.number().default(0),
  httpLatencyWarning: z.number().default(0),
  httpValidCodes: z.array(z.number()).default([]),
  dnsValidCodes: z.array(z.number()).default([]),
});

const MonitoringSettingsSchema = z.object({
  activationGracePeriod: z.string().default('2'),
  activationTimeUnit: z.string().default('m'),
  activationTimeWindow: z.string().default('5'),
  activationTimes: z.string().default('3'),
  notificationChannels: z.array(z.string()).default([]),
});

const SingleTargetSchema = z.object({ target: z.string() });
const MultiTargetSchema = z.object({ targets: z.array(z.string()) });

const SettingsSchema = z.object({
  agentIds: z.array(z.string()),
  tasks: z.array(z.enum(TASK_NAMES)),
  healthSettings: HealthSettingsSchema.default({}),
  monitoringSettings: MonitoringSettingsSchema.default({}),
  port: z.number().default(0),
  period: z.number(),
  count: z.number().default(0),
  expiry: z.number(),
  limit: z.number().default(0),
  protocol: ProtocolSchema.default(''),
  family: z.enum(IP_FAMILY_NAMES).default('IP_FAMILY_DUAL'),
  rollupLevel: z.number().default(1),
  servers: z.array(z.string()).default([]),
  ping: PingTaskSchema.optional(),
  trace: TraceTaskSchema.optional(),
  http: HttpTaskSchema.optional(),
  ip: MultiTargetSchema.optional(),
  hostname: SingleTargetSchema.optional(),
  networkGrid: MultiTargetSchema.optional(),
  agent: SingleTargetSchema.optional(),
  dns: SingleTargetSchema.optional(),
  dnsGrid: MultiTargetSchema.optional(),
  url: SingleTargetSchema.optional(),
  pageLoad: SingleTargetSchema.optional(),
});

export const RemoteTestSchema = z.object({
  id: z.string(),
  name: z.string(),
  type: z.enum(TEST_TYPES),
  status: z.enum(TEST_STATUSES),
  deviceId: z.string().default('0'),
  cdate: z.string().optional(),
  edate: z.string().optional(),
  settings: SettingsSchema,
});

/**
 * @throws {UnexpectedResponseError} when the value is not a test
 */
export function parseRemoteTest(value: unknown, operation: string): RemoteTest {
  const result = RemoteTestSchema.safeParse(value);
  if (!result.success) {
    const [first] = result.error.issues;
    const where = first === undefined ? '' : ` at ${issuePath('test', first.path)}`;
    throw new UnexpectedResponseError(operation, `malformed test${where}: ${first?.message ?? 'invalid'}`);
  }
  return result.data;
}

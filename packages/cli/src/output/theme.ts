import chalk, { type ChalkInstance } from 'chalk';

export const t = {
  blue:   chalk.hex('#4FC3F7'),
  text:   chalk.hex('#C8C8C0'),
  white:  chalk.hex('#F2F2EC'),
  dim:    chalk.hex('#444444'),
  muted:  chalk.hex('#666666'),
  amber:  chalk.hex('#D4880A'),
  green:  chalk.hex('#81C784'),
  red:    chalk.hex('#CF6679'),
} as const;

const _statusColors: Record<string, ChalkInstance> = {
  TEST_STATUS_ACTIVE:  t.green,
  TEST_STATUS_PAUSED:  t.amber,
  TEST_STATUS_DELETED: t.red,
  AGENT_STATUS_OK:     t.green,
  AGENT_STATUS_WAIT:   t.amber,
};

export const statusColor = (status: string): ChalkInstance =>
  _statusColors[status] ?? t.muted;

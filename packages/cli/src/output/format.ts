/**
 * synthctl CLI — Output Formatting
 *
 * Plain-text rendering of API objects, selection previews and log records.
 * Every function returns lines without colour; commands apply the theme.
 */

import type { TargetSelection, TestPlan } from '@synthctl/engine';
import { isMapping, isScalar, toComparable } from '@synthctl/match-dsl';
import { maskToken } from '@synthctl/runtime-host';
import type { ResolvedProfile, SelectionRecord } from '@synthctl/runtime-host';

const INDENT = '  ';

// ---------------------------------------------------------------------------
// Generic objects
// ---------------------------------------------------------------------------

/**
 * Render a decoded JSON value as indented `key: value` lines.
 *
 *   id: 593
 *   labels: [edge, lab]
 *   settings:
 *     period: 60
 */
export function formatObject(value: unknown, depth = 0): string[] {
  const pad = INDENT.repeat(depth);
  if (!isMapping(value)) {
    return [`${pad}${scalarText(value)}`];
  }

  const lines: string[] = [];
  for (const [key, item] of Object.entries(value)) {
    if (isMapping(item)) {
      lines.push(`${pad}${key}:`, ...formatObject(item, depth + 1));
    } else if (Array.isArray(item) && !item.every(isScalar)) {
      lines.push(`${pad}${key}:`);
      for (const element of item) {
        lines.push(...listItem(element, depth + 1));
      }
    } else {
      lines.push(`${pad}${key}: ${scalarText(item)}`);
    }
  }
  return lines;
}

function listItem(element: unknown, depth: number): string[] {
  const pad = INDENT.repeat(depth);
  if (!isMapping(element)) {
    return [`${pad}- ${scalarText(element)}`];
  }
  const [first, ...rest] = formatObject(element, depth + 1);
  if (first === undefined) {
    return [`${pad}- {}`];
  }
  return [`${pad}- ${first.trimStart()}`, ...rest];
}

function scalarText(value: unknown): string {
  if (isScalar(value)) {
    return toComparable(value);
  }
  if (value === null || value === undefined) {
    return '-';
  }
  if (Array.isArray(value)) {
    return `[${value.map(scalarText).join(', ')}]`;
  }
  return JSON.stringify(value);
}

function field(object: unknown, key: string): string {
  if (!isMapping(object)) {
    return '-';
  }
  const value = object[key];
  return isScalar(value) ? toComparable(value) : '-';
}

// ---------------------------------------------------------------------------
// Brief listings
// ---------------------------------------------------------------------------

export function briefTest(test: unknown): string {
  return `id: ${field(test, 'id')} name: ${field(test, 'name')} type: ${field(test, 'type')}`;
}

export function briefAgent(agent: unknown): string {
  return `id: ${field(agent, 'id')} alias: ${field(agent, 'alias')} type: ${field(agent, 'type')}`;
}

// ---------------------------------------------------------------------------
// Selections
// ---------------------------------------------------------------------------

/** Targets and device counts of a selection preview. */
export function formatTargets(selection: TargetSelection): string[] {
  const lines: string[] = [];
  if (selection.deviceCount > 0) {
    lines.push(`devices: ${selection.matchedDevices.length} matched of ${selection.deviceCount}`);
  }
  lines.push(`targets: ${selection.targets.length}`);
  for (const target of selection.targets) {
    lines.push(`${INDENT}- ${target}`);
  }
  return lines;
}

export function formatAgentIds(agents: ReadonlyArray<string>): string[] {
  return [`agents: ${agents.length}`, ...agents.map((id) => `${INDENT}- ${id}`)];
}

export function formatPlan(plan: TestPlan): string[] {
  return [
    `test: ${plan.test.name} (${plan.test.type})`,
    ...formatTargets(plan),
    ...formatAgentIds(plan.agents),
  ];
}

export function formatDiff(differences: ReadonlyArray<string>): string[] {
  return differences.length === 0 ? ['no differences'] : [...differences];
}

// ---------------------------------------------------------------------------
// Log and profile
// ---------------------------------------------------------------------------

export function formatSelection(record: SelectionRecord): string {
  const line =
    `${record.timestamp}  ${record.test_name} (${record.test_type})` +
    `  targets: ${record.targets.length}  agents: ${record.agents.length}`;
  return record.error === undefined ? line : `${line}  error: ${record.error}`;
}

export function formatProfile(profile: ResolvedProfile): string[] {
  return [
    `profile: ${profile.name}`,
    `email: ${profile.email}`,
    `token: ${maskToken(profile.token)}`,
    `api_url: ${profile.apiUrl}`,
    `inventory_url: ${profile.inventoryUrl}`,
  ];
}

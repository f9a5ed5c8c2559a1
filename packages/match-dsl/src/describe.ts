/**
 * synthctl Match DSL — Rule rendering
 *
 * One-line, human-readable forms of compiled rules for CLI previews and
 * error messages.
 */

import type { Rule, RuleList, Scalar } from './types.js';

/**
 * @example
 * describeRule(compilePredicate({ any: [{ device_type: 'router' }, { site: 'regex(^dc)' }] }))
 * // 'any(device_type == "router", site =~ /^dc/)'
 */
export function describeRule(rule: Rule): string {
  switch (rule.kind) {
    case 'direct':
      return `${rule.attribute.text} == ${formatScalar(rule.value)}`;
    case 'regex':
      return `${rule.attribute.text} =~ /${rule.source}/`;
    case 'any_of':
      return `any(${rule.rules.map(describeRule).join(', ')})`;
    case 'all_of':
      return `all(${rule.rules.map(describeRule).join(', ')})`;
    case 'one_of_each': {
      const parts = rule.bindings.map(
        (b) => `${b.attribute.text} in [${b.values.map(formatScalar).join(', ')}]`,
      );
      return `one_of_each(${parts.join(' × ')})`;
    }
  }
}

/** One line per structural element of the list, in evaluation order. */
export function describeRuleList(list: RuleList): string[] {
  const lines = list.predicates.map(describeRule);
  if (list.oneOfEach !== undefined) {
    lines.push(describeRule(list.oneOfEach));
  }
  if (list.limit !== undefined) {
    lines.push(`limit ${list.limit}`);
  }
  return lines;
}

function formatScalar(value: Scalar): string {
  return typeof value === 'string' ? JSON.stringify(value) : String(value);
}

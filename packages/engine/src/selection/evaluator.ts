/**
 * synthctl Engine — Rule Evaluator
 *
 * Pure, deterministic evaluation of compiled rules against inventory
 * objects, and selection of a candidate subset by a top-level rule list.
 *
 * Evaluation order for a rule list:
 * 1. Keep candidates for which every predicate matches (AND).
 * 2. Apply the one-of-each selector, if present, to the survivors.
 * 3. Truncate to the limit, if present.
 *
 * This module is side-effect free. It does not read state or perform I/O.
 */

import { resolveScalar, toComparable } from '@synthctl/match-dsl';
import type { InventoryObject, PredicateRule, RuleList } from '@synthctl/match-dsl';
import { selectOneOfEach } from './one-of-each.js';

/**
 * Evaluate a predicate rule against one object.
 *
 * - direct: attribute present and equal in canonical string form
 * - regex: attribute present and the pattern found anywhere in it
 * - any_of: first matching sub-rule wins; empty list never matches
 * - all_of: first failing sub-rule loses; empty list always matches
 *
 * @throws {ConfigurationError} if a direct or regex rule reads a
 *   multi-valued attribute
 */
export function evaluateRule(rule: PredicateRule, object: InventoryObject): boolean {
  switch (rule.kind) {
    case 'direct': {
      const resolved = resolveScalar(object, rule);
      return resolved.present && toComparable(resolved.value) === toComparable(rule.value);
    }
    case 'regex': {
      const resolved = resolveScalar(object, rule);
      return resolved.present && rule.pattern.test(toComparable(resolved.value));
    }
    case 'any_of':
      return rule.rules.some((r) => evaluateRule(r, object));
    case 'all_of':
      return rule.rules.every((r) => evaluateRule(r, object));
    default:
      return assertNever(rule);
  }
}

/** True when every predicate matches. No predicates → true. */
export function matchesAll(
  predicates: ReadonlyArray<PredicateRule>,
  object: InventoryObject,
): boolean {
  return predicates.every((rule) => evaluateRule(rule, object));
}

/**
 * Select the candidates a rule list picks.
 *
 * Result order is candidate order, except when a one-of-each selector
 * participates: its output is in combination order (see selectOneOfEach).
 *
 * @param list - Compiled top-level rule list
 * @param candidates - Full inventory, in API response order
 */
export function selectObjects<T extends InventoryObject>(
  list: RuleList,
  candidates: ReadonlyArray<T>,
): T[] {
  let selected = candidates.filter((c) => matchesAll(list.predicates, c));

  if (list.oneOfEach !== undefined) {
    selected = selectOneOfEach(list.oneOfEach, selected);
  }

  if (list.limit !== undefined) {
    selected = selected.slice(0, list.limit);
  }

  return selected;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled rule: ${JSON.stringify(value)}`);
}

/**
 * synthctl Engine — One-of-Each Selection
 *
 * Picks one representative candidate per combination of binding values.
 * Combinations are the Cartesian product of the binding value lists, in
 * declaration order with the first binding varying slowest.
 */

import { resolveScalar, toComparable } from '@synthctl/match-dsl';
import type {
  DirectMatchRule,
  InventoryObject,
  OneOfEachBinding,
  OneOfEachRule,
} from '@synthctl/match-dsl';

/**
 * Every combination of binding values, in product order, each expressed
 * as one direct match per binding.
 * Example: asn [1, 2] × country ["US", "DE"] →
 * (1, US), (1, DE), (2, US), (2, DE).
 */
export function combinations(
  bindings: ReadonlyArray<OneOfEachBinding>,
): ReadonlyArray<ReadonlyArray<DirectMatchRule>> {
  let product: DirectMatchRule[][] = [[]];
  for (const binding of bindings) {
    const next: DirectMatchRule[][] = [];
    for (const prefix of product) {
      for (const value of binding.values) {
        next.push([...prefix, { kind: 'direct', attribute: binding.attribute, value }]);
      }
    }
    product = next;
  }
  return product;
}

/**
 * Select the first candidate matching each combination.
 *
 * A candidate that is first for several combinations appears once in the
 * output, at the position of its first pick. Combinations nobody matches
 * contribute nothing.
 *
 * @throws {ConfigurationError} if a bound attribute is multi-valued on a
 *   candidate that is examined
 */
export function selectOneOfEach<T extends InventoryObject>(
  rule: OneOfEachRule,
  candidates: ReadonlyArray<T>,
): T[] {
  const selected: T[] = [];
  const seen = new Set<T>();

  for (const combo of combinations(rule.bindings)) {
    const pick = candidates.find((candidate) => combo.every((binding) => matches(candidate, binding)));
    if (pick !== undefined && !seen.has(pick)) {
      seen.add(pick);
      selected.push(pick);
    }
  }

  return selected;
}

function matches(candidate: InventoryObject, binding: DirectMatchRule): boolean {
  const resolved = resolveScalar(candidate, binding);
  return resolved.present && toComparable(resolved.value) === toComparable(binding.value);
}

/**
 * synthctl Engine — Agent Selection
 */

import type { InventoryObject, RuleList } from '@synthctl/match-dsl';
import { selectObjects } from '../selection/evaluator.js';
import { objectId } from '../selection/identity.js';

/**
 * Ids of the agents a rule list selects, in selection order.
 * Agents without a scalar `id` are skipped; repeated ids appear once.
 */
export function selectAgents(list: RuleList, agents: ReadonlyArray<InventoryObject>): string[] {
  const ids: string[] = [];
  for (const agent of selectObjects(list, agents)) {
    const id = objectId(agent);
    if (id !== undefined && !ids.includes(id)) {
      ids.push(id);
    }
  }
  return ids;
}

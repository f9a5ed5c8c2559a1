import { attributePath, isScalar, resolveAttribute, toComparable } from '@synthctl/match-dsl';
import type { InventoryObject } from '@synthctl/match-dsl';

const ID = attributePath('id');

/** The object's `id` in string form, or undefined when it has no scalar id. */
export function objectId(object: InventoryObject): string | undefined {
  const resolved = resolveAttribute(object, ID);
  return resolved.present && isScalar(resolved.value) ? toComparable(resolved.value) : undefined;
}

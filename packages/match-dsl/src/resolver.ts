/**
 * synthctl Match DSL — Attribute Resolution
 *
 * Dotted-path lookup into inventory objects and the canonical scalar
 * coercion used by every comparison in the engine.
 *
 * Pure functions; no state, no I/O.
 */

import type {
  AttributeMapping,
  AttributePath,
  AttributeValue,
  DirectMatchRule,
  InventoryObject,
  RegexMatchRule,
  Resolution,
  Scalar,
} from './types.js';
import { ConfigurationError } from './types.js';
import { describeRule } from './describe.js';

const ABSENT: Resolution<never> = Object.freeze({ present: false });

/**
 * Parse a dot-separated attribute path.
 *
 * @throws {ConfigurationError} on an empty path or an empty segment (`a..b`)
 */
export function attributePath(text: string, location?: string): AttributePath {
  const segments = text.split('.');
  if (text === '' || segments.some((s) => s === '')) {
    throw new ConfigurationError(`invalid attribute path ${JSON.stringify(text)}`, location);
  }
  return Object.freeze({ text, segments: Object.freeze(segments) });
}

/**
 * Resolve an attribute path against an object.
 *
 * Walks nested mappings key by key, reading own keys only. Returns absent
 * when a key is missing (inherited members such as `constructor` count as
 * missing), when a value is null, or when an intermediate value is not a
 * mapping while path segments remain. Sequences are returned as-is.
 *
 * @example
 * resolveAttribute({ site: { site_name: 'DC3' } }, attributePath('site.site_name'))
 * // { present: true, value: 'DC3' }
 */
export function resolveAttribute(object: InventoryObject, path: AttributePath): Resolution {
  let current: AttributeValue = object;
  for (const segment of path.segments) {
    if (!isMapping(current) || !Object.prototype.hasOwnProperty.call(current, segment)) {
      return ABSENT;
    }
    current = current[segment];
    if (current === undefined || current === null) {
      return ABSENT;
    }
  }
  if (current === undefined || current === null) {
    return ABSENT;
  }
  return { present: true, value: current };
}

/**
 * Resolve the attribute a comparison rule reads as a single scalar.
 *
 * @throws {ConfigurationError} if the attribute holds a sequence or mapping
 */
export function resolveScalar(
  object: InventoryObject,
  rule: DirectMatchRule | RegexMatchRule,
): Resolution<Scalar> {
  const resolved = resolveAttribute(object, rule.attribute);
  if (!resolved.present) {
    return ABSENT;
  }
  if (!isScalar(resolved.value)) {
    throw new ConfigurationError(
      `attribute "${rule.attribute.text}" is multi-valued and cannot be compared by rule ${describeRule(rule)}`,
    );
  }
  return { present: true, value: resolved.value };
}

/**
 * Canonical string form of a scalar.
 *
 * Rule values and attribute values are both coerced through this function,
 * so `asn: 64512` in configuration matches an API value of `"64512"` and
 * vice versa. Booleans become `"true"` / `"false"`.
 */
export function toComparable(value: Scalar): string {
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  return typeof value === 'number' ? String(value) : value;
}

export function isScalar(value: unknown): value is Scalar {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

export function isMapping(value: unknown): value is AttributeMapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isSequence(value: unknown): value is ReadonlyArray<AttributeValue> {
  return Array.isArray(value);
}

/**
 * Narrow an unknown decoded JSON value to an inventory object.
 * Only the outer shape is checked; nested values are narrowed by
 * the resolver.
 */
export function isInventoryObject(value: unknown): value is InventoryObject {
  return isMapping(value);
}

/**
 * synthctl Match DSL — Compiler
 *
 * Compiles a parsed configuration tree (mappings and lists decoded from
 * YAML or JSON) into immutable rules.
 *
 * Compiler guarantees:
 * - Rejecting: malformed grammar fails here, with the location of the
 *   offending entry, never later during evaluation. Regular expressions
 *   are compiled once, at this point.
 * - Deterministic: identical trees produce identical rules and identical
 *   hashes.
 *
 * Grammar of one list entry (a mapping):
 *
 *   { <attr>: <scalar> }              direct match
 *   { <attr>: "regex(<re>)" }         regex match
 *   { regex: { <attr>: <re>, ... } }  regex match per key
 *   { all: [ <entry>, ... ] }         AND
 *   { any: [ <entry>, ... ] }         OR
 *   { "=<key>": <scalar> }            direct match on an attribute named like a keyword
 *   { one_of_each: { <attr>: [..] } } selector (top level only)
 *   { limit: <n> }                    result cap (top level only)
 *
 * A mapping with several keys is the AND of its keys.
 */

import { createHash } from 'node:crypto';
import { attributePath, isMapping, isScalar, isSequence } from './resolver.js';
import type {
  AttributeMapping,
  OneOfEachBinding,
  OneOfEachRule,
  PredicateRule,
  Rule,
  RuleList,
  Scalar,
  ValidationResult,
} from './types.js';
import { ConfigurationError } from './types.js';

const ANY_KEY = 'any';
const ALL_KEY = 'all';
const REGEX_KEY = 'regex';
const ONE_OF_EACH_KEY = 'one_of_each';
const LIMIT_KEY = 'limit';
const ESCAPE_PREFIX = '=';

const REGEX_VALUE = /^regex\((.*)\)$/s;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Compile a top-level rule list.
 *
 * `null`/`undefined` compile to an empty list (every candidate passes).
 * A single mapping is accepted in place of a one-entry list.
 *
 * @param tree - Parsed configuration value
 * @param location - Location of the list in the configuration, for errors
 * @throws {ConfigurationError} on any grammar violation
 */
export function compileRuleList(tree: unknown, location = 'rules'): RuleList {
  const predicates: PredicateRule[] = [];
  let oneOfEach: OneOfEachRule | undefined;
  let limit: number | undefined;

  entriesOf(tree, location).forEach((entry, i) => {
    const at = `${location}[${i}]`;
    for (const [key, value] of Object.entries(expectEntry(entry, at))) {
      if (key === ONE_OF_EACH_KEY) {
        if (oneOfEach !== undefined) {
          throw new ConfigurationError('only one "one_of_each" entry is allowed per list', at);
        }
        oneOfEach = compileOneOfEach(value, `${at}.${ONE_OF_EACH_KEY}`);
      } else if (key === LIMIT_KEY) {
        if (limit !== undefined) {
          throw new ConfigurationError('only one "limit" entry is allowed per list', at);
        }
        limit = compileLimit(value, `${at}.${LIMIT_KEY}`);
      } else {
        predicates.push(compileKey(key, value, at));
      }
    }
  });

  return Object.freeze({
    predicates: Object.freeze(predicates),
    oneOfEach,
    limit,
  });
}

/**
 * Compile a single predicate entry (a mapping of one or more keys).
 *
 * @throws {ConfigurationError} if the entry is malformed or uses a
 *   top-level-only key
 */
export function compilePredicate(entry: unknown, location = 'rule'): PredicateRule {
  const rules = Object.entries(expectEntry(entry, location)).map(([key, value]) =>
    compileKey(key, value, location),
  );
  const [only] = rules;
  if (rules.length === 1 && only !== undefined) {
    return only;
  }
  return Object.freeze({ kind: 'all_of', rules: Object.freeze(rules) });
}

/**
 * Validate a rule list without throwing.
 *
 * @returns the compiled list, or the configuration error as a structured error
 */
export function validateRuleList(tree: unknown, location = 'rules'): ValidationResult<RuleList> {
  try {
    return { ok: true, value: compileRuleList(tree, location) };
  } catch (err: unknown) {
    if (err instanceof ConfigurationError) {
      return { ok: false, errors: [{ message: err.message, context: err.location }] };
    }
    throw err;
  }
}

/**
 * SHA-256 of the canonical form of a rule list.
 *
 * Regular expressions hash by source. Used to attribute a selection log
 * entry to the exact rules that produced it.
 */
export function hashRuleList(list: RuleList): string {
  const plain = {
    predicates: list.predicates.map(toPlain),
    oneOfEach: list.oneOfEach === undefined ? null : toPlain(list.oneOfEach),
    limit: list.limit ?? null,
  };
  return createHash('sha256').update(canonicalize(plain)).digest('hex');
}

// ---------------------------------------------------------------------------
// Internal: entry compilation
// ---------------------------------------------------------------------------

function entriesOf(tree: unknown, location: string): ReadonlyArray<unknown> {
  if (tree === null || tree === undefined) {
    return [];
  }
  if (isSequence(tree)) {
    return tree;
  }
  if (isMapping(tree)) {
    return [tree];
  }
  throw new ConfigurationError('expected a list of rules', location);
}

function expectEntry(entry: unknown, location: string): AttributeMapping {
  if (!isMapping(entry)) {
    throw new ConfigurationError(
      `expected a mapping, got ${describeType(entry)}`,
      location,
    );
  }
  if (Object.keys(entry).length === 0) {
    throw new ConfigurationError('empty rule entry', location);
  }
  return entry;
}

function compileKey(key: string, value: unknown, location: string): PredicateRule {
  switch (key) {
    case ALL_KEY:
      return Object.freeze({ kind: 'all_of', rules: compileNested(value, `${location}.${key}`) });
    case ANY_KEY:
      return Object.freeze({ kind: 'any_of', rules: compileNested(value, `${location}.${key}`) });
    case REGEX_KEY:
      return compileRegexBlock(value, `${location}.${key}`);
    case ONE_OF_EACH_KEY:
    case LIMIT_KEY:
      throw new ConfigurationError(
        `"${key}" is only allowed at the top level of a rule list`,
        location,
      );
    default:
      break;
  }

  const name = key.startsWith(ESCAPE_PREFIX) ? key.slice(ESCAPE_PREFIX.length) : key;
  const at = `${location}.${key}`;
  if (!isScalar(value)) {
    throw new ConfigurationError(
      `expected a string, number or boolean for attribute "${name}", got ${describeType(value)}`,
      at,
    );
  }

  const regexSource = key.startsWith(ESCAPE_PREFIX) || typeof value !== 'string'
    ? null
    : REGEX_VALUE.exec(value)?.[1] ?? null;
  if (regexSource !== null) {
    return compileRegex(name, regexSource, at);
  }

  return Object.freeze({ kind: 'direct', attribute: attributePath(name, at), value });
}

function compileNested(value: unknown, location: string): ReadonlyArray<PredicateRule> {
  if (!isSequence(value)) {
    throw new ConfigurationError(`expected a list of rules, got ${describeType(value)}`, location);
  }
  return Object.freeze(value.map((entry, i) => compilePredicate(entry, `${location}[${i}]`)));
}

function compileRegexBlock(value: unknown, location: string): PredicateRule {
  const mapping = expectEntry(value, location);
  const rules = Object.entries(mapping).map(([attr, pattern]): PredicateRule => {
    if (typeof pattern !== 'string') {
      throw new ConfigurationError(
        `expected a pattern string for attribute "${attr}", got ${describeType(pattern)}`,
        `${location}.${attr}`,
      );
    }
    return compileRegex(attr, pattern, `${location}.${attr}`);
  });
  const [only] = rules;
  if (rules.length === 1 && only !== undefined) {
    return only;
  }
  return Object.freeze({ kind: 'all_of', rules: Object.freeze(rules) });
}

function compileRegex(attr: string, source: string, location: string): PredicateRule {
  let pattern: RegExp;
  try {
    pattern = new RegExp(source);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`invalid regular expression /${source}/: ${reason}`, location);
  }
  return Object.freeze({ kind: 'regex', attribute: attributePath(attr, location), source, pattern });
}

function compileOneOfEach(value: unknown, location: string): OneOfEachRule {
  if (!isMapping(value) || Object.keys(value).length === 0) {
    throw new ConfigurationError('expected a non-empty mapping of attribute to value list', location);
  }
  const bindings = Object.entries(value).map(([attr, values]): OneOfEachBinding => {
    const at = `${location}.${attr}`;
    if (!isSequence(values) || values.length === 0) {
      throw new ConfigurationError(`expected a non-empty list of values for "${attr}"`, at);
    }
    const scalars: Scalar[] = [];
    for (const v of values) {
      if (!isScalar(v)) {
        throw new ConfigurationError(`expected scalar values for "${attr}", got ${describeType(v)}`, at);
      }
      scalars.push(v);
    }
    return Object.freeze({ attribute: attributePath(attr, at), values: Object.freeze(scalars) });
  });
  return Object.freeze({ kind: 'one_of_each', bindings: Object.freeze(bindings) });
}

function compileLimit(value: unknown, location: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`expected a positive integer, got ${JSON.stringify(value)}`, location);
  }
  return value;
}

function describeType(value: unknown): string {
  if (value === null || value === undefined) return 'nothing';
  if (isSequence(value)) return 'a list';
  if (isMapping(value)) return 'a mapping';
  return typeof value;
}

// ---------------------------------------------------------------------------
// Internal: canonical JSON serialization for deterministic hashing
// ---------------------------------------------------------------------------

type PlainRule =
  | { kind: 'direct'; attribute: string; value: Scalar }
  | { kind: 'regex'; attribute: string; pattern: string }
  | { kind: 'any_of' | 'all_of'; rules: PlainRule[] }
  | { kind: 'one_of_each'; bindings: Array<{ attribute: string; values: Scalar[] }> };

function toPlain(rule: Rule): PlainRule {
  switch (rule.kind) {
    case 'direct':
      return { kind: 'direct', attribute: rule.attribute.text, value: rule.value };
    case 'regex':
      return { kind: 'regex', attribute: rule.attribute.text, pattern: rule.source };
    case 'any_of':
    case 'all_of':
      return { kind: rule.kind, rules: rule.rules.map(toPlain) };
    case 'one_of_each':
      return {
        kind: 'one_of_each',
        bindings: rule.bindings.map((b) => ({ attribute: b.attribute.text, values: [...b.values] })),
      };
  }
}

/**
 * Produces a canonical JSON string with sorted object keys.
 * Array order is preserved: rule order is significant.
 */
function canonicalize(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return '[' + value.map(canonicalize).join(',') + ']';
  }
  if (isMapping(value)) {
    const pairs = Object.keys(value)
      .sort()
      .map((k) => `${JSON.stringify(k)}:${canonicalize(value[k])}`);
    return '{' + pairs.join(',') + '}';
  }
  return JSON.stringify(value);
}

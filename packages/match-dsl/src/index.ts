/**
 * @synthctl/match-dsl
 *
 * The matching language used to pick devices and agents for synthetic
 * tests: rule types, the configuration compiler, attribute resolution and
 * rule rendering.
 *
 * This package has no internal synthctl dependencies.
 */

// Types
export type {
  AllOfRule,
  AnyOfRule,
  AttributeMapping,
  AttributePath,
  AttributeValue,
  DirectMatchRule,
  InventoryObject,
  OneOfEachBinding,
  OneOfEachRule,
  PredicateRule,
  PresentValue,
  RegexMatchRule,
  Resolution,
  Rule,
  RuleKind,
  RuleList,
  Scalar,
  ValidationError,
  ValidationResult,
} from './types.js';

export { ConfigurationError } from './types.js';

// Functions
export { compilePredicate, compileRuleList, hashRuleList, validateRuleList } from './compiler.js';
export { describeRule, describeRuleList } from './describe.js';
export {
  attributePath,
  isInventoryObject,
  isMapping,
  isScalar,
  isSequence,
  resolveAttribute,
  resolveScalar,
  toComparable,
} from './resolver.js';

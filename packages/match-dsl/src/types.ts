/**
 * synthctl Match DSL — Core Type Definitions
 *
 * This module defines the types of the matching language: inventory values,
 * attribute paths, the closed rule union, compiled rule lists, and the
 * result/error types shared by the compiler and the engine.
 *
 * These types are the base layer of the synthctl type system. The engine
 * depends on this package; this package has no internal dependencies.
 */

// ---------------------------------------------------------------------------
// Inventory values
// ---------------------------------------------------------------------------

/** A leaf value a rule can compare against. */
export type Scalar = string | number | boolean;

/**
 * Any value that can appear in an inventory object, as decoded from the
 * inventory API's JSON.
 */
export type AttributeValue =
  | Scalar
  | null
  | undefined
  | ReadonlyArray<AttributeValue>
  | AttributeMapping;

/** A nested mapping inside an inventory object. */
export interface AttributeMapping {
  readonly [key: string]: AttributeValue;
}

/**
 * A device, interface or agent record as returned by the inventory API.
 *
 * Objects are opaque to the engine and read-only: ownership stays with the
 * API client that fetched them. Known attributes are read by name; any
 * attribute the API adds later is reachable through the same mapping.
 */
export type InventoryObject = AttributeMapping;

// ---------------------------------------------------------------------------
// Attribute paths and resolution
// ---------------------------------------------------------------------------

/**
 * A parsed dot-separated attribute path, e.g. `site.site_name`.
 *
 * Constructed only through `attributePath()`, which rejects empty paths and
 * empty segments.
 */
export interface AttributePath {
  /** The path as written in configuration. */
  readonly text: string;
  readonly segments: ReadonlyArray<string>;
}

/** A value that is present on an object (never null or undefined). */
export type PresentValue = Exclude<AttributeValue, null | undefined>;

/**
 * Result of resolving an attribute path against an inventory object.
 * An absent attribute is not an error: the rule simply does not match.
 */
export type Resolution<T = PresentValue> =
  | { readonly present: true; readonly value: T }
  | { readonly present: false };

// ---------------------------------------------------------------------------
// Rules
// ---------------------------------------------------------------------------

/** Equality against the canonical string form of the attribute value. */
export interface DirectMatchRule {
  readonly kind: 'direct';
  readonly attribute: AttributePath;
  readonly value: Scalar;
}

/** Unanchored regular expression search. */
export interface RegexMatchRule {
  readonly kind: 'regex';
  readonly attribute: AttributePath;
  /** Pattern source as written in configuration. */
  readonly source: string;
  readonly pattern: RegExp;
}

/** Logical OR over sub-rules. Empty list never matches. */
export interface AnyOfRule {
  readonly kind: 'any_of';
  readonly rules: ReadonlyArray<PredicateRule>;
}

/** Logical AND over sub-rules. Empty list always matches. */
export interface AllOfRule {
  readonly kind: 'all_of';
  readonly rules: ReadonlyArray<PredicateRule>;
}

export interface OneOfEachBinding {
  readonly attribute: AttributePath;
  readonly values: ReadonlyArray<Scalar>;
}

/**
 * Combinatorial selector: at most one object per combination of the bound
 * values. Not a predicate: it operates on a whole collection.
 */
export interface OneOfEachRule {
  readonly kind: 'one_of_each';
  /** Bindings in declaration order; the first varies slowest. */
  readonly bindings: ReadonlyArray<OneOfEachBinding>;
}

/** Rules evaluable against a single object. */
export type PredicateRule = DirectMatchRule | RegexMatchRule | AnyOfRule | AllOfRule;

export type Rule = PredicateRule | OneOfEachRule;

export type RuleKind = Rule['kind'];

/**
 * The compiled form of a top-level rule list (`devices:` or `agents:`).
 *
 * Predicates compose via AND. The selector and the limit are structural
 * steps applied after filtering, in that order.
 */
export interface RuleList {
  readonly predicates: ReadonlyArray<PredicateRule>;
  readonly oneOfEach?: OneOfEachRule | undefined;
  readonly limit?: number | undefined;
}

// ---------------------------------------------------------------------------
// Validation results
// ---------------------------------------------------------------------------

export interface ValidationError {
  readonly message: string;
  /** Location in the configuration tree, e.g. `agents[1].any[0]`. */
  readonly context?: string | undefined;
}

/**
 * Generic validation result type.
 *
 * - `ValidationResult<void>`: success has no value
 * - `ValidationResult<T>`: success carries a typed value
 */
export type ValidationResult<T = void> =
  | (T extends void ? { readonly ok: true } : { readonly ok: true; readonly value: T })
  | { readonly ok: false; readonly errors: ReadonlyArray<ValidationError> };

// ---------------------------------------------------------------------------
// Error Types
// ---------------------------------------------------------------------------

/**
 * A malformed rule or selection configuration.
 *
 * Raised when rules are compiled, or when a rule is evaluated against an
 * attribute it cannot compare (a sequence or mapping). Never retried and
 * never ignored: the caller aborts the operation.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly location?: string | undefined,
  ) {
    super(location === undefined ? message : `${location}: ${message}`);
    this.name = 'ConfigurationError';
  }
}

/**
 * Rule language types
 */

export const RULE_KEYS = ["SkipIf", "RemapIf", "FlattenIf", "RemapTarget"] as const

export type RuleKey = (typeof RULE_KEYS)[number]

/** Rule keys whose value is a predicate list */
export type ConditionKey = Exclude<RuleKey, "RemapTarget">

export const PREDICATE_KINDS = ["TargetExists", "IsTruthy", "NameMatches", "Always", "Never", "Conjunctions"] as const

export type PredicateKind = (typeof PREDICATE_KINDS)[number]

/**
 * Names accepted by `Conjunctions` besides predicate kinds.
 * Root: AND across the rule's predicates.
 * Predicates: AND inside every predicate's operand list.
 * All: both.
 */
export const CONJUNCTION_SCOPES = ["Root", "Predicates", "All"] as const

export type ConjunctionScope = (typeof CONJUNCTION_SCOPES)[number]

export interface Operand {
	value: string
	negated: boolean
}

interface PredicateOf<K extends PredicateKind> {
	kind: K
	operands: Operand[]
	negated: boolean
}

export type TargetExistsPredicate = PredicateOf<"TargetExists">
export type IsTruthyPredicate = PredicateOf<"IsTruthy">
export type NameMatchesPredicate = PredicateOf<"NameMatches">
export type AlwaysPredicate = PredicateOf<"Always">
export type NeverPredicate = PredicateOf<"Never">
export type ConjunctionsPredicate = PredicateOf<"Conjunctions">

export type Predicate =
	| TargetExistsPredicate
	| IsTruthyPredicate
	| NameMatchesPredicate
	| AlwaysPredicate
	| NeverPredicate
	| ConjunctionsPredicate

/**
 * replace: `Key=`, append: `+Key=`
 */
export type RuleLineMode = "replace" | "append"

/**
 * One `Key=value` line of a scope section.
 */
export interface RuleLine {
	key: RuleKey
	mode: RuleLineMode
	baseDomain: boolean
	/** Raw value, variables not yet substituted */
	value: string
	/** Parsed predicate list (empty for RemapTarget) */
	predicates: Predicate[]
	/** 1-based line in the config file */
	line: number
	/** Arena index of the scope that declared the line */
	scopeIndex: number
}

export interface ConjunctionMode {
	/** AND across the rule's predicates */
	root: boolean
	/** Predicate kinds whose operands combine with AND */
	predicateKinds: PredicateKind[]
}

/**
 * Outcome of evaluating the rules for one target path.
 */
export interface RuleResolution {
	/** Path relative to the plugin source root */
	targetPath: string
	/** Path relative to the destination root after remap and flatten */
	destinationPath: string
	skip: boolean
	remapped: boolean
	flattened: boolean
}

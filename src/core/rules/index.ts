export { parseRuleConfig, type ParseRuleConfigOptions, type RuleConfig } from "./config-parser"
export { conjunctionModeOf, evaluatePredicate, parsePredicateList, type FactSet } from "./predicates"
export { createFactSet, evaluate, RuleEngine, type RuleOutcome } from "./RuleEngine"
export { GLOBAL_SCOPE, ScopeTree, type ScopeNode } from "./ScopeTree"
export { VariableTable } from "./variables"

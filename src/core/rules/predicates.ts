import ignore from "ignore"

import {
	CONJUNCTION_SCOPES,
	PREDICATE_KINDS,
	type ConjunctionMode,
	type ConjunctionScope,
	type Operand,
	type Predicate,
	type PredicateKind,
} from "@patchweave/types"

import { PatchErrors } from "../errors"

/**
 * What predicates may look at for one candidate file.
 */
export interface FactSet {
	/** Whether a path relative to the destination root exists */
	targetExists: (relativePath: string) => boolean
	/** Config variables with defines applied */
	variables: Readonly<Record<string, string>>
	/** Base name of the candidate file */
	fileName: string
}

const TRUTHY = /^(1|true|yes|on)$/i

function findPredicateKind(name: string): PredicateKind | undefined {
	return PREDICATE_KINDS.find((kind) => kind === name)
}

function findConjunctionScope(name: string): ConjunctionScope | undefined {
	return CONJUNCTION_SCOPES.find((scope) => scope === name)
}

function parseOperand(text: string, lineNumber: number, configPath?: string): Operand {
	const negated = text.startsWith("!")
	const value = (negated ? text.slice(1) : text).trim()
	if (value === "") {
		throw PatchErrors.configParse("empty operand", lineNumber, configPath)
	}
	return { value, negated }
}

/**
 * `Pred:op,op|!Pred2:op` into predicates. Operands keep their `${Name}`
 * references; they are substituted when evaluated.
 */
export function parsePredicateList(value: string, lineNumber: number, configPath?: string): Predicate[] {
	return value.split("|").map((item): Predicate => {
		const text = item.trim()
		if (text === "") {
			throw PatchErrors.configParse("empty predicate", lineNumber, configPath)
		}

		const negated = text.startsWith("!")
		const body = negated ? text.slice(1) : text
		const colon = body.indexOf(":")
		const name = (colon === -1 ? body : body.slice(0, colon)).trim()
		const kind = findPredicateKind(name)
		if (!kind) {
			throw PatchErrors.unknownPredicate(name, lineNumber, configPath)
		}

		const operands =
			colon === -1
				? []
				: body
						.slice(colon + 1)
						.split(",")
						.map((operand) => operand.trim())
						.filter((operand) => operand !== "")
						.map((operand) => parseOperand(operand, lineNumber, configPath))

		const takesOperands = kind !== "Always" && kind !== "Never"
		if (takesOperands && operands.length === 0) {
			throw PatchErrors.configParse(`${kind} needs at least one operand`, lineNumber, configPath)
		}
		if (!takesOperands && operands.length > 0) {
			throw PatchErrors.configParse(`${kind} takes no operands`, lineNumber, configPath)
		}
		if (kind === "Conjunctions" && operands.some((operand) => operand.negated)) {
			throw PatchErrors.configParse("Conjunctions operands cannot be negated", lineNumber, configPath)
		}

		return { kind, operands, negated }
	})
}

function targetExists(operand: string, facts: FactSet): boolean {
	return facts.targetExists(operand)
}

function isTruthy(operand: string, facts: FactSet): boolean {
	return TRUTHY.test((facts.variables[operand] ?? operand).trim())
}

function nameMatches(operand: string, facts: FactSet): boolean {
	return ignore().add(operand).ignores(facts.fileName)
}

/**
 * Truth value of one predicate. `substitute` expands variables in operands;
 * `allOperands` makes the operand list combine with AND instead of OR.
 */
export function evaluatePredicate(
	predicate: Predicate,
	facts: FactSet,
	substitute: (text: string) => string,
	allOperands: boolean,
): boolean {
	const combine = (test: (operand: string, facts: FactSet) => boolean) => {
		const results = predicate.operands.map((operand) => test(substitute(operand.value), facts) !== operand.negated)
		return allOperands ? results.every(Boolean) : results.some(Boolean)
	}

	const evaluate = (): boolean => {
		switch (predicate.kind) {
			case "TargetExists":
				return combine(targetExists)
			case "IsTruthy":
				return combine(isTruthy)
			case "NameMatches":
				return combine(nameMatches)
			case "Always":
				return true
			case "Never":
				return false
			case "Conjunctions":
				// Directive, not a condition: the caller folds it into the ConjunctionMode
				return true
		}
	}

	return evaluate() !== predicate.negated
}

/**
 * Fold `Conjunctions` directives into a mode. Unknown names are rejected.
 */
export function conjunctionModeOf(
	predicates: readonly Predicate[],
	substitute: (text: string) => string,
	lineNumber?: number,
	configPath?: string,
): ConjunctionMode {
	const mode: ConjunctionMode = { root: false, predicateKinds: [] }
	const addKinds = (kinds: readonly PredicateKind[]) => {
		for (const kind of kinds) {
			if (!mode.predicateKinds.includes(kind)) {
				mode.predicateKinds.push(kind)
			}
		}
	}

	for (const predicate of predicates) {
		if (predicate.kind !== "Conjunctions") {
			continue
		}
		for (const operand of predicate.operands) {
			const name = substitute(operand.value)
			const scope = findConjunctionScope(name)
			const kind = findPredicateKind(name)
			if (scope === "Root" || scope === "All") {
				mode.root = true
			}
			if (scope === "Predicates" || scope === "All") {
				addKinds(PREDICATE_KINDS)
			}
			if (kind) {
				addKinds([kind])
			}
			if (!scope && !kind) {
				throw PatchErrors.unknownPredicate(name, lineNumber ?? 0, configPath)
			}
		}
	}
	return mode
}

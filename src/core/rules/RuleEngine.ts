import { posix } from "path"

import type { ConditionKey, RuleLine, RuleResolution } from "@patchweave/types"

import { flattenPath, isPathWithin, normalizeRelativePath, replacePathPrefix } from "../../utils/path"
import { PatchErrors } from "../errors"
import { parseRuleConfig, type ParseRuleConfigOptions, type RuleConfig } from "./config-parser"
import { conjunctionModeOf, evaluatePredicate, type FactSet } from "./predicates"

export interface RuleOutcome {
	value: boolean
	/** Effective lines the value came from */
	lines: RuleLine[]
}

/**
 * Decides per target path whether a file is in scope and where it lands in
 * the destination tree.
 */
export class RuleEngine {
	constructor(readonly config: RuleConfig) {}

	static parse(text: string, options: ParseRuleConfigOptions = {}): RuleEngine {
		return new RuleEngine(parseRuleConfig(text, options))
	}

	/**
	 * Engine without rules: nothing skipped, nothing moved.
	 */
	static empty(defines: Readonly<Record<string, string>> = {}): RuleEngine {
		return RuleEngine.parse("", { defines })
	}

	get variables(): Record<string, string> {
		return this.config.variables.toRecord()
	}

	evaluateRule(key: ConditionKey, targetPath: string, facts: FactSet): RuleOutcome {
		const lines = this.config.scopes.resolveLines(key, targetPath)
		const predicates = lines.flatMap((line) =>
			line.predicates.map((predicate) => ({ predicate, line: line.line })),
		)
		const conditions = predicates.filter(({ predicate }) => predicate.kind !== "Conjunctions")
		if (conditions.length === 0) {
			return { value: false, lines }
		}

		const mode = conjunctionModeOf(
			predicates.map(({ predicate }) => predicate),
			(text) => this.config.variables.substitute(text),
			undefined,
			this.config.path,
		)
		const results = conditions.map(({ predicate, line }) =>
			evaluatePredicate(
				predicate,
				facts,
				(text) => this.config.variables.substitute(text, line),
				mode.predicateKinds.includes(predicate.kind),
			),
		)
		return { value: mode.root ? results.every(Boolean) : results.some(Boolean), lines }
	}

	/**
	 * Skip wins over everything. Otherwise remap, then flatten.
	 */
	evaluate(targetPath: string, facts: FactSet): RuleResolution {
		const unchanged: RuleResolution = {
			targetPath,
			destinationPath: targetPath,
			skip: false,
			remapped: false,
			flattened: false,
		}

		if (this.evaluateRule("SkipIf", targetPath, facts).value) {
			return { ...unchanged, skip: true }
		}

		let destinationPath = targetPath
		let remapped = false
		let remap: { from: string; to: string } | undefined
		if (this.evaluateRule("RemapIf", targetPath, facts).value) {
			remap = this.remapTarget(targetPath)
			destinationPath = replacePathPrefix(targetPath, remap.from, remap.to)
			remapped = true
		}

		let flattened = false
		const flatten = this.evaluateRule("FlattenIf", targetPath, facts)
		const flattenLine = flatten.lines[flatten.lines.length - 1]
		if (flatten.value && flattenLine) {
			const declared = this.config.scopes.node(flattenLine.scopeIndex).path
			const prefix = remap && isPathWithin(declared, remap.from) ? replacePathPrefix(declared, remap.from, remap.to) : declared
			destinationPath = flattenPath(destinationPath, prefix)
			flattened = true
		}

		return { ...unchanged, destinationPath, remapped, flattened }
	}

	/**
	 * Last effective `RemapTarget` and the scope that declared it.
	 */
	private remapTarget(targetPath: string): { from: string; to: string } {
		const line = this.config.scopes.resolveLines("RemapTarget", targetPath).at(-1)
		if (!line) {
			throw PatchErrors.missingRemapTarget(targetPath, 0, this.config.path)
		}
		const to = this.config.variables.substitute(line.value, line.line)
		try {
			return { from: this.config.scopes.node(line.scopeIndex).path, to: normalizeRelativePath(to) }
		} catch (error) {
			throw PatchErrors.configParse(error instanceof Error ? error.message : String(error), line.line, this.config.path)
		}
	}
}

/**
 * Facts for a target path, given the destination root lookup.
 */
export function createFactSet(
	targetPath: string,
	variables: Readonly<Record<string, string>>,
	targetExists: (relativePath: string) => boolean,
): FactSet {
	return { targetExists, variables, fileName: posix.basename(targetPath) }
}

export function evaluate(config: RuleConfig, targetPath: string, facts: FactSet): RuleResolution {
	return new RuleEngine(config).evaluate(targetPath, facts)
}

import { RULE_KEYS, type RuleKey } from "@patchweave/types"

import { normalizeRelativePath } from "../../utils/path"
import { PatchErrors } from "../errors"
import { conjunctionModeOf, parsePredicateList } from "./predicates"
import { GLOBAL_SCOPE, ScopeTree } from "./ScopeTree"
import { VARIABLE_NAME, VariableTable } from "./variables"

/**
 * Parsed rule config. Built once per run and passed around read-only.
 */
export interface RuleConfig {
	variables: VariableTable
	scopes: ScopeTree
	/** Config file the rules came from, for diagnostics */
	path?: string
}

export interface ParseRuleConfigOptions {
	/** Command-line variables; they win over `[Variables]` */
	defines?: Readonly<Record<string, string>>
	path?: string
}

const SECTION = /^\[(.*)\]$/
const KEY = /^([+^]{0,2})([A-Za-z]+)$/

type Section = { type: "variables" } | { type: "scopes"; indices: number[] }

function findRuleKey(name: string): RuleKey | undefined {
	return RULE_KEYS.find((key) => key === name)
}

/**
 * Parse an INI-style rule config: `[Variables]`, `[Global]` and
 * `[Path|Path2]` sections of `Key=Value` lines. `;` and `#` start comments.
 */
export function parseRuleConfig(text: string, options: ParseRuleConfigOptions = {}): RuleConfig {
	const configPath = options.path
	const scopes = new ScopeTree()
	const declared: Array<[string, { value: string; line: number }]> = []
	let section: Section | undefined

	const lines = text.split(/\r?\n/)
	for (let index = 0; index < lines.length; index++) {
		const lineNumber = index + 1
		const line = lines[index].trim()
		if (line === "" || line.startsWith(";") || line.startsWith("#")) {
			continue
		}

		const header = SECTION.exec(line)
		if (header) {
			section = parseSectionHeader(header[1] ?? "", scopes, lineNumber, configPath)
			continue
		}

		const equals = line.indexOf("=")
		if (equals === -1) {
			throw PatchErrors.configParse(`expected Key=Value, got '${line}'`, lineNumber, configPath)
		}
		if (!section) {
			throw PatchErrors.configParse("entry outside of any section", lineNumber, configPath)
		}

		const keyText = line.slice(0, equals).trim()
		const value = line.slice(equals + 1).trim()

		if (section.type === "variables") {
			if (!VARIABLE_NAME.test(keyText)) {
				throw PatchErrors.configParse(`invalid variable name '${keyText}'`, lineNumber, configPath)
			}
			declared.push([keyText, { value, line: lineNumber }])
			continue
		}

		const keyMatch = KEY.exec(keyText)
		const prefix = keyMatch?.[1] ?? ""
		const key = findRuleKey(keyMatch?.[2] ?? "")
		if (!key || prefix === "++" || prefix === "^^") {
			throw PatchErrors.unknownRuleKey(keyText, lineNumber, configPath)
		}

		const predicates = key === "RemapTarget" ? [] : parsePredicateList(value, lineNumber, configPath)
		for (const scopeIndex of section.indices) {
			scopes.addLine({
				key,
				mode: prefix.includes("+") ? "append" : "replace",
				baseDomain: prefix.includes("^"),
				value,
				predicates,
				line: lineNumber,
				scopeIndex,
			})
		}
	}

	const variables = new VariableTable(declared, options.defines, configPath)
	const config: RuleConfig = { variables, scopes, path: configPath }
	validateRuleConfig(config)
	return config
}

function parseSectionHeader(name: string, scopes: ScopeTree, lineNumber: number, configPath?: string): Section {
	const trimmed = name.trim()
	if (trimmed === "") {
		throw PatchErrors.configParse("empty section name", lineNumber, configPath)
	}
	if (trimmed === "Variables") {
		return { type: "variables" }
	}
	if (trimmed === "Global") {
		return { type: "scopes", indices: [GLOBAL_SCOPE] }
	}

	const indices = trimmed.split("|").map((part) => {
		const scopePath = part.trim()
		if (scopePath === "") {
			throw PatchErrors.configParse(`empty path in section [${trimmed}]`, lineNumber, configPath)
		}
		try {
			return scopes.ensure(normalizeRelativePath(scopePath))
		} catch (error) {
			throw PatchErrors.configParse(error instanceof Error ? error.message : String(error), lineNumber, configPath)
		}
	})
	return { type: "scopes", indices }
}

/**
 * Checks that need the whole file: variable references, Conjunctions names
 * and a RemapTarget for every RemapIf.
 */
function validateRuleConfig(config: RuleConfig): void {
	const { variables, scopes } = config
	variables.validate()

	for (const scope of scopes.scopes()) {
		for (const line of scope.lines) {
			variables.substitute(line.value, line.line)
			conjunctionModeOf(line.predicates, (text) => variables.substitute(text, line.line), line.line, config.path)
		}

		const remapIf = scope.lines.find((line) => line.key === "RemapIf")
		if (remapIf && scopes.resolveLines("RemapTarget", scope.path).length === 0) {
			throw PatchErrors.missingRemapTarget(scope.path === "" ? "Global" : scope.path, remapIf.line, config.path)
		}
	}
}

// npx vitest core/rules/__tests__/RuleEngine.spec.ts

import { describe, expect, it } from "vitest"

import { ConfigError, PatchErrorCode } from "../../errors"
import { createFactSet, evaluate, parseRuleConfig, RuleEngine } from "../index"

function engineFor(text: string, defines: Record<string, string> = {}) {
	return RuleEngine.parse(text, { defines, path: "patchweave.ini" })
}

function resolve(engine: RuleEngine, targetPath: string, existing: string[] = []) {
	return engine.evaluate(
		targetPath,
		createFactSet(targetPath, engine.variables, (relativePath) => existing.includes(relativePath)),
	)
}

function parseError(text: string): unknown {
	try {
		parseRuleConfig(text)
	} catch (error) {
		return error
	}
	return undefined
}

describe("RuleEngine", () => {
	describe("skip rules", () => {
		const engine = engineFor(["; third party libraries", "[ThirdParty/astc-encoder]", "SkipIf=TargetExists:ThirdParty/astcenc"].join("\n"))

		it("should skip a scope when the named target exists", () => {
			expect(resolve(engine, "ThirdParty/astc-encoder/Source/astcenc_entry.cpp", ["ThirdParty/astcenc"])).toEqual({
				targetPath: "ThirdParty/astc-encoder/Source/astcenc_entry.cpp",
				destinationPath: "ThirdParty/astc-encoder/Source/astcenc_entry.cpp",
				skip: true,
				remapped: false,
				flattened: false,
			})
		})

		it("should keep the scope when the named target is missing", () => {
			expect(resolve(engine, "ThirdParty/astc-encoder/Source/astcenc_entry.cpp").skip).toBe(false)
		})

		it("should not affect paths outside the scope", () => {
			expect(resolve(engine, "Runtime/Core/Private/Misc.cpp", ["ThirdParty/astcenc"]).skip).toBe(false)
		})

		it("should not treat a sibling with a longer name as inside the scope", () => {
			expect(resolve(engine, "ThirdParty/astc-encoder2/a.cpp", ["ThirdParty/astcenc"]).skip).toBe(false)
		})
	})

	describe("conjunctions", () => {
		const config = [
			"[Global]",
			"SkipIf=IsTruthy:UseA,UseB|TargetExists:X,Y|Conjunctions:All",
			"[Variables]",
			"UseA=1",
			"UseB=0",
		].join("\n")

		it("should require every operand of every predicate with All", () => {
			expect(resolve(engineFor(config, { UseB: "on" }), "a.cpp", ["X", "Y"]).skip).toBe(true)
			expect(resolve(engineFor(config), "a.cpp", ["X", "Y"]).skip).toBe(false)
			expect(resolve(engineFor(config, { UseB: "on" }), "a.cpp", ["X"]).skip).toBe(false)
		})

		it("should combine with OR by default", () => {
			const engine = engineFor(config.replace("|Conjunctions:All", ""))

			expect(resolve(engine, "a.cpp", ["Y"]).skip).toBe(true)
			expect(resolve(engine, "a.cpp").skip).toBe(true)
		})

		it("should AND only the operands of a named predicate kind", () => {
			const engine = engineFor("[Global]\nSkipIf=TargetExists:X,Y|Never|Conjunctions:TargetExists")

			expect(resolve(engine, "a.cpp", ["X"]).skip).toBe(false)
			expect(resolve(engine, "a.cpp", ["X", "Y"]).skip).toBe(true)
		})

		it("should AND the predicates of a rule with Root", () => {
			const engine = engineFor("[Global]\nSkipIf=TargetExists:X,Y|NameMatches:*.h|Conjunctions:Root")

			expect(resolve(engine, "a.h", ["Y"]).skip).toBe(true)
			expect(resolve(engine, "a.cpp", ["Y"]).skip).toBe(false)
		})
	})

	describe("scope accumulation", () => {
		const engine = engineFor(
			[
				"[Global]",
				"SkipIf=NameMatches:*.generated.h",
				"[Runtime]",
				"+SkipIf=NameMatches:*.inl",
				"[Runtime/Launch]",
				"SkipIf=Never",
			].join("\n"),
		)

		it("should append nested lines to inherited ones", () => {
			expect(engine.config.scopes.resolveLines("SkipIf", "Runtime/Core/Foo.inl").map((line) => line.line)).toEqual([2, 4])
			expect(resolve(engine, "Runtime/Core/Foo.inl").skip).toBe(true)
			expect(resolve(engine, "Runtime/Core/Foo.generated.h").skip).toBe(true)
			expect(resolve(engine, "Editor/Foo.inl").skip).toBe(false)
		})

		it("should replace inherited lines with a plain key", () => {
			expect(resolve(engine, "Runtime/Launch/Foo.inl").skip).toBe(false)
			expect(resolve(engine, "Runtime/Launch/Foo.generated.h").skip).toBe(false)
		})
	})

	describe("base domain lines", () => {
		const engine = engineFor(
			["[Global]", "^SkipIf=NameMatches:*.bak", "[Runtime]", "SkipIf=Never", "[Editor]", "^SkipIf=Never"].join("\n"),
		)

		it("should survive a plain replacement", () => {
			expect(resolve(engine, "Runtime/Foo.bak").skip).toBe(true)
		})

		it("should only be replaced by another base domain line", () => {
			expect(resolve(engine, "Editor/Foo.bak").skip).toBe(false)
		})
	})

	describe("negation", () => {
		it("should negate a whole predicate", () => {
			const engine = engineFor("[Global]\nSkipIf=!NameMatches:*.h")

			expect(resolve(engine, "Foo.cpp").skip).toBe(true)
			expect(resolve(engine, "Foo.h").skip).toBe(false)
		})

		it("should negate a single operand", () => {
			const engine = engineFor("[Plugins]\nSkipIf=TargetExists:!Engine/Plugins/Runtime/Foo")

			expect(resolve(engine, "Plugins/Foo/a.cpp").skip).toBe(true)
			expect(resolve(engine, "Plugins/Foo/a.cpp", ["Engine/Plugins/Runtime/Foo"]).skip).toBe(false)
		})
	})

	describe("remap and flatten", () => {
		it("should replace the declaring scope's prefix", () => {
			const engine = engineFor(
				[
					"[ThirdParty/astc-encoder]",
					"RemapIf=TargetExists:ThirdParty/astcenc",
					"RemapTarget=${ThirdPartyDir}/astcenc",
					"[Variables]",
					"ThirdPartyDir=ThirdParty",
				].join("\n"),
			)

			expect(resolve(engine, "ThirdParty/astc-encoder/Source/a.cpp", ["ThirdParty/astcenc"])).toMatchObject({
				destinationPath: "ThirdParty/astcenc/Source/a.cpp",
				remapped: true,
				flattened: false,
			})
			expect(resolve(engine, "ThirdParty/astc-encoder/Source/a.cpp").destinationPath).toBe(
				"ThirdParty/astc-encoder/Source/a.cpp",
			)
		})

		it("should keep only the scope prefix and the file name when flattening", () => {
			const engine = engineFor("[Plugins/MyPlugin/Shaders]\nFlattenIf=NameMatches:*.usf")

			expect(resolve(engine, "Plugins/MyPlugin/Shaders/Private/Deep/Foo.usf")).toMatchObject({
				destinationPath: "Plugins/MyPlugin/Shaders/Foo.usf",
				flattened: true,
			})
			expect(resolve(engine, "Plugins/MyPlugin/Shaders/Private/Foo.h").flattened).toBe(false)
		})

		it("should remap before flattening", () => {
			const engine = engineFor(["[Lib]", "RemapIf=Always", "RemapTarget=Vendor/Lib", "FlattenIf=Always"].join("\n"))

			expect(resolve(engine, "Lib/a/b/c.h")).toMatchObject({
				destinationPath: "Vendor/Lib/c.h",
				remapped: true,
				flattened: true,
			})
		})

		it("should let skip win over remap", () => {
			const engine = engineFor(["[Lib]", "SkipIf=Always", "RemapIf=Always", "RemapTarget=Vendor"].join("\n"))

			expect(resolve(engine, "Lib/a.h")).toMatchObject({ skip: true, remapped: false, destinationPath: "Lib/a.h" })
		})
	})

	describe("variables", () => {
		it("should let defines override config variables", () => {
			const config = "[Variables]\nMode=0\n[Global]\nSkipIf=IsTruthy:Mode"

			expect(resolve(engineFor(config), "a.cpp").skip).toBe(false)
			expect(resolve(engineFor(config, { Mode: "Yes" }), "a.cpp").skip).toBe(true)
		})

		it("should expand nested references", () => {
			const engine = engineFor("[Variables]\nRoot=${Base}/Plugins\nBase=Engine")

			expect(engine.variables).toEqual({ Root: "Engine/Plugins", Base: "Engine" })
		})
	})

	it("should evaluate through the standalone function", () => {
		const config = parseRuleConfig("[Global]\nSkipIf=Always")

		expect(evaluate(config, "a.cpp", createFactSet("a.cpp", {}, () => false)).skip).toBe(true)
	})

	it("should resolve nothing for an empty config", () => {
		expect(resolve(RuleEngine.empty(), "Runtime/a.cpp")).toEqual({
			targetPath: "Runtime/a.cpp",
			destinationPath: "Runtime/a.cpp",
			skip: false,
			remapped: false,
			flattened: false,
		})
	})
})

describe("parseRuleConfig errors", () => {
	it.each([
		["[Global]\nSkipWhen=Always", PatchErrorCode.UNKNOWN_RULE_KEY],
		["[Global]\n++SkipIf=Always", PatchErrorCode.UNKNOWN_RULE_KEY],
		["[Global]\nSkipIf=Sometimes", PatchErrorCode.UNKNOWN_PREDICATE],
		["[Global]\nSkipIf=Conjunctions:Everything", PatchErrorCode.UNKNOWN_PREDICATE],
		["[Global]\nSkipIf=TargetExists:${Missing}", PatchErrorCode.VARIABLE_UNDEFINED],
		["[Variables]\nA=${B}\nB=${A}", PatchErrorCode.VARIABLE_CYCLE],
		["[Lib]\nRemapIf=Always", PatchErrorCode.MISSING_REMAP_TARGET],
		["SkipIf=Always", PatchErrorCode.CONFIG_PARSE_ERROR],
		["[]\nSkipIf=Always", PatchErrorCode.CONFIG_PARSE_ERROR],
		["[Global]\nSkipIf", PatchErrorCode.CONFIG_PARSE_ERROR],
		["[Global]\nSkipIf=TargetExists", PatchErrorCode.CONFIG_PARSE_ERROR],
		["[../Outside]\nSkipIf=Always", PatchErrorCode.CONFIG_PARSE_ERROR],
	])("should reject %j with %s", (text, code) => {
		const error = parseError(text)

		expect(error).toBeInstanceOf(ConfigError)
		expect(error).toHaveProperty("code", code)
	})

	it("should report the 1-based line", () => {
		expect(parseError("[Global]\n# comment\nSkipIf=Sometimes")).toHaveProperty("lineNumber", 3)
	})

	it("should accept a RemapTarget inherited from an outer scope", () => {
		expect(parseError("[Lib]\nRemapTarget=Vendor/Lib\n[Lib/Sub]\nRemapIf=Always")).toBeUndefined()
	})
})

import { describe, it, expect } from "vitest"

import { matchOptionsSchema, runOptionsSchema, PATCH_DEFAULTS } from "../options.js"

describe("matchOptionsSchema", () => {
	it("should fill in the engine defaults", () => {
		const options = matchOptionsSchema.parse({})

		expect(options).toEqual({
			patchContext: 50,
			contentTolerance: 0.5,
			lineTolerance: Number.POSITIVE_INFINITY,
			lineComparator: "exact",
		})
	})

	it("should reject a content tolerance above 1", () => {
		const result = matchOptionsSchema.safeParse({ contentTolerance: 1.5 })

		expect(result.success).toBe(false)
	})

	it("should accept a finite line tolerance", () => {
		expect(matchOptionsSchema.parse({ lineTolerance: 20 }).lineTolerance).toBe(20)
	})
})

describe("runOptionsSchema", () => {
	const base = {
		tag: "MyPlugin",
		sourceRoot: "/plugin",
		destinationRoot: "/engine",
		actions: ["apply"],
	}

	it("should default the optional flags", () => {
		const options = runOptionsSchema.parse(base)

		expect(options.force).toBe(false)
		expect(options.dryRun).toBe(false)
		expect(options.include).toEqual([])
		expect(options.defines).toEqual({})
		expect(options.concurrency).toBe(PATCH_DEFAULTS.CONCURRENCY)
		expect(options.extensions).toContain(".cpp")
	})

	it("should reject tags that cannot be used in a guard", () => {
		expect(runOptionsSchema.safeParse({ ...base, tag: "My-Plugin" }).success).toBe(false)
		expect(runOptionsSchema.safeParse({ ...base, tag: "" }).success).toBe(false)
	})

	it("should require at least one action", () => {
		expect(runOptionsSchema.safeParse({ ...base, actions: [] }).success).toBe(false)
	})

	it("should reject unknown actions", () => {
		expect(runOptionsSchema.safeParse({ ...base, actions: ["merge"] }).success).toBe(false)
	})
})

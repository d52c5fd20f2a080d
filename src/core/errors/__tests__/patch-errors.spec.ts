// npx vitest core/errors/__tests__/patch-errors.spec.ts

import { describe, expect, it } from "vitest"

import { ConfigError, GuardParseError, isFatalError, PatchError, PatchErrorCode, PatchErrors } from "../index"

describe("PatchErrors", () => {
	it("should name the line and file of a malformed guard", () => {
		const error = PatchErrors.malformedGuard("nested Begin", 12, "Runtime/a.cpp")

		expect(error).toBeInstanceOf(GuardParseError)
		expect(error.message).toBe("Malformed guard at line 12 of Runtime/a.cpp: nested Begin")
		expect(error.toObject()).toEqual({
			name: "GuardParseError",
			code: PatchErrorCode.MALFORMED_GUARD,
			message: "Malformed guard at line 12 of Runtime/a.cpp: nested Begin",
			context: undefined,
			path: "Runtime/a.cpp",
			lineNumber: 12,
		})
	})

	it("should number segments from one", () => {
		expect(PatchErrors.overlappingMatches("a.cpp", 0, 1).message).toBe("Segments 1 and 2 overlap in a.cpp")
		expect(PatchErrors.segmentApplyFailed("a.cpp", 2, "bad guard").context).toEqual({ recordIndex: 2 })
	})

	it("should list the option issues", () => {
		const error = PatchErrors.invalidOptions(["tag: Required", "actions: Required"])

		expect(error.message).toBe("Invalid options: tag: Required; actions: Required")
		expect(error.code).toBe(PatchErrorCode.INVALID_OPTIONS)
	})

	it("should treat config and option errors as fatal", () => {
		expect(isFatalError(PatchErrors.configParse("bad"))).toBe(true)
		expect(isFatalError(PatchErrors.variableCycle(["A", "B", "A"]))).toBe(true)
		expect(isFatalError(PatchErrors.invalidOptions([]))).toBe(true)
		expect(isFatalError(PatchErrors.fileNotFound("a.cpp"))).toBe(false)
		expect(isFatalError(new Error("plain"))).toBe(false)
	})

	it("should keep the config line", () => {
		const error = PatchErrors.unknownRuleKey("SkipWhen", 4, "patchweave.ini")

		expect(error).toBeInstanceOf(ConfigError)
		expect(error).toBeInstanceOf(PatchError)
		expect(error.lineNumber).toBe(4)
		expect(error.path).toBe("patchweave.ini")
	})
})

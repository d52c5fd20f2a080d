import { describe, expect, it } from "vitest"

import { commentOutLine, containsTag, createGuardClassifier, renderGuarded, uncommentLine } from "../guard-syntax"
import { parseGuards } from "../GuardParser"

describe("guard-syntax", () => {
	describe("commentOutLine / uncommentLine", () => {
		it("should put the comment marker after the indentation", () => {
			expect(commentOutLine("\t\tFoo(1);")).toBe("\t\t// Foo(1);")
		})

		it("should keep whitespace-only lines", () => {
			expect(commentOutLine("   ")).toBe("   ")
			expect(uncommentLine("   ")).toBe("   ")
		})

		it("should restore a line that was already a comment", () => {
			const stock = "  // original note"
			expect(commentOutLine(stock)).toBe("  // // original note")
			expect(uncommentLine(commentOutLine(stock))).toBe(stock)
		})

		it("should return undefined for live code", () => {
			expect(uncommentLine("Foo();")).toBeUndefined()
			expect(uncommentLine("//Foo();")).toBeUndefined()
		})
	})

	describe("createGuardClassifier", () => {
		const classify = createGuardClassifier("MyPlugin")

		it("should classify block markers", () => {
			expect(classify("  //MyPlugin: Begin")).toEqual({ type: "begin", indent: "  ", deletion: false, comment: "" })
			expect(classify("// MyPlugin-: End")).toEqual({ type: "end", indent: "" })
		})

		it("should classify a comment-only guard as next-line", () => {
			expect(classify("// MyPlugin: keep in sync")).toEqual({
				type: "next-line",
				indent: "",
				deletion: false,
				comment: ": keep in sync",
			})
		})

		it("should leave unrelated lines alone", () => {
			expect(classify("int MyPlugin = 0;")).toEqual({ type: "none" })
		})
	})

	describe("containsTag", () => {
		it("should find a guard anywhere in the text", () => {
			expect(containsTag("a\nb(); // MyPlugin\n", "MyPlugin")).toBe(true)
			expect(containsTag("a\n// MyPluginX\n", "MyPlugin")).toBe(false)
		})
	})

	describe("renderGuarded", () => {
		it("should render an addition block", () => {
			expect(
				renderGuarded("MyPlugin", { kind: "addition", style: "block", indent: "\t", comment: " Hooks" }, ["\tHook();"]),
			).toEqual(["\t// MyPlugin Hooks: Begin", "\tHook();", "\t// MyPlugin: End"])
		})

		it("should comment out the stock lines of a deletion", () => {
			expect(
				renderGuarded("MyPlugin", { kind: "deletion", style: "block", indent: "", comment: "" }, ["Stock();", ""]),
			).toEqual(["// MyPlugin-: Begin", "// Stock();", "", "// MyPlugin: End"])
		})

		it("should render single-line and next-line guards", () => {
			expect(
				renderGuarded("MyPlugin", { kind: "addition", style: "single-line", indent: "", comment: "" }, ["Hook();"]),
			).toEqual(["Hook(); // MyPlugin"])
			expect(
				renderGuarded("MyPlugin", { kind: "deletion", style: "next-line", indent: " ", comment: " old" }, ["Old();"]),
			).toEqual([" // MyPlugin- old", "// Old();"])
		})

		it("should refuse a single-line guard around several lines", () => {
			expect(() =>
				renderGuarded("MyPlugin", { kind: "addition", style: "single-line", indent: "", comment: "" }, ["a();", "b();"]),
			).toThrow("exactly one")
		})

		it("should produce lines the parser reads back", () => {
			const lines = [
				...renderGuarded("MyPlugin", { kind: "deletion", style: "single-line", indent: "", comment: " legacy" }, ["  Old(); "]),
				...renderGuarded("MyPlugin", { kind: "addition", style: "next-line", indent: "  ", comment: "" }, ["  New();"]),
			]

			const segments = parseGuards(lines, "MyPlugin")

			expect(segments[0]?.restorable).toEqual(["  Old(); "])
			expect(segments[0]?.comment).toBe(" legacy")
			expect(segments[1]?.body).toEqual(["  New();"])
		})
	})
})

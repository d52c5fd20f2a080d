// npx vitest core/rules/__tests__/variables.spec.ts

import { describe, expect, it } from "vitest"

import { VariableTable } from "../variables"

describe("VariableTable", () => {
	it("should substitute references declared later", () => {
		const table = new VariableTable([
			["Full", { value: "${Dir}/Sub", line: 2 }],
			["Dir", { value: "Engine", line: 3 }],
		])

		expect(table.substitute("x/${Full}/y")).toBe("x/Engine/Sub/y")
	})

	it("should prefer defines over declarations", () => {
		const table = new VariableTable([["Dir", { value: "Engine", line: 2 }]], { Dir: "Game" })

		expect(table.resolve("Dir")).toBe("Game")
	})

	it("should leave text without references alone", () => {
		expect(new VariableTable().substitute("plain $text {here}")).toBe("plain $text {here}")
	})

	it("should name the line of an undefined reference", () => {
		const table = new VariableTable([["A", { value: "${Nope}", line: 7 }]])

		expect(() => table.validate()).toThrow("Variable 'Nope' is not defined (line 7)")
	})

	it("should name the chain of a cycle", () => {
		const table = new VariableTable([
			["A", { value: "${B}", line: 1 }],
			["B", { value: "${C}", line: 2 }],
			["C", { value: "${A}", line: 3 }],
		])

		expect(() => table.validate()).toThrow("Variables reference each other in a cycle: A -> B -> C -> A")
		expect(() => table.resolve("B")).toThrow("B -> C -> A -> B")
	})
})

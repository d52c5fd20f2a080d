// npx vitest core/rules/__tests__/ScopeTree.spec.ts

import { describe, expect, it } from "vitest"

import { GLOBAL_SCOPE, ScopeTree } from "../ScopeTree"

describe("ScopeTree", () => {
	it("should create nodes for every ancestor prefix", () => {
		const tree = new ScopeTree()
		const index = tree.ensure("Runtime/Core/Private")

		expect(tree.size).toBe(4)
		expect(tree.node(index).path).toBe("Runtime/Core/Private")
		expect(tree.ensure("Runtime/Core")).toBe(tree.node(index).parent)
		expect(tree.ensure("")).toBe(GLOBAL_SCOPE)
	})

	it("should walk from Global to the deepest containing scope", () => {
		const tree = new ScopeTree()
		tree.ensure("Runtime/Core")
		tree.ensure("Editor")

		expect(tree.chain("Runtime/Core/Private/Misc.cpp").map((node) => node.path)).toEqual(["", "Runtime", "Runtime/Core"])
		expect(tree.chain("Editor/Foo.cpp").map((node) => node.path)).toEqual(["", "Editor"])
		expect(tree.chain("Developer/Foo.cpp").map((node) => node.path)).toEqual([""])
	})

	it("should throw for an unknown index", () => {
		expect(() => new ScopeTree().node(3)).toThrow(RangeError)
	})
})

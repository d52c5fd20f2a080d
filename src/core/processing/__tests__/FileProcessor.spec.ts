// npx vitest core/processing/__tests__/FileProcessor.spec.ts

import { describe, expect, it } from "vitest"

import { PatchErrorCode } from "../../errors"
import { FuzzyMatcher } from "../../matching/FuzzyMatcher"
import { FilePatchStore } from "../../patches/PatchStore"
import { createSilentLogger } from "../../../utils/logging"
import { MemoryFileSystem } from "../../../utils/memory-file-system"
import { FileProcessor } from "../FileProcessor"

const LIVE = "int a;\nvoid Tick()\n{\n\t// MyPlugin: Begin\n\tHook();\n\t// MyPlugin: End\n\tUpdate();\n}\n"
const LIVE_V2 = "int a;\nvoid Tick()\n{\n\t// MyPlugin: Begin\n\tHook(2);\n\t// MyPlugin: End\n\tUpdate();\n}\n"
const TARGET = { targetPath: "Runtime/Tick.cpp", destinationPath: "Runtime/Tick.cpp" }

function setup(force = false) {
	const fileSystem = new MemoryFileSystem({ "/engine/Runtime/Tick.cpp": LIVE })
	const store = new FilePatchStore(fileSystem, "/plugin/SourcePatch")
	const processor = new FileProcessor({
		tag: "MyPlugin",
		destinationRoot: "/engine",
		patchContext: 2,
		force,
		fileSystem,
		store,
		matcher: FuzzyMatcher.fromOptions({ contentTolerance: 0.5, lineTolerance: Number.POSITIVE_INFINITY, lineComparator: "exact" }),
		logger: createSilentLogger(),
		now: () => new Date("2026-03-04T05:06:07.000Z"),
	})
	return { fileSystem, store, processor }
}

describe("FileProcessor", () => {
	it("should append a version when the guarded code changes", async () => {
		const { fileSystem, store, processor } = setup()
		await processor.process(TARGET, ["generate"])
		await fileSystem.writeFile("/engine/Runtime/Tick.cpp", LIVE_V2)

		const result = await processor.process(TARGET, ["generate"])

		expect(result.actions).toEqual([{ action: "generate", status: "generated", versionOrder: 2 }])
		expect((await store.load("Runtime/Tick.cpp")).versions.map((version) => version.order)).toEqual([1, 2])
	})

	it("should replace every version when forced", async () => {
		const { fileSystem, store, processor } = setup(true)
		await processor.process(TARGET, ["generate"])
		await fileSystem.writeFile("/engine/Runtime/Tick.cpp", LIVE_V2)

		await processor.process(TARGET, ["generate"])

		expect((await store.load("Runtime/Tick.cpp")).versions.map((version) => version.order)).toEqual([2])
	})

	it("should report a file without stored versions", async () => {
		const { processor } = setup()

		expect(await processor.process(TARGET, ["apply"])).toEqual({
			...TARGET,
			skipped: false,
			actions: [{ action: "apply", status: "no-patch" }],
		})
	})

	it("should attach the conflict report when nothing matches", async () => {
		const { fileSystem, processor } = setup()
		await processor.process(TARGET, ["generate"])
		await fileSystem.writeFile("/engine/Runtime/Tick.cpp", "int b;\nvoid Render()\n{\n}\n")

		const result = await processor.process(TARGET, ["apply"])

		expect(result.actions).toEqual([])
		expect(result.diagnostic?.code).toBe(PatchErrorCode.NO_MATCH_FOUND)
		expect(result.diagnostic?.conflict?.recordIndex).toBe(0)
		expect(result.diagnostic?.conflict?.expected).toEqual(["void Tick()", "{", "\tUpdate();", "}"])
	})

	it("should report malformed guards with their line", async () => {
		const { fileSystem, processor } = setup()
		await fileSystem.writeFile("/engine/Runtime/Tick.cpp", "a\n// MyPlugin: Begin\nb\n")

		const result = await processor.process(TARGET, ["clear"])

		expect(result.diagnostic).toEqual({
			code: PatchErrorCode.MALFORMED_GUARD,
			message: "Malformed guard at line 2 of Runtime/Tick.cpp: 'MyPlugin: Begin' is never closed",
			lineNumber: 2,
		})
	})

	it("should leave the file untouched when applying fails", async () => {
		const { fileSystem, processor } = setup()
		await processor.process(TARGET, ["generate"])
		const changed = "int b;\nvoid Render()\n{\n}\n"
		await fileSystem.writeFile("/engine/Runtime/Tick.cpp", changed)

		await processor.process(TARGET, ["apply"])

		expect(await fileSystem.readFile("/engine/Runtime/Tick.cpp")).toBe(changed)
	})
})

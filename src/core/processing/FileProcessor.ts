import * as path from "path"

import { applyPatch, clearPatch } from "../apply/PatchApplier"
import { PatchErrors } from "../errors"
import type { FuzzyMatcher } from "../matching/FuzzyMatcher"
import { generatePatch } from "../patches/PatchGenerator"
import type { PatchStore } from "../patches/PatchStore"
import type { PatchFileSystem } from "../../utils/file-system"
import type { Logger } from "../../utils/logging"
import { toDiagnostic, type ActionResult, type CoreAction, type FileResult } from "./results"

export interface FileProcessorOptions {
	tag: string
	destinationRoot: string
	patchContext: number
	force: boolean
	fileSystem: PatchFileSystem
	store: PatchStore
	matcher: FuzzyMatcher
	logger: Logger
	now?: () => Date
}

export interface FileTarget {
	targetPath: string
	destinationPath: string
}

/**
 * Runs the requested actions on one file, in order. The first failure stops
 * the file and becomes its diagnostic.
 */
export class FileProcessor {
	constructor(private readonly options: FileProcessorOptions) {}

	async process(target: FileTarget, actions: readonly CoreAction[]): Promise<FileResult> {
		const result: FileResult = { ...target, skipped: false, actions: [] }
		try {
			for (const action of actions) {
				result.actions.push(await this.run(action, target))
			}
		} catch (error) {
			result.diagnostic = toDiagnostic(error)
		}
		return result
	}

	private run(action: CoreAction, target: FileTarget): Promise<ActionResult> {
		switch (action) {
			case "generate":
				return this.generate(target)
			case "clear":
				return this.clear(target)
			case "apply":
				return this.apply(target)
		}
	}

	private destinationFile(target: FileTarget): string {
		return path.join(this.options.destinationRoot, target.destinationPath)
	}

	private async readDestination(target: FileTarget): Promise<string> {
		const filePath = this.destinationFile(target)
		let text: string | undefined
		try {
			text = await this.options.fileSystem.readFile(filePath)
		} catch (error) {
			throw PatchErrors.readFailed(filePath, error instanceof Error ? error : undefined)
		}
		if (text === undefined) {
			throw PatchErrors.fileNotFound(filePath)
		}
		return text
	}

	private async writeDestination(target: FileTarget, text: string): Promise<void> {
		const filePath = this.destinationFile(target)
		try {
			await this.options.fileSystem.writeFile(filePath, text)
		} catch (error) {
			throw PatchErrors.writeFailed(filePath, error instanceof Error ? error : undefined)
		}
	}

	private async generate(target: FileTarget): Promise<ActionResult> {
		const { store, tag, patchContext, force, now } = this.options
		const text = await this.readDestination(target)
		const versionSet = await store.load(target.targetPath)
		const outcome = generatePatch(text, target.targetPath, versionSet, { tag, patchContext, force, now })

		switch (outcome.status) {
			case "no-guards":
				return { action: "generate", status: "no-guards" }
			case "unchanged":
				return { action: "generate", status: "unchanged", versionOrder: outcome.order }
			case "generated":
				await store.saveVersion(target.targetPath, outcome.version)
				await store.removeVersions(target.targetPath, outcome.pruned)
				this.options.logger.info(`generated ${target.targetPath} (version ${outcome.version.order})`)
				return { action: "generate", status: "generated", versionOrder: outcome.version.order }
		}
	}

	private async apply(target: FileTarget): Promise<ActionResult> {
		const { store, tag, matcher } = this.options
		const versionSet = await store.load(target.targetPath)
		if (versionSet.versions.length === 0) {
			return { action: "apply", status: "no-patch" }
		}

		const text = await this.readDestination(target)
		const outcome = applyPatch(text, target.targetPath, versionSet, { tag, matcher })
		if (outcome.status === "already-applied") {
			return { action: "apply", status: "already-applied", versionOrder: outcome.versionOrder }
		}

		await this.writeDestination(target, outcome.text)
		this.options.logger.info(`applied ${target.destinationPath} (version ${outcome.versionOrder})`)
		return { action: "apply", status: "applied", versionOrder: outcome.versionOrder }
	}

	private async clear(target: FileTarget): Promise<ActionResult> {
		const text = await this.readDestination(target)
		const outcome = clearPatch(text, this.options.tag, target.destinationPath)
		if (outcome.status === "already-cleared") {
			return { action: "clear", status: "already-cleared" }
		}

		await this.writeDestination(target, outcome.text)
		this.options.logger.info(`cleared ${target.destinationPath} (${outcome.segments} segments)`)
		return { action: "clear", status: "cleared" }
	}
}

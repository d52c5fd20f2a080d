import * as os from "os"
import * as path from "path"

import { PATCH_DEFAULTS, runOptionsSchema, type PatchAction, type RunOptions, type RunOptionsInput } from "@patchweave/types"

import { isFatalError, PatchErrors } from "../errors"
import { containsTag } from "../guards"
import { FuzzyMatcher } from "../matching/FuzzyMatcher"
import { FilePatchStore } from "../patches/PatchStore"
import { createFactSet, RuleEngine } from "../rules"
import { PathFilterController } from "../../services/path-filter/PathFilterController"
import { NodeFileSystem, SandboxFileSystem, type PatchFileSystem } from "../../utils/file-system"
import { createConsoleLogger, withPrefix, type Logger } from "../../utils/logging"
import { normalizeRelativePath } from "../../utils/path"
import { runWithConcurrency } from "../../utils/pool"
import { FileProcessor, type FileTarget } from "./FileProcessor"
import {
	compareResults,
	formatRunSummary,
	isChanged,
	isFailed,
	summarizeResults,
	type CoreAction,
	type FileResult,
	type RunResult,
} from "./results"

export interface PatchRunnerDependencies {
	fileSystem?: PatchFileSystem
	/** Defaults to a console logger honouring `verbose` */
	logger?: Logger
	now?: () => Date
}

const ACTION_ORDER: readonly CoreAction[] = ["generate", "clear", "apply"]

/**
 * register and unregister place plugin files elsewhere; for the engine they
 * are apply and clear.
 */
export function toCoreActions(actions: readonly PatchAction[]): CoreAction[] {
	const requested = new Set<CoreAction>(
		actions.map((action) => (action === "register" ? "apply" : action === "unregister" ? "clear" : action)),
	)
	return ACTION_ORDER.filter((action) => requested.has(action))
}

/**
 * One invocation: validate options, load the rules, find the files, process
 * them on a bounded pool and report.
 */
export class PatchRunner {
	constructor(private readonly dependencies: PatchRunnerDependencies = {}) {}

	async run(input: RunOptionsInput, signal?: AbortSignal): Promise<RunResult> {
		const options = this.parseOptions(input)
		const logger = withPrefix(
			this.dependencies.logger ?? createConsoleLogger({ verbose: options.verbose }),
			"PatchRunner",
		)

		const sourceRoot = path.resolve(options.sourceRoot)
		const destinationRoot = path.resolve(options.destinationRoot)
		const patchDir = path.resolve(options.patchDir ?? path.join(sourceRoot, PATCH_DEFAULTS.PATCH_DIR_NAME))

		const baseFileSystem = this.dependencies.fileSystem ?? new NodeFileSystem()
		const sandboxRoot = options.dryRun
			? path.resolve(options.dryRunRoot ?? path.join(os.tmpdir(), `patchweave-dry-run-${process.pid}-${Date.now()}`))
			: undefined
		const fileSystem = sandboxRoot
			? new SandboxFileSystem(baseFileSystem, sandboxRoot, {
					source: sourceRoot,
					destination: destinationRoot,
					patches: patchDir,
				})
			: baseFileSystem

		let engine: RuleEngine
		try {
			engine = await this.loadRules(options, sourceRoot, baseFileSystem)
		} catch (error) {
			if (isFatalError(error)) {
				logger.error(error.message)
			}
			throw error
		}
		const variables = engine.variables
		const store = new FilePatchStore(fileSystem, patchDir)
		const actions = toCoreActions(options.actions)
		const filter = new PathFilterController(options.include, options.exclude)

		const targets = await this.discoverTargets(options, actions, engine, store, fileSystem, destinationRoot)
		logger.debug(`${targets.length} candidate files`)

		const processor = new FileProcessor({
			tag: options.tag,
			destinationRoot,
			patchContext: options.patchContext,
			force: options.force,
			fileSystem,
			store,
			matcher: FuzzyMatcher.fromOptions(options),
			logger,
			now: this.dependencies.now,
		})

		const results = await runWithConcurrency(
			targets.filter((targetPath) => filter.isIncluded(targetPath)),
			options.concurrency,
			async (targetPath): Promise<FileResult> => {
				const resolution = engine.evaluate(
					targetPath,
					createFactSet(targetPath, variables, (relativePath) =>
						fileSystem.existsSync(path.join(destinationRoot, relativePath)),
					),
				)
				const target: FileTarget = { targetPath, destinationPath: resolution.destinationPath }
				if (resolution.skip) {
					logger.debug(`skipped ${targetPath}`)
					return { ...target, skipped: true, actions: [] }
				}
				const result = await processor.process(target, actions)
				if (result.diagnostic) {
					logger.error(`${targetPath}: ${result.diagnostic.message}`)
				}
				return result
			},
			signal,
		)

		const files = results.filter((result): result is FileResult => result !== undefined).sort(compareResults)
		const summary = summarizeResults(files)
		const failed = files.some(isFailed)
		if (failed || files.some(isChanged)) {
			logger.info(formatRunSummary(summary))
		}

		return {
			files,
			summary,
			exitCode: failed ? 1 : 0,
			aborted: signal?.aborted ?? false,
			...(sandboxRoot ? { sandboxRoot } : {}),
		}
	}

	private parseOptions(input: RunOptionsInput): RunOptions {
		const parsed = runOptionsSchema.safeParse(input)
		if (!parsed.success) {
			throw PatchErrors.invalidOptions(
				parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`),
			)
		}
		return parsed.data
	}

	/**
	 * A missing default config means no rules; a missing explicit one is an error.
	 */
	private async loadRules(options: RunOptions, sourceRoot: string, fileSystem: PatchFileSystem): Promise<RuleEngine> {
		const configPath = path.resolve(options.configFile ?? path.join(sourceRoot, PATCH_DEFAULTS.CONFIG_FILE_NAME))
		const text = await fileSystem.readFile(configPath)
		if (text === undefined) {
			if (options.configFile) {
				throw PatchErrors.configParse(`config file not found: ${configPath}`, undefined, configPath)
			}
			return RuleEngine.empty(options.defines)
		}
		return RuleEngine.parse(text, { defines: options.defines, path: configPath })
	}

	/**
	 * Stored targets, plus guarded destination files when generating or
	 * clearing. A guarded file that is the destination of a stored target is
	 * covered by that target.
	 */
	private async discoverTargets(
		options: RunOptions,
		actions: readonly CoreAction[],
		engine: RuleEngine,
		store: FilePatchStore,
		fileSystem: PatchFileSystem,
		destinationRoot: string,
	): Promise<string[]> {
		const stored = await store.listTargets()
		const targets = new Set(stored)
		if (!actions.includes("generate") && !actions.includes("clear")) {
			return [...targets].sort()
		}

		const variables = engine.variables
		const covered = new Set(
			stored.map(
				(targetPath) =>
					engine.evaluate(
						targetPath,
						createFactSet(targetPath, variables, (relativePath) =>
							fileSystem.existsSync(path.join(destinationRoot, relativePath)),
						),
					).destinationPath,
			),
		)

		const extensions = new Set(options.extensions.map((extension) => extension.toLowerCase()))
		for (const file of await fileSystem.listFiles(destinationRoot)) {
			if (!extensions.has(path.posix.extname(file).toLowerCase()) || covered.has(file)) {
				continue
			}
			const text = await fileSystem.readFile(path.join(destinationRoot, file))
			if (text !== undefined && containsTag(text, options.tag)) {
				targets.add(normalizeRelativePath(file))
			}
		}
		return [...targets].sort()
	}
}

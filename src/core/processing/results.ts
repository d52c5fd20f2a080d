/**
 * Per-file outcomes of a run
 *
 * Every file is processed independently; its result records what each action
 * did, or the single diagnostic that stopped it. Failures never hide the
 * results of other files.
 */

import { serializeError, type ErrorObject } from "serialize-error"

import type { ConflictReport } from "../conflicts/ConflictReporter"
import { MatchError, PatchError, PatchErrorCode } from "../errors"

export type CoreAction = "generate" | "clear" | "apply"

export type ActionStatus =
	| "generated"
	| "unchanged"
	| "no-guards"
	| "applied"
	| "already-applied"
	| "no-patch"
	| "cleared"
	| "already-cleared"

export interface ActionResult {
	action: CoreAction
	status: ActionStatus
	/** Patch version written or applied */
	versionOrder?: number
}

export interface FileDiagnostic {
	code: string
	message: string
	lineNumber?: number
	conflict?: ConflictReport
	/** Serialized form of an error the engine did not raise itself */
	error?: ErrorObject
}

export interface FileResult {
	/** Path relative to the plugin's patch tree */
	targetPath: string
	/** Path relative to the destination root */
	destinationPath: string
	skipped: boolean
	actions: ActionResult[]
	diagnostic?: FileDiagnostic
}

export interface RunSummary {
	total: number
	changed: number
	unchanged: number
	skipped: number
	failed: number
}

export interface RunResult {
	files: FileResult[]
	summary: RunSummary
	/** 0 iff no file failed */
	exitCode: 0 | 1
	/** Stopped early through the abort signal */
	aborted: boolean
	/** Where dry-run writes went */
	sandboxRoot?: string
}

const CHANGING_STATUSES: ReadonlySet<ActionStatus> = new Set(["generated", "applied", "cleared"])

export function isFailed(result: FileResult): boolean {
	return result.diagnostic !== undefined
}

export function isChanged(result: FileResult): boolean {
	return result.actions.some((action) => CHANGING_STATUSES.has(action.status))
}

/**
 * Diagnostic for anything thrown while processing one file.
 */
export function toDiagnostic(error: unknown): FileDiagnostic {
	if (error instanceof MatchError) {
		return { code: error.code, message: error.message, conflict: error.conflict }
	}
	if (error instanceof PatchError) {
		return {
			code: error.code,
			message: error.message,
			...(error.lineNumber === undefined ? {} : { lineNumber: error.lineNumber }),
		}
	}
	return {
		code: PatchErrorCode.UNEXPECTED_ERROR,
		message: error instanceof Error ? error.message : String(error),
		error: serializeError(error),
	}
}

export function summarizeResults(files: readonly FileResult[]): RunSummary {
	const summary: RunSummary = { total: files.length, changed: 0, unchanged: 0, skipped: 0, failed: 0 }
	for (const file of files) {
		if (isFailed(file)) {
			summary.failed++
		} else if (file.skipped) {
			summary.skipped++
		} else if (isChanged(file)) {
			summary.changed++
		} else {
			summary.unchanged++
		}
	}
	return summary
}

export function formatRunSummary(summary: RunSummary): string {
	const parts = [`${summary.changed} changed`, `${summary.unchanged} unchanged`]
	if (summary.skipped > 0) {
		parts.push(`${summary.skipped} skipped`)
	}
	parts.push(`${summary.failed} failed`)
	return `${summary.total} files: ${parts.join(", ")}`
}

export function compareResults(a: FileResult, b: FileResult): number {
	return a.targetPath < b.targetPath ? -1 : a.targetPath > b.targetPath ? 1 : 0
}

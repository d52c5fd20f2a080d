/**
 * Error types for guard parsing, matching, applying, rule configs and patch storage.
 * Every error carries a stable code so callers can branch on it and report it.
 */

import { BaseError } from "@patchweave/types"

import type { ConflictReport } from "../conflicts/ConflictReporter"

export enum PatchErrorCode {
	// Guard errors
	MALFORMED_GUARD = "MALFORMED_GUARD",

	// Matching errors
	NO_MATCH_FOUND = "NO_MATCH_FOUND",
	OVERLAPPING_MATCHES = "OVERLAPPING_MATCHES",

	// Apply/clear errors
	SEGMENT_APPLY_FAILED = "SEGMENT_APPLY_FAILED",
	SEGMENT_CLEAR_FAILED = "SEGMENT_CLEAR_FAILED",
	UNRECORDED_SEGMENT = "UNRECORDED_SEGMENT",

	// Config errors
	CONFIG_PARSE_ERROR = "CONFIG_PARSE_ERROR",
	UNKNOWN_RULE_KEY = "UNKNOWN_RULE_KEY",
	UNKNOWN_PREDICATE = "UNKNOWN_PREDICATE",
	VARIABLE_UNDEFINED = "VARIABLE_UNDEFINED",
	VARIABLE_CYCLE = "VARIABLE_CYCLE",
	MISSING_REMAP_TARGET = "MISSING_REMAP_TARGET",

	// Storage and file errors
	INVALID_PATCH_ARTIFACT = "INVALID_PATCH_ARTIFACT",
	FILE_NOT_FOUND = "FILE_NOT_FOUND",
	READ_FAILED = "READ_FAILED",
	WRITE_FAILED = "WRITE_FAILED",

	// Path validation errors
	INVALID_PATH = "INVALID_PATH",
	PATH_TRAVERSAL_DETECTED = "PATH_TRAVERSAL_DETECTED",

	// System errors
	INVALID_OPTIONS = "INVALID_OPTIONS",
	UNEXPECTED_ERROR = "UNEXPECTED_ERROR",
}

/**
 * Base error class for engine errors.
 */
export class PatchError extends BaseError {
	constructor(
		public readonly code: PatchErrorCode,
		message: string,
		public readonly path?: string,
		public readonly lineNumber?: number,
		details?: Record<string, unknown>,
	) {
		super(message, code, details)
	}

	override toObject(): Record<string, unknown> {
		return {
			...super.toObject(),
			path: this.path,
			lineNumber: this.lineNumber,
		}
	}
}

/**
 * Unmatched or nested guard markers. Line numbers are 1-based.
 */
export class GuardParseError extends PatchError {
	constructor(message: string, lineNumber: number, path?: string) {
		super(PatchErrorCode.MALFORMED_GUARD, message, path, lineNumber)
	}
}

/**
 * No stored version clears the content tolerance.
 */
export class MatchError extends PatchError {
	constructor(
		message: string,
		path: string,
		public readonly conflict: ConflictReport,
	) {
		super(PatchErrorCode.NO_MATCH_FOUND, message, path, undefined, {
			recordIndex: conflict.recordIndex,
			nearMiss: conflict.nearMiss,
		})
	}
}

/**
 * A segment could not be applied or cleared; the file is left untouched.
 */
export class ApplyError extends PatchError {
	constructor(
		message: string,
		code: PatchErrorCode,
		path?: string,
		details?: Record<string, unknown>,
		lineNumber?: number,
	) {
		super(code, message, path, lineNumber, details)
	}
}

/**
 * Rule config could not be parsed. Always fatal for a run.
 */
export class ConfigError extends PatchError {
	constructor(message: string, code: PatchErrorCode = PatchErrorCode.CONFIG_PARSE_ERROR, lineNumber?: number, path?: string) {
		super(code, message, path, lineNumber)
	}
}

/**
 * Reading or writing patch artifacts and target files.
 */
export class StorageError extends PatchError {
	constructor(message: string, code: PatchErrorCode, path?: string, details?: Record<string, unknown>) {
		super(code, message, path, undefined, details)
	}
}

// Convenience factory functions for common errors
export const PatchErrors = {
	// Guard errors
	malformedGuard: (reason: string, lineNumber: number, path?: string) =>
		new GuardParseError(`Malformed guard at line ${lineNumber}${path ? ` of ${path}` : ""}: ${reason}`, lineNumber, path),

	// Matching errors
	noMatchFound: (path: string, conflict: ConflictReport) =>
		new MatchError(
			`No stored patch version matches ${path} (record ${conflict.recordIndex + 1} of version ${conflict.versionOrder})`,
			path,
			conflict,
		),

	overlappingMatches: (path: string, first: number, second: number) =>
		new ApplyError(
			`Segments ${first + 1} and ${second + 1} overlap in ${path}`,
			PatchErrorCode.OVERLAPPING_MATCHES,
			path,
			{ first, second },
		),

	segmentApplyFailed: (path: string, recordIndex: number, reason: string) =>
		new ApplyError(
			`Failed to apply segment ${recordIndex + 1} to ${path}: ${reason}`,
			PatchErrorCode.SEGMENT_APPLY_FAILED,
			path,
			{ recordIndex },
		),

	segmentClearFailed: (path: string, segmentIndex: number, reason: string) =>
		new ApplyError(
			`Failed to clear segment ${segmentIndex + 1} in ${path}: ${reason}`,
			PatchErrorCode.SEGMENT_CLEAR_FAILED,
			path,
			{ segmentIndex },
		),

	unrecordedSegment: (path: string, lineNumber: number, recordIndex: number) =>
		new ApplyError(
			`Guarded code at line ${lineNumber} of ${path} is in no stored patch version and collides with segment ${recordIndex + 1}; generate or clear it first`,
			PatchErrorCode.UNRECORDED_SEGMENT,
			path,
			{ recordIndex },
			lineNumber,
		),

	// Config errors
	configParse: (reason: string, lineNumber?: number, path?: string) =>
		new ConfigError(
			lineNumber === undefined ? reason : `${reason} (line ${lineNumber})`,
			PatchErrorCode.CONFIG_PARSE_ERROR,
			lineNumber,
			path,
		),

	unknownRuleKey: (key: string, lineNumber: number, path?: string) =>
		new ConfigError(`Unknown rule key '${key}' (line ${lineNumber})`, PatchErrorCode.UNKNOWN_RULE_KEY, lineNumber, path),

	unknownPredicate: (name: string, lineNumber: number, path?: string) =>
		new ConfigError(`Unknown predicate '${name}' (line ${lineNumber})`, PatchErrorCode.UNKNOWN_PREDICATE, lineNumber, path),

	variableUndefined: (name: string, lineNumber?: number, path?: string) =>
		new ConfigError(
			`Variable '${name}' is not defined${lineNumber === undefined ? "" : ` (line ${lineNumber})`}`,
			PatchErrorCode.VARIABLE_UNDEFINED,
			lineNumber,
			path,
		),

	variableCycle: (chain: string[]) =>
		new ConfigError(`Variables reference each other in a cycle: ${chain.join(" -> ")}`, PatchErrorCode.VARIABLE_CYCLE),

	missingRemapTarget: (scope: string, lineNumber: number, path?: string) =>
		new ConfigError(
			`RemapIf in scope '${scope}' has no RemapTarget (line ${lineNumber})`,
			PatchErrorCode.MISSING_REMAP_TARGET,
			lineNumber,
			path,
		),

	// Storage and file errors
	invalidPatchArtifact: (path: string, reason: string) =>
		new StorageError(`Invalid patch artifact ${path}: ${reason}`, PatchErrorCode.INVALID_PATCH_ARTIFACT, path),

	fileNotFound: (path: string) => new StorageError(`File not found: ${path}`, PatchErrorCode.FILE_NOT_FOUND, path),

	readFailed: (path: string, error?: Error) =>
		new StorageError(`Failed to read file: ${path}`, PatchErrorCode.READ_FAILED, path, {
			originalError: error?.message,
		}),

	writeFailed: (path: string, error?: Error) =>
		new StorageError(`Failed to write file: ${path}`, PatchErrorCode.WRITE_FAILED, path, {
			originalError: error?.message,
		}),

	// Path validation errors
	invalidPath: (path: string, reason: string) =>
		new PatchError(PatchErrorCode.INVALID_PATH, `Invalid path '${path}': ${reason}`, path),

	pathTraversalDetected: (path: string) =>
		new PatchError(PatchErrorCode.PATH_TRAVERSAL_DETECTED, `Path '${path}' leaves its root`, path),

	// System errors
	invalidOptions: (issues: string[]) =>
		new PatchError(PatchErrorCode.INVALID_OPTIONS, `Invalid options: ${issues.join("; ")}`, undefined, undefined, { issues }),
} as const

/**
 * Config errors abort the whole run; everything else is reported per file.
 */
export function isFatalError(error: unknown): error is PatchError {
	return error instanceof ConfigError || (error instanceof PatchError && error.code === PatchErrorCode.INVALID_OPTIONS)
}

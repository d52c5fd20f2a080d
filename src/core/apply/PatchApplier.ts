import type { PatchVersionSet, Segment } from "@patchweave/types"

import { joinDocument, splitDocument, withLines } from "../../utils/document"
import { buildConflictReport } from "../conflicts/ConflictReporter"
import { PatchErrors } from "../errors"
import { buildStockView, parseGuards, renderGuarded } from "../guards"
import type { FuzzyMatcher, RecordMatch } from "../matching/FuzzyMatcher"

export interface ApplyOptions {
	tag: string
	matcher: FuzzyMatcher
}

export type ApplyOutcome =
	| { status: "applied"; text: string; versionOrder: number; score: number }
	| { status: "already-applied"; versionOrder: number }

export type ClearOutcome = { status: "cleared"; text: string; segments: number } | { status: "already-cleared" }

function renderMatch(tag: string, match: RecordMatch): string[] {
	const { record } = match
	const guarded = renderGuarded(
		tag,
		{ kind: record.kind, style: record.style, indent: record.indent, comment: record.comment },
		record.body,
	)
	if (!record.replacement) {
		return guarded
	}
	const { replacement } = record
	return [
		...guarded,
		...renderGuarded(
			tag,
			{ kind: "addition", style: replacement.style, indent: replacement.indent, comment: replacement.comment },
			replacement.lines,
		),
	]
}

function sameLines(a: readonly string[], b: readonly string[] | undefined): boolean {
	return b !== undefined && a.length === b.length && a.every((line, index) => line === b[index])
}

/**
 * Whether some stored record (or its replacement) would render this segment.
 */
function isRecorded(segment: Segment, versionSet: PatchVersionSet): boolean {
	const lines = segment.kind === "deletion" ? segment.restorable : segment.body
	return versionSet.versions.some((version) =>
		version.records.some((record) => {
			const own =
				record.kind === segment.kind &&
				record.style === segment.style &&
				record.indent === segment.indent &&
				record.comment === segment.comment &&
				sameLines(record.body, lines)
			const { replacement } = record
			return (
				own ||
				(replacement !== undefined &&
					segment.kind === "addition" &&
					replacement.style === segment.style &&
					replacement.indent === segment.indent &&
					replacement.comment === segment.comment &&
					sameLines(replacement.lines, lines))
			)
		}),
	)
}

interface StockEdit {
	/** Position in the stock view */
	position: number
	/** Stock lines the edit takes the place of */
	removed: number
	lines: string[]
}

function assertNoOverlap(targetPath: string, matches: readonly RecordMatch[]): void {
	for (let i = 1; i < matches.length; i++) {
		const previous = matches[i - 1]
		const previousEnd = previous.position + (previous.record.kind === "deletion" ? previous.record.body.length : 0)
		if (matches[i].position < previousEnd) {
			throw PatchErrors.overlappingMatches(targetPath, i - 1, i)
		}
	}
}

/**
 * A kept segment may not share a position with a record, sit inside the stock
 * lines a record comments out, or trail a record that brings a replacement.
 */
function collides(kept: StockEdit, match: RecordMatch): boolean {
	const end = match.position + (match.record.kind === "deletion" ? match.record.body.length : 0)
	const keptEnd = kept.position + kept.removed
	if (kept.position === match.position) {
		return true
	}
	if (kept.position < end && match.position < keptEnd) {
		return true
	}
	return match.record.replacement !== undefined && kept.position === end
}

/**
 * Bring a target file to the best matching stored version of its patch.
 *
 * Segments of the tag that some stored record accounts for are re-rendered from
 * the selected version. Any other segment is kept where it is; one that collides
 * with a selected record fails the whole file. Nothing is written here.
 */
export function applyPatch(
	text: string,
	targetPath: string,
	versionSet: PatchVersionSet,
	options: ApplyOptions,
): ApplyOutcome {
	const document = splitDocument(text)
	const segments = parseGuards(document.lines, options.tag, targetPath)
	const view = buildStockView(document.lines, segments)
	const stock = view.lines

	const selection = options.matcher.selectVersion(stock, versionSet)
	if (selection.status === "empty") {
		throw PatchErrors.invalidPatchArtifact(targetPath, "no stored patch versions")
	}
	if (selection.status === "no-match") {
		throw PatchErrors.noMatchFound(targetPath, buildConflictReport(targetPath, text, stock, selection.failure))
	}

	const { match } = selection
	assertNoOverlap(targetPath, match.matches)

	const edits: StockEdit[] = []
	segments.forEach((segment, index) => {
		if (isRecorded(segment, versionSet)) {
			return
		}
		const kept: StockEdit = {
			position: view.positions[index] ?? 0,
			removed: segment.kind === "deletion" ? (segment.restorable ?? []).length : 0,
			lines: document.lines.slice(segment.startLine, segment.endLine + 1),
		}
		const recordIndex = match.matches.findIndex((recordMatch) => collides(kept, recordMatch))
		if (recordIndex !== -1) {
			throw PatchErrors.unrecordedSegment(targetPath, segment.startLine + 1, recordIndex)
		}
		edits.push(kept)
	})

	match.matches.forEach((recordMatch, index) => {
		let rendered: string[]
		try {
			rendered = renderMatch(options.tag, recordMatch)
		} catch (error) {
			throw PatchErrors.segmentApplyFailed(targetPath, index, error instanceof Error ? error.message : String(error))
		}
		edits.push({
			position: recordMatch.position,
			removed: recordMatch.record.kind === "deletion" ? recordMatch.record.body.length : 0,
			lines: rendered,
		})
	})

	// Bottom-up so earlier positions stay valid
	const ordered = [...edits].sort((a, b) => a.position - b.position)
	const lines = [...stock]
	for (let index = ordered.length - 1; index >= 0; index--) {
		const edit = ordered[index]
		lines.splice(edit.position, edit.removed, ...edit.lines)
	}

	const patched = joinDocument(withLines(document, lines))
	if (patched === text) {
		return { status: "already-applied", versionOrder: match.version.order }
	}
	return { status: "applied", text: patched, versionOrder: match.version.order, score: match.score }
}

/**
 * Stock lines of a guarded buffer: additions removed, deletions restored.
 */
export function clearSegments(lines: readonly string[], segments: readonly Segment[], targetPath?: string): string[] {
	segments.forEach((segment, index) => {
		if (segment.kind === "deletion" && segment.restorable === undefined) {
			throw PatchErrors.segmentClearFailed(targetPath ?? "<buffer>", index, "deletion has no restorable lines")
		}
	})
	return buildStockView(lines, segments).lines
}

/**
 * Remove every segment of the tag, restoring the stock text byte for byte.
 */
export function clearPatch(text: string, tag: string, targetPath?: string): ClearOutcome {
	const document = splitDocument(text)
	const segments = parseGuards(document.lines, tag, targetPath)
	if (segments.length === 0) {
		return { status: "already-cleared" }
	}
	return {
		status: "cleared",
		text: joinDocument(withLines(document, clearSegments(document.lines, segments, targetPath))),
		segments: segments.length,
	}
}

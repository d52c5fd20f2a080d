import { structuredPatch, type Hunk } from "diff"

import type { PatchRecord, SegmentKind } from "@patchweave/types"

import type { VersionFailure } from "../matching/FuzzyMatcher"

export interface NearMiss {
	/** Position in the stock view */
	position: number
	score: number
	/** 1-based line in the stock view */
	line: number
}

/**
 * Everything needed to show why a stored record found no home in the target.
 */
export interface ConflictReport {
	targetPath: string
	targetText: string
	versionOrder: number
	recordIndex: number
	recordId: string
	kind: SegmentKind
	precedingContext: string[]
	body: string[]
	followingContext: string[]
	nearMiss: NearMiss | null
	/** Stock text the record expects: preceding context, deletion body, following context */
	expected: string[]
	/** Target lines in the same window around the near miss */
	actual: string[]
	hunks: Hunk[]
}

function expectedWindow(record: PatchRecord): string[] {
	return [
		...record.precedingContext,
		...(record.kind === "deletion" ? record.body : []),
		...record.followingContext,
	]
}

function actualWindow(lines: readonly string[], record: PatchRecord, position: number): string[] {
	const start = Math.max(0, position - record.precedingContext.length)
	const end = position + (record.kind === "deletion" ? record.body.length : 0) + record.followingContext.length
	return lines.slice(start, end)
}

const toDiffText = (lines: readonly string[]) => (lines.length === 0 ? "" : `${lines.join("\n")}\n`)

export function buildConflictReport(
	targetPath: string,
	targetText: string,
	stockLines: readonly string[],
	failure: VersionFailure,
): ConflictReport {
	const { record, nearMiss } = failure
	const expected = expectedWindow(record)
	const actual = nearMiss ? actualWindow(stockLines, record, nearMiss.position) : []
	const { hunks } = structuredPatch(
		`expected/${targetPath}`,
		`actual/${targetPath}`,
		toDiffText(expected),
		toDiffText(actual),
		"",
		"",
		{ context: 3 },
	)

	return {
		targetPath,
		targetText,
		versionOrder: failure.version.order,
		recordIndex: failure.recordIndex,
		recordId: record.id,
		kind: record.kind,
		precedingContext: [...record.precedingContext],
		body: [...record.body],
		followingContext: [...record.followingContext],
		nearMiss: nearMiss ? { position: nearMiss.position, score: nearMiss.score, line: nearMiss.position + 1 } : null,
		expected,
		actual,
		hunks,
	}
}

/**
 * One line for logs.
 */
export function formatConflictSummary(report: ConflictReport): string {
	const head = `${report.targetPath}: ${report.kind} ${report.recordIndex + 1} of version ${report.versionOrder} has no match`
	if (!report.nearMiss) {
		return `${head} (no candidate position)`
	}
	const changed = report.hunks.reduce(
		(count, hunk) => count + hunk.lines.filter((line) => line.startsWith("+") || line.startsWith("-")).length,
		0,
	)
	return `${head} (closest at line ${report.nearMiss.line}, score ${report.nearMiss.score.toFixed(2)}, ${changed} differing lines)`
}

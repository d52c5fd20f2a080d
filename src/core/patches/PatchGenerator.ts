import { createHash } from "crypto"

import type { PatchRecord, PatchReplacement, PatchVersion, PatchVersionSet, Segment } from "@patchweave/types"

import { splitDocument } from "../../utils/document"
import { buildStockView, parseGuards } from "../guards"

export interface GenerateOptions {
	tag: string
	patchContext: number
	/** Replace every stored version instead of appending */
	force?: boolean
	now?: () => Date
}

export type GenerateOutcome =
	| { status: "no-guards" }
	| { status: "unchanged"; order: number }
	| { status: "generated"; version: PatchVersion; versionSet: PatchVersionSet; pruned: number[] }

/**
 * Content hash of everything that makes two records the same change.
 */
export function computeRecordId(record: Omit<PatchRecord, "id" | "targetPath" | "originalLine">): string {
	const payload = JSON.stringify([
		record.kind,
		record.style,
		record.indent,
		record.comment,
		record.precedingContext,
		record.followingContext,
		record.body,
		record.replacement ?? null,
	])
	return createHash("sha256").update(payload).digest("hex").slice(0, 16)
}

/**
 * Turn the segments of a live file into records, in file order.
 *
 * A deletion directly followed by an addition (no line in between) becomes one
 * deletion record whose replacement is the addition. Context windows stop at
 * the file boundary and at the guards of neighbouring segments.
 */
export function buildPatchRecords(
	lines: readonly string[],
	segments: readonly Segment[],
	targetPath: string,
	patchContext: number,
): PatchRecord[] {
	const stock = buildStockView(lines, segments)
	const records: PatchRecord[] = []

	for (let i = 0; i < segments.length; i++) {
		const segment = segments[i]
		const next = segments[i + 1]
		const folded =
			segment.kind === "deletion" && next !== undefined && next.kind === "addition" && next.startLine === segment.endLine + 1
				? next
				: undefined
		const last = folded ?? segment
		const lastIndex = folded ? i + 1 : i

		const previousEnd = i > 0 ? segments[i - 1].endLine + 1 : 0
		const nextStart = lastIndex + 1 < segments.length ? segments[lastIndex + 1].startLine : lines.length

		const precedingContext = lines.slice(Math.max(previousEnd, segment.startLine - patchContext), segment.startLine)
		const followingContext = lines.slice(last.endLine + 1, Math.min(nextStart, last.endLine + 1 + patchContext))

		const replacement: PatchReplacement | undefined = folded
			? { style: folded.style, indent: folded.indent, comment: folded.comment, lines: [...folded.body] }
			: undefined

		const content = {
			kind: segment.kind,
			style: segment.style,
			indent: segment.indent,
			comment: segment.comment,
			precedingContext,
			followingContext,
			body: segment.kind === "deletion" ? [...(segment.restorable ?? [])] : [...segment.body],
			...(replacement ? { replacement } : {}),
		}

		records.push({
			id: computeRecordId(content),
			targetPath,
			...content,
			originalLine: stock.positions[i] ?? 0,
		})

		i = lastIndex
	}

	return records
}

function sameRecords(a: readonly PatchRecord[], b: readonly PatchRecord[]): boolean {
	return a.length === b.length && a.every((record, index) => record.id === b[index]?.id)
}

/**
 * Derive a new patch version from a live, guard-annotated file.
 * Pure: persisting the outcome is up to the caller.
 */
export function generatePatch(
	text: string,
	targetPath: string,
	versionSet: PatchVersionSet,
	options: GenerateOptions,
): GenerateOutcome {
	const { lines } = splitDocument(text)
	const segments = parseGuards(lines, options.tag, targetPath)
	if (segments.length === 0) {
		return { status: "no-guards" }
	}

	const records = buildPatchRecords(lines, segments, targetPath, options.patchContext)

	const existing = options.force
		? versionSet.versions.length === 1
			? versionSet.versions[0]
			: undefined
		: versionSet.versions.find((version) => sameRecords(version.records, records))
	if (existing && sameRecords(existing.records, records)) {
		return { status: "unchanged", order: existing.order }
	}

	const order = versionSet.versions.reduce((max, version) => Math.max(max, version.order), 0) + 1
	const version: PatchVersion = {
		order,
		createdAt: (options.now?.() ?? new Date()).toISOString(),
		records,
	}

	const pruned = options.force ? versionSet.versions.map((stored) => stored.order) : []
	const kept = options.force ? [] : versionSet.versions

	return {
		status: "generated",
		version,
		versionSet: { targetPath, versions: [...kept, version] },
		pruned,
	}
}

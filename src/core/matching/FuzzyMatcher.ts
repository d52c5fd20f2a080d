import type { LineComparatorName, MatchOptions, PatchRecord, PatchVersion, PatchVersionSet } from "@patchweave/types"

import { getLineComparator, type LineComparator } from "./line-comparators"

/**
 * Absorbs float noise so that e.g. 5/10 still clears a tolerance of 0.5.
 */
const SCORE_EPSILON = 1e-9

export interface MatcherSettings {
	contentTolerance: number
	lineTolerance: number
	comparator: LineComparator
}

export interface Candidate {
	/** Insertion point (addition) or first stock line (deletion) in the stock view */
	position: number
	score: number
	/** Distance from the record's original line */
	distance: number
}

export interface RecordLocation {
	/** Best qualifying candidate */
	best?: Candidate
	/** Best candidate overall, for diagnostics */
	nearMiss?: Candidate
}

export interface RecordMatch extends Candidate {
	record: PatchRecord
}

export interface VersionMatch {
	version: PatchVersion
	matches: RecordMatch[]
	/** Mean of the record scores */
	score: number
	distance: number
}

export interface VersionFailure {
	version: PatchVersion
	recordIndex: number
	record: PatchRecord
	nearMiss?: Candidate
}

export type VersionSelection =
	| { status: "matched"; match: VersionMatch }
	| { status: "no-match"; failure: VersionFailure }
	| { status: "empty" }

function isBetter(candidate: Candidate, current: Candidate | undefined): boolean {
	if (!current) {
		return true
	}
	if (candidate.score !== current.score) {
		return candidate.score > current.score
	}
	if (candidate.distance !== current.distance) {
		return candidate.distance < current.distance
	}
	return candidate.position < current.position
}

function bodyPresentAt(lines: readonly string[], position: number, body: readonly string[]): boolean {
	return body.every((line, offset) => lines[position + offset] === line)
}

/**
 * Locates stored records in the stock view of a target file and picks the
 * version that fits it best. Purely line based.
 */
export class FuzzyMatcher {
	constructor(private readonly settings: MatcherSettings) {}

	static fromOptions(options: Pick<MatchOptions, "contentTolerance" | "lineTolerance"> & { lineComparator: LineComparatorName }) {
		return new FuzzyMatcher({
			contentTolerance: options.contentTolerance,
			lineTolerance: options.lineTolerance,
			comparator: getLineComparator(options.lineComparator),
		})
	}

	/**
	 * Agreement between the record's context windows and the lines around `position`.
	 * Lines outside the file count as mismatches; no context at all scores 1.
	 */
	scoreAt(lines: readonly string[], position: number, record: PatchRecord): number {
		const preceding = record.precedingContext
		const following = record.followingContext
		const total = preceding.length + following.length
		if (total === 0) {
			return 1
		}

		const { comparator } = this.settings
		let sum = 0

		for (let i = 0; i < preceding.length; i++) {
			const actual = lines[position - preceding.length + i]
			if (actual !== undefined) {
				sum += comparator(preceding[i], actual)
			}
		}

		const followingStart = position + (record.kind === "deletion" ? record.body.length : 0)
		for (let i = 0; i < following.length; i++) {
			const actual = lines[followingStart + i]
			if (actual !== undefined) {
				sum += comparator(following[i], actual)
			}
		}

		return sum / total
	}

	qualifies(score: number): boolean {
		return score + SCORE_EPSILON >= 1 - this.settings.contentTolerance
	}

	/**
	 * Best position for one record at or after `from`. Deletions only qualify
	 * where their stock lines are present verbatim.
	 */
	locateRecord(lines: readonly string[], record: PatchRecord, from = 0): RecordLocation {
		const lastPosition = record.kind === "deletion" ? lines.length - record.body.length : lines.length
		let best: Candidate | undefined
		let nearMiss: Candidate | undefined

		for (let position = from; position <= lastPosition; position++) {
			const candidate: Candidate = {
				position,
				score: this.scoreAt(lines, position, record),
				distance: Math.abs(position - record.originalLine),
			}
			if (isBetter(candidate, nearMiss)) {
				nearMiss = candidate
			}

			if (candidate.distance > this.settings.lineTolerance) {
				continue
			}
			if (record.kind === "deletion" && !bodyPresentAt(lines, position, record.body)) {
				continue
			}
			if (this.qualifies(candidate.score) && isBetter(candidate, best)) {
				best = candidate
			}
		}

		return best ? { best } : { nearMiss }
	}

	/**
	 * Locate every record of a version in order. Each record is searched only
	 * after the previous match, so matches never overlap.
	 */
	matchVersion(lines: readonly string[], version: PatchVersion): VersionMatch | VersionFailure {
		const matches: RecordMatch[] = []
		let from = 0

		for (let recordIndex = 0; recordIndex < version.records.length; recordIndex++) {
			const record = version.records[recordIndex]
			const location = this.locateRecord(lines, record, from)
			if (!location.best) {
				return { version, recordIndex, record, nearMiss: location.nearMiss }
			}
			matches.push({ record, ...location.best })
			from = location.best.position + (record.kind === "deletion" ? record.body.length : 0)
		}

		const score = matches.length === 0 ? 1 : matches.reduce((sum, match) => sum + match.score, 0) / matches.length
		const distance = matches.reduce((sum, match) => sum + match.distance, 0)
		return { version, matches, score, distance }
	}

	/**
	 * Try every version from newest to oldest. The highest score wins and equal
	 * scores go to the newest version.
	 */
	selectVersion(lines: readonly string[], versionSet: PatchVersionSet): VersionSelection {
		const newestFirst = [...versionSet.versions].sort((a, b) => b.order - a.order)
		if (newestFirst.length === 0) {
			return { status: "empty" }
		}

		let selected: VersionMatch | undefined
		let newestFailure: VersionFailure | undefined

		for (const version of newestFirst) {
			const result = this.matchVersion(lines, version)
			if ("recordIndex" in result) {
				newestFailure ??= result
				continue
			}
			// Iteration is newest first, so equal scores keep the newer version
			if (!selected || result.score > selected.score + SCORE_EPSILON) {
				selected = result
			}
		}

		if (selected) {
			return { status: "matched", match: selected }
		}
		if (!newestFailure) {
			throw new Error("version selection ended without a match or a failure")
		}
		return { status: "no-match", failure: newestFailure }
	}
}

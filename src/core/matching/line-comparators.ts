import { distance } from "fastest-levenshtein"

import type { LineComparatorName } from "@patchweave/types"

/**
 * Similarity of a recorded context line and a target line, in [0, 1].
 */
export type LineComparator = (expected: string, actual: string) => number

const normalizeWhitespace = (line: string) => line.replace(/\s+/g, " ").trim()

export const exactLineComparator: LineComparator = (expected, actual) => (expected === actual ? 1 : 0)

export const trimmedLineComparator: LineComparator = (expected, actual) =>
	normalizeWhitespace(expected) === normalizeWhitespace(actual) ? 1 : 0

/**
 * Normalized Levenshtein similarity after collapsing whitespace.
 */
export const levenshteinLineComparator: LineComparator = (expected, actual) => {
	const a = normalizeWhitespace(expected)
	const b = normalizeWhitespace(actual)
	if (a === b) {
		return 1
	}
	const maxLength = Math.max(a.length, b.length)
	if (maxLength === 0) {
		return 1
	}
	return 1 - distance(a, b) / maxLength
}

const LINE_COMPARATORS: Record<LineComparatorName, LineComparator> = {
	exact: exactLineComparator,
	trimmed: trimmedLineComparator,
	levenshtein: levenshteinLineComparator,
}

export function getLineComparator(name: LineComparatorName): LineComparator {
	return LINE_COMPARATORS[name]
}

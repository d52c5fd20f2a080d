import type { GuardStyle, SegmentKind } from "@patchweave/types"

/**
 * Classification of a single line against one guard tag.
 */
export type GuardLine =
	| { type: "none" }
	| { type: "begin"; indent: string; deletion: boolean; comment: string }
	| { type: "end"; indent: string }
	| { type: "next-line"; indent: string; deletion: boolean; comment: string }
	| { type: "single-line"; code: string; deletion: boolean; comment: string }

/**
 * What is needed to rebuild a guard wrapper.
 */
export interface GuardShape {
	kind: SegmentKind
	style: GuardStyle
	indent: string
	comment: string
}

const BEGIN_SUFFIX = /^([\s\S]*?):\s*Begin\s*$/
const END_SUFFIX = /^[\s\S]*?:\s*End\s*$/
const COMMENTED_LINE = /^(\s*)\/\/ ([\s\S]*)$/

function escapeRegExp(value: string): string {
	return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

/**
 * `//`, optional blanks, the tag, then either the deletion marker or a boundary.
 */
function markerPattern(tag: string, flags: string): RegExp {
	return new RegExp(`//[ \\t]*${escapeRegExp(tag)}(?:(-)|(?=[\\s:]|$))`, flags)
}

export function createGuardClassifier(tag: string): (line: string) => GuardLine {
	const marker = markerPattern(tag, "g")

	return (line: string): GuardLine => {
		const matches = [...line.matchAll(marker)]
		const first = matches[0]
		if (!first || first.index === undefined) {
			return { type: "none" }
		}

		const firstPrefix = line.slice(0, first.index)
		if (firstPrefix.trim() === "") {
			const deletion = first[1] === "-"
			const rest = line.slice(first.index + first[0].length)
			if (END_SUFFIX.test(rest)) {
				return { type: "end", indent: firstPrefix }
			}
			const begin = BEGIN_SUFFIX.exec(rest)
			if (begin) {
				return { type: "begin", indent: firstPrefix, deletion, comment: begin[1] ?? "" }
			}
			return { type: "next-line", indent: firstPrefix, deletion, comment: rest }
		}

		// Trailing guard: the last marker on the line wins
		const last = matches[matches.length - 1]
		if (!last || last.index === undefined) {
			return { type: "none" }
		}
		const prefix = line.slice(0, last.index)
		return {
			type: "single-line",
			code: prefix.endsWith(" ") ? prefix.slice(0, -1) : prefix,
			deletion: last[1] === "-",
			comment: line.slice(last.index + last[0].length),
		}
	}
}

/**
 * Cheap pre-filter before a full parse.
 */
export function containsTag(text: string, tag: string): boolean {
	return markerPattern(tag, "").test(text)
}

/**
 * Comment out a stock line: `// ` goes after the leading whitespace.
 * Whitespace-only lines are kept as they are.
 */
export function commentOutLine(line: string): string {
	if (line.trim() === "") {
		return line
	}
	const indent = /^\s*/.exec(line)?.[0] ?? ""
	return `${indent}// ${line.slice(indent.length)}`
}

/**
 * Inverse of {@link commentOutLine}; `undefined` when the line is live code.
 */
export function uncommentLine(line: string): string | undefined {
	if (line.trim() === "") {
		return line
	}
	const match = COMMENTED_LINE.exec(line)
	if (!match) {
		return undefined
	}
	return `${match[1] ?? ""}${match[2] ?? ""}`
}

/**
 * Build the guarded lines for a segment. For a deletion `lines` are the stock
 * lines, which get commented out; for an addition they are inserted verbatim.
 */
export function renderGuarded(tag: string, shape: GuardShape, lines: string[]): string[] {
	const marker = `${tag}${shape.kind === "deletion" ? "-" : ""}${shape.comment}`
	const body = shape.kind === "deletion" ? lines.map(commentOutLine) : lines

	switch (shape.style) {
		case "block":
			return [`${shape.indent}// ${marker}: Begin`, ...body, `${shape.indent}// ${tag}: End`]
		case "single-line": {
			const code = body[0]
			if (body.length !== 1 || code === undefined || code.trim() === "") {
				throw new Error("a single-line guard needs exactly one non-blank code line")
			}
			return [`${code} // ${marker}`]
		}
		case "next-line": {
			const code = body[0]
			if (body.length !== 1 || code === undefined || code.trim() === "") {
				throw new Error("a next-line guard needs exactly one non-blank code line")
			}
			return [`${shape.indent}// ${marker}`, code]
		}
	}
}

import type { Segment } from "@patchweave/types"

import { PatchErrors } from "../errors"
import { createGuardClassifier, uncommentLine, type GuardLine } from "./guard-syntax"

enum ParserState {
	Outside = "outside",
	InBlock = "in-block",
}

interface OpenBlock {
	startLine: number
	indent: string
	deletion: boolean
	comment: string
	body: string[]
	restorable: string[]
}

/**
 * Finds the guarded segments of one plugin tag in a buffer.
 *
 * Block guards move the parser between `Outside` and `InBlock`; single-line and
 * next-line guards are consumed without leaving `Outside`. Any inconsistency
 * raises a GuardParseError carrying the 1-based line number.
 */
export class GuardParser {
	private readonly classify: (line: string) => GuardLine

	constructor(readonly tag: string) {
		this.classify = createGuardClassifier(tag)
	}

	parse(lines: readonly string[], path?: string): Segment[] {
		const segments: Segment[] = []
		let state = ParserState.Outside
		let open: OpenBlock | undefined

		const fail = (reason: string, index: number): never => {
			throw PatchErrors.malformedGuard(reason, index + 1, path)
		}

		for (let i = 0; i < lines.length; i++) {
			const line = lines[i]
			const guard = this.classify(line)

			switch (state) {
				case ParserState.Outside: {
					if (guard.type === "none") {
						break
					}
					if (guard.type === "end") {
						fail(`'${this.tag}: End' without a matching Begin`, i)
					}
					if (guard.type === "begin") {
						open = {
							startLine: i,
							indent: guard.indent,
							deletion: guard.deletion,
							comment: guard.comment,
							body: [],
							restorable: [],
						}
						state = ParserState.InBlock
						break
					}
					if (guard.type === "single-line") {
						segments.push(this.singleLineSegment(guard, i, fail))
						break
					}
					if (guard.type === "next-line") {
						segments.push(this.nextLineSegment(guard, lines, i, fail))
						i++
					}
					break
				}

				case ParserState.InBlock: {
					if (!open) {
						return fail("parser lost track of the open block", i)
					}
					if (guard.type === "end") {
						segments.push({
							kind: open.deletion ? "deletion" : "addition",
							style: "block",
							startLine: open.startLine,
							endLine: i,
							indent: open.indent,
							comment: open.comment,
							body: open.body,
							...(open.deletion ? { restorable: open.restorable } : {}),
						})
						open = undefined
						state = ParserState.Outside
						break
					}
					if (guard.type === "begin") {
						fail(`nested '${this.tag}: Begin' inside the block opened at line ${open.startLine + 1}`, i)
					}
					if (guard.type !== "none") {
						fail(`guard inside the block opened at line ${open.startLine + 1}`, i)
					}
					if (open.deletion) {
						const stock = uncommentLine(line)
						if (stock === undefined) {
							fail(`live code line inside the deletion block opened at line ${open.startLine + 1}`, i)
						} else {
							open.restorable.push(stock)
						}
					}
					open.body.push(line)
					break
				}
			}
		}

		if (state === ParserState.InBlock && open) {
			fail(`'${this.tag}: Begin' is never closed`, open.startLine)
		}

		return segments
	}

	private singleLineSegment(
		guard: Extract<GuardLine, { type: "single-line" }>,
		index: number,
		fail: (reason: string, index: number) => never,
	): Segment {
		if (!guard.deletion) {
			return {
				kind: "addition",
				style: "single-line",
				startLine: index,
				endLine: index,
				indent: "",
				comment: guard.comment,
				body: [guard.code],
			}
		}

		const stock = uncommentLine(guard.code)
		if (stock === undefined || stock.trim() === "") {
			return fail("a single-line deletion guard must follow commented-out code", index)
		}
		return {
			kind: "deletion",
			style: "single-line",
			startLine: index,
			endLine: index,
			indent: "",
			comment: guard.comment,
			body: [guard.code],
			restorable: [stock],
		}
	}

	private nextLineSegment(
		guard: Extract<GuardLine, { type: "next-line" }>,
		lines: readonly string[],
		index: number,
		fail: (reason: string, index: number) => never,
	): Segment {
		const code = lines[index + 1]
		if (code === undefined || code.trim() === "") {
			return fail("a next-line guard must be followed by a code line", index)
		}
		if (this.classify(code).type !== "none") {
			return fail("a next-line guard cannot be followed by another guard", index + 1)
		}

		const segment: Segment = {
			kind: guard.deletion ? "deletion" : "addition",
			style: "next-line",
			startLine: index,
			endLine: index + 1,
			indent: guard.indent,
			comment: guard.comment,
			body: [code],
		}
		if (guard.deletion) {
			const stock = uncommentLine(code)
			if (stock === undefined) {
				return fail("a next-line deletion guard must be followed by commented-out code", index + 1)
			}
			segment.restorable = [stock]
		}
		return segment
	}
}

/**
 * Convenience wrapper around {@link GuardParser}.
 */
export function parseGuards(lines: readonly string[], tag: string, path?: string): Segment[] {
	return new GuardParser(tag).parse(lines, path)
}

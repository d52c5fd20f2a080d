import type { Segment } from "@patchweave/types"

/**
 * A guarded file seen without the plugin's changes: additions dropped,
 * deletions restored.
 */
export interface StockView {
	lines: string[]
	/** For each segment, the index in `lines` where its stock content starts */
	positions: number[]
}

export function buildStockView(lines: readonly string[], segments: readonly Segment[]): StockView {
	const out: string[] = []
	const positions: number[] = []
	let cursor = 0

	for (const segment of segments) {
		out.push(...lines.slice(cursor, segment.startLine))
		positions.push(out.length)
		if (segment.kind === "deletion") {
			out.push(...(segment.restorable ?? []))
		}
		cursor = segment.endLine + 1
	}
	out.push(...lines.slice(cursor))

	return { lines: out, positions }
}

import { z } from "zod"

/**
 * Guarded segment types
 */

export const segmentKindSchema = z.enum(["addition", "deletion"])

export type SegmentKind = z.infer<typeof segmentKindSchema>

/**
 * block: `// Tag: Begin` ... `// Tag: End`
 * single-line: `code // Tag`
 * next-line: `// Tag` followed by exactly one code line
 */
export const guardStyleSchema = z.enum(["block", "single-line", "next-line"])

export type GuardStyle = z.infer<typeof guardStyleSchema>

/**
 * A guarded code block found in a text buffer.
 */
export interface Segment {
	kind: SegmentKind
	style: GuardStyle
	/** 0-based index of the first line of the segment, guard lines included */
	startLine: number
	/** 0-based index of the last line of the segment, guard lines included */
	endLine: number
	/** Leading whitespace of the opening guard line */
	indent: string
	/** Free-form text after the tag (and the deletion marker) on the opening guard */
	comment: string
	/** Lines between the guards, verbatim */
	body: string[]
	/** Stock lines a deletion comments out */
	restorable?: string[]
}

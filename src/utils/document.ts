/**
 * Line-oriented view of a text buffer that joins back to the exact input.
 * The line break is taken from the first one in the text; any other line
 * break sequence stays inside the line content, so `joinDocument(splitDocument(x)) === x`.
 */
export interface TextDocument {
	lines: string[]
	eol: "\n" | "\r\n"
	trailingNewline: boolean
}

export function detectEol(text: string): "\n" | "\r\n" {
	const index = text.indexOf("\n")
	return index > 0 && text[index - 1] === "\r" ? "\r\n" : "\n"
}

export function splitDocument(text: string): TextDocument {
	const eol = detectEol(text)
	if (text === "") {
		return { lines: [], eol, trailingNewline: false }
	}

	const lines = text.split(eol)
	const trailingNewline = text.endsWith(eol)
	if (trailingNewline) {
		lines.pop()
	}
	return { lines, eol, trailingNewline }
}

export function joinDocument(document: TextDocument): string {
	if (document.lines.length === 0) {
		return ""
	}
	return document.lines.join(document.eol) + (document.trailingNewline ? document.eol : "")
}

/**
 * Same document with different lines. An empty result keeps no dangling line break.
 */
export function withLines(document: TextDocument, lines: string[]): TextDocument {
	return { ...document, lines }
}

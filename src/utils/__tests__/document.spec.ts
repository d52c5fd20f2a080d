// npx vitest utils/__tests__/document.spec.ts

import { describe, expect, it } from "vitest"

import { detectEol, joinDocument, splitDocument, withLines } from "../document"

describe("document", () => {
	it("should detect the first line break", () => {
		expect(detectEol("a\r\nb\nc")).toBe("\r\n")
		expect(detectEol("a\nb\r\n")).toBe("\n")
		expect(detectEol("single")).toBe("\n")
	})

	it("should split without a trailing empty line", () => {
		expect(splitDocument("a\nb\n")).toEqual({ lines: ["a", "b"], eol: "\n", trailingNewline: true })
		expect(splitDocument("a\r\nb")).toEqual({ lines: ["a", "b"], eol: "\r\n", trailingNewline: false })
		expect(splitDocument("")).toEqual({ lines: [], eol: "\n", trailingNewline: false })
	})

	it.each(["a\nb\n", "a\r\nb", "\n", "a\n\n", "x\r\ny\nz\r\n"])("should join %j back to the same text", (text) => {
		expect(joinDocument(splitDocument(text))).toBe(text)
	})

	it("should keep the line break style for new lines", () => {
		expect(joinDocument(withLines(splitDocument("a\r\n"), ["a", "b"]))).toBe("a\r\nb\r\n")
		expect(joinDocument(withLines(splitDocument("a\n"), []))).toBe("")
	})
})

import * as path from "path"

import { PatchErrors } from "../core/errors"

/**
 * Convert backslashes to forward slashes. Extended-length Windows paths
 * (`\\?\C:\...`) are returned unchanged.
 */
export function toPosixPath(p: string): string {
	const isExtendedLengthPath = p.startsWith("\\\\?\\")
	if (isExtendedLengthPath) {
		return p
	}
	return p.replace(/\\/g, "/")
}

/**
 * Normalize a path relative to a tree root: posix separators, no `./`, no
 * leading or trailing slash. Rejects absolute paths and paths that leave the root.
 */
export function normalizeRelativePath(p: string): string {
	const posix = toPosixPath(p).trim()
	if (posix.startsWith("/") || /^[A-Za-z]:\//.test(posix)) {
		throw PatchErrors.invalidPath(p, "expected a relative path")
	}

	const normalized = path.posix.normalize(posix).replace(/\/+$/, "")
	if (normalized === "." || normalized === "") {
		return ""
	}
	if (normalized === ".." || normalized.startsWith("../")) {
		throw PatchErrors.pathTraversalDetected(p)
	}
	return normalized.replace(/^\.\//, "")
}

/**
 * Whether `target` is `prefix` itself or lies below it. The empty prefix contains everything.
 */
export function isPathWithin(target: string, prefix: string): boolean {
	if (prefix === "") {
		return true
	}
	return target === prefix || target.startsWith(`${prefix}/`)
}

/**
 * Swap the leading `prefix` of `target` for `replacement`.
 */
export function replacePathPrefix(target: string, prefix: string, replacement: string): string {
	if (!isPathWithin(target, prefix)) {
		return target
	}
	const rest = prefix === "" ? target : target.slice(prefix.length).replace(/^\//, "")
	return [replacement, rest].filter((part) => part !== "").join("/")
}

/**
 * Drop every directory between `prefix` and the file name.
 */
export function flattenPath(target: string, prefix: string): string {
	if (!isPathWithin(target, prefix)) {
		return target
	}
	const name = path.posix.basename(target)
	return prefix === "" ? name : `${prefix}/${name}`
}

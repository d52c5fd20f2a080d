import * as path from "path"

import type { PatchFileSystem } from "./file-system"
import { isPathWithin, toPosixPath } from "./path"

function key(filePath: string): string {
	return path.posix.resolve("/", toPosixPath(filePath))
}

function isBelow(filePath: string, dir: string): boolean {
	return dir === "/" ? filePath !== "/" : isPathWithin(filePath, dir) && filePath !== dir
}

/**
 * In-memory PatchFileSystem. Paths are treated as posix and resolved against `/`.
 */
export class MemoryFileSystem implements PatchFileSystem {
	private readonly files = new Map<string, string>()
	readonly writes: string[] = []

	constructor(initial: Record<string, string> = {}) {
		for (const [filePath, contents] of Object.entries(initial)) {
			this.files.set(key(filePath), contents)
		}
	}

	async readFile(filePath: string): Promise<string | undefined> {
		return this.files.get(key(filePath))
	}

	async writeFile(filePath: string, contents: string): Promise<void> {
		this.files.set(key(filePath), contents)
		this.writes.push(key(filePath))
	}

	async removeFile(filePath: string): Promise<void> {
		this.files.delete(key(filePath))
	}

	async exists(filePath: string): Promise<boolean> {
		return this.existsSync(filePath)
	}

	existsSync(filePath: string): boolean {
		const target = key(filePath)
		if (this.files.has(target)) {
			return true
		}
		for (const existing of this.files.keys()) {
			if (isBelow(existing, target)) {
				return true
			}
		}
		return false
	}

	async listFiles(dir: string): Promise<string[]> {
		const root = key(dir)
		const out: string[] = []
		for (const existing of this.files.keys()) {
			if (isBelow(existing, root)) {
				out.push(root === "/" ? existing.slice(1) : existing.slice(root.length + 1))
			}
		}
		return out.sort()
	}

	/** Snapshot of every file, keyed by absolute posix path */
	toObject(): Record<string, string> {
		return Object.fromEntries([...this.files.entries()].sort(([a], [b]) => a.localeCompare(b)))
	}
}

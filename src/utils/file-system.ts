import fsSync from "fs"
import fs from "fs/promises"
import * as path from "path"

import { fileExistsAtPath, listFilesRecursive, readFileIfExists, writeFileAtomic } from "./fs"
import { isPathWithin, toPosixPath } from "./path"

/**
 * Every read and write the engine performs goes through this interface, so a
 * dry run can reroute writes and tests can run against memory.
 */
export interface PatchFileSystem {
	/** UTF-8 content, or `undefined` when the file does not exist */
	readFile(filePath: string): Promise<string | undefined>
	/** Creates parent directories; replaces the file in one step */
	writeFile(filePath: string, contents: string): Promise<void>
	removeFile(filePath: string): Promise<void>
	/** Files and directories */
	exists(filePath: string): Promise<boolean>
	existsSync(filePath: string): boolean
	/** Files below `dir`, relative posix paths, sorted; empty when `dir` is missing */
	listFiles(dir: string): Promise<string[]>
}

export class NodeFileSystem implements PatchFileSystem {
	readFile(filePath: string): Promise<string | undefined> {
		return readFileIfExists(filePath)
	}

	writeFile(filePath: string, contents: string): Promise<void> {
		return writeFileAtomic(filePath, contents)
	}

	async removeFile(filePath: string): Promise<void> {
		await fs.rm(filePath, { force: true })
	}

	exists(filePath: string): Promise<boolean> {
		return fileExistsAtPath(filePath)
	}

	existsSync(filePath: string): boolean {
		return fsSync.existsSync(filePath)
	}

	listFiles(dir: string): Promise<string[]> {
		return listFilesRecursive(dir)
	}
}

/**
 * Dry-run routing: writes under any of the watched roots land in
 * `<sandboxRoot>/<label>/...` instead; reads see the sandboxed copy first.
 * Reads outside the roots go straight to the live tree, writes there are
 * refused. The live tree is never modified.
 */
export class SandboxFileSystem implements PatchFileSystem {
	private readonly roots: Array<{ label: string; root: string }>
	private readonly removed = new Set<string>()

	constructor(
		private readonly inner: PatchFileSystem,
		readonly sandboxRoot: string,
		roots: Record<string, string>,
	) {
		this.roots = Object.entries(roots).map(([label, root]) => ({ label, root: toPosixPath(path.resolve(root)) }))
	}

	private sandboxPathOf(filePath: string): string | undefined {
		const absolute = toPosixPath(path.resolve(filePath))
		const owner = this.roots.find(({ root }) => isPathWithin(absolute, root))
		if (!owner) {
			return undefined
		}
		const relative = absolute === owner.root ? "" : absolute.slice(owner.root.length + 1)
		return path.join(this.sandboxRoot, owner.label, relative)
	}

	/**
	 * Where a write to `filePath` ends up. Paths outside every root are refused.
	 */
	resolveSandboxPath(filePath: string): string {
		const sandboxPath = this.sandboxPathOf(filePath)
		if (sandboxPath === undefined) {
			throw new Error(`Refusing to write outside the sandboxed roots: ${filePath}`)
		}
		return sandboxPath
	}

	async readFile(filePath: string): Promise<string | undefined> {
		const sandboxPath = this.sandboxPathOf(filePath)
		if (sandboxPath === undefined) {
			return this.inner.readFile(filePath)
		}
		if (this.removed.has(sandboxPath)) {
			return undefined
		}
		const sandboxed = await this.inner.readFile(sandboxPath)
		return sandboxed ?? this.inner.readFile(filePath)
	}

	async writeFile(filePath: string, contents: string): Promise<void> {
		const sandboxPath = this.resolveSandboxPath(filePath)
		this.removed.delete(sandboxPath)
		await this.inner.writeFile(sandboxPath, contents)
	}

	async removeFile(filePath: string): Promise<void> {
		const sandboxPath = this.resolveSandboxPath(filePath)
		this.removed.add(sandboxPath)
		await this.inner.removeFile(sandboxPath)
	}

	async exists(filePath: string): Promise<boolean> {
		const sandboxPath = this.sandboxPathOf(filePath)
		if (sandboxPath === undefined) {
			return this.inner.exists(filePath)
		}
		if (this.removed.has(sandboxPath)) {
			return false
		}
		return (await this.inner.exists(sandboxPath)) || this.inner.exists(filePath)
	}

	existsSync(filePath: string): boolean {
		const sandboxPath = this.sandboxPathOf(filePath)
		if (sandboxPath === undefined) {
			return this.inner.existsSync(filePath)
		}
		if (this.removed.has(sandboxPath)) {
			return false
		}
		return this.inner.existsSync(sandboxPath) || this.inner.existsSync(filePath)
	}

	async listFiles(dir: string): Promise<string[]> {
		const sandboxDir = this.sandboxPathOf(dir)
		if (sandboxDir === undefined) {
			return this.inner.listFiles(dir)
		}
		const [live, sandboxed] = await Promise.all([this.inner.listFiles(dir), this.inner.listFiles(sandboxDir)])
		const merged = new Set([...live, ...sandboxed])
		return [...merged].filter((relative) => !this.removed.has(path.join(sandboxDir, relative))).sort()
	}
}

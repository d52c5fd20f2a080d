import fs from "fs/promises"
import * as path from "path"

/**
 * Helper function to check if a path exists.
 *
 * @param filePath - The path to check.
 * @returns A promise that resolves to true if the path exists, false otherwise.
 */
export async function fileExistsAtPath(filePath: string): Promise<boolean> {
	try {
		await fs.access(filePath)
		return true
	} catch {
		return false
	}
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && "code" in error
}

/**
 * Read a UTF-8 file, or `undefined` when it does not exist.
 */
export async function readFileIfExists(filePath: string): Promise<string | undefined> {
	try {
		return await fs.readFile(filePath, "utf8")
	} catch (error: unknown) {
		if (isNodeError(error) && error.code === "ENOENT") {
			return undefined
		}
		throw error
	}
}

/**
 * Write through a temporary file in the same directory and rename it over the
 * target, so readers see either the old or the new content.
 */
export async function writeFileAtomic(filePath: string, contents: string): Promise<void> {
	await fs.mkdir(path.dirname(filePath), { recursive: true })
	const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`
	try {
		await fs.writeFile(tempPath, contents, "utf8")
		await fs.rename(tempPath, filePath)
	} catch (error) {
		await fs.rm(tempPath, { force: true })
		throw error
	}
}

/**
 * Every file below `dir`, as posix paths relative to it, sorted.
 * A missing directory yields no files.
 */
export async function listFilesRecursive(dir: string): Promise<string[]> {
	const out: string[] = []

	const walk = async (current: string, relative: string): Promise<void> => {
		const entries = await fs.readdir(current, { withFileTypes: true })
		for (const entry of entries) {
			const childRelative = relative ? `${relative}/${entry.name}` : entry.name
			if (entry.isDirectory()) {
				await walk(path.join(current, entry.name), childRelative)
			} else if (entry.isFile()) {
				out.push(childRelative)
			}
		}
	}

	try {
		await walk(dir, "")
	} catch (error: unknown) {
		if (isNodeError(error) && error.code === "ENOENT") {
			return []
		}
		throw error
	}
	return out.sort()
}

import ignore, { type Ignore } from "ignore"

import { normalizeRelativePath } from "../../utils/path"

/**
 * Restricts a run to the target paths selected on the command line.
 * Uses the 'ignore' library, so filters follow .gitignore syntax: `Runtime/`
 * selects a directory, `*.h` matches at any depth, `!pattern` re-includes.
 */
export class PathFilterController {
	private readonly includeInstance: Ignore | undefined
	private readonly excludeInstance: Ignore

	constructor(include: readonly string[] = [], exclude: readonly string[] = []) {
		this.includeInstance = include.length > 0 ? ignore().add([...include]) : undefined
		this.excludeInstance = ignore().add([...exclude])
	}

	/**
	 * Check if a target path takes part in the run
	 * @param targetPath - Path relative to the patch tree
	 * @returns false for excluded paths, paths outside the include list and invalid paths
	 */
	isIncluded(targetPath: string): boolean {
		let relativePath: string
		try {
			relativePath = normalizeRelativePath(targetPath)
		} catch {
			return false
		}
		if (relativePath === "") {
			return false
		}

		if (this.includeInstance && !this.includeInstance.ignores(relativePath)) {
			return false
		}
		return !this.excludeInstance.ignores(relativePath)
	}

	filterPaths(paths: readonly string[]): string[] {
		return paths.filter((p) => this.isIncluded(p))
	}
}

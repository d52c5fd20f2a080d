import type { RuleKey, RuleLine } from "@patchweave/types"

export interface ScopeNode {
	index: number
	/** Relative path prefix; `""` for Global */
	path: string
	parent: number | undefined
	/** Lines declared directly in this scope, file order */
	lines: RuleLine[]
}

export const GLOBAL_SCOPE = 0

/**
 * Arena of scopes keyed by path prefix. Every ancestor prefix of a scope has
 * a node, so a lookup walks the target path one segment at a time.
 */
export class ScopeTree {
	private readonly nodes: ScopeNode[] = [{ index: GLOBAL_SCOPE, path: "", parent: undefined, lines: [] }]
	private readonly byPath = new Map<string, number>([["", GLOBAL_SCOPE]])

	get size(): number {
		return this.nodes.length
	}

	ensure(scopePath: string): number {
		let parent = GLOBAL_SCOPE
		let prefix = ""
		for (const segment of scopePath.split("/").filter((part) => part !== "")) {
			prefix = prefix === "" ? segment : `${prefix}/${segment}`
			const existing = this.byPath.get(prefix)
			if (existing !== undefined) {
				parent = existing
				continue
			}
			const index = this.nodes.length
			this.nodes.push({ index, path: prefix, parent, lines: [] })
			this.byPath.set(prefix, index)
			parent = index
		}
		return parent
	}

	node(index: number): ScopeNode {
		const node = this.nodes[index]
		if (!node) {
			throw new RangeError(`No scope at index ${index}`)
		}
		return node
	}

	addLine(line: RuleLine): void {
		this.node(line.scopeIndex).lines.push(line)
	}

	scopes(): readonly ScopeNode[] {
		return this.nodes
	}

	/**
	 * Scopes that contain `targetPath`, Global first.
	 */
	chain(targetPath: string): ScopeNode[] {
		const chain: ScopeNode[] = []
		let index: number | undefined = this.deepest(targetPath)
		while (index !== undefined) {
			const node = this.node(index)
			chain.unshift(node)
			index = node.parent
		}
		return chain
	}

	/**
	 * Effective lines of one key for a path.
	 *
	 * `Key=` drops inherited ordinary lines, `^Key=` drops everything, and the
	 * `+` forms append. Scopes are walked Global first, lines in file order.
	 */
	resolveLines(key: RuleKey, targetPath: string): RuleLine[] {
		let result: RuleLine[] = []
		for (const scope of this.chain(targetPath)) {
			for (const line of scope.lines) {
				if (line.key !== key) {
					continue
				}
				if (line.mode === "append") {
					result.push(line)
				} else if (line.baseDomain) {
					result = [line]
				} else {
					result = [...result.filter((kept) => kept.baseDomain), line]
				}
			}
		}
		return result
	}

	private deepest(targetPath: string): number {
		let deepest = GLOBAL_SCOPE
		let prefix = ""
		for (const segment of targetPath.split("/").filter((part) => part !== "")) {
			prefix = prefix === "" ? segment : `${prefix}/${segment}`
			const index = this.byPath.get(prefix)
			if (index === undefined) {
				break
			}
			deepest = index
		}
		return deepest
	}
}

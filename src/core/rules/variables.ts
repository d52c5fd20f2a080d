import { PatchErrors } from "../errors"

const VARIABLE_REFERENCE = /\$\{([^}]*)\}/g

export const VARIABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/

interface VariableDeclaration {
	value: string
	/** 1-based config line; absent for command-line defines */
	line?: number
}

/**
 * `[Variables]` of a rule config with command-line defines laid over them.
 * Values are substituted on demand, so a variable may reference one that is
 * declared further down the file.
 */
export class VariableTable {
	private readonly declarations = new Map<string, VariableDeclaration>()

	constructor(
		declared: Iterable<[string, VariableDeclaration]> = [],
		defines: Readonly<Record<string, string>> = {},
		private readonly configPath?: string,
	) {
		for (const [name, declaration] of declared) {
			this.declarations.set(name, declaration)
		}
		for (const [name, value] of Object.entries(defines)) {
			this.declarations.set(name, { value })
		}
	}

	/**
	 * Replace every `${Name}` in `text`, recursively.
	 */
	substitute(text: string, line?: number): string {
		return this.expand(text, [], line)
	}

	resolve(name: string): string {
		return this.expand(`\${${name}}`, [])
	}

	/**
	 * Every variable with its substituted value.
	 */
	toRecord(): Record<string, string> {
		const record: Record<string, string> = {}
		for (const name of this.declarations.keys()) {
			record[name] = this.resolve(name)
		}
		return record
	}

	/**
	 * Throws on the first undefined reference or cycle among the declarations.
	 */
	validate(): void {
		for (const [name, declaration] of this.declarations) {
			this.expand(declaration.value, [name], declaration.line)
		}
	}

	private expand(text: string, stack: string[], line?: number): string {
		return text.replace(VARIABLE_REFERENCE, (_reference, name: string) => {
			const declaration = this.declarations.get(name)
			if (!declaration) {
				throw PatchErrors.variableUndefined(name, line, this.configPath)
			}
			if (stack.includes(name)) {
				throw PatchErrors.variableCycle([...stack, name])
			}
			return this.expand(declaration.value, [...stack, name], declaration.line ?? line)
		})
	}
}

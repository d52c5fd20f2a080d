/**
 * Minimal logging plumbing. Presentation (colors, verbosity levels, files) is the
 * caller's business; the engine only emits prefixed lines through a LogFunction.
 */

export type LogFunction = (...args: unknown[]) => void

export interface Logger {
	info: LogFunction
	/** Only emitted in verbose mode */
	debug: LogFunction
	warn: LogFunction
	error: LogFunction
}

const noop: LogFunction = () => {}

export interface ConsoleLoggerOptions {
	verbose?: boolean
	console?: Pick<Console, "log" | "warn" | "error">
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
	const target = options.console ?? console
	return {
		info: (...args) => target.log(...args),
		debug: options.verbose ? (...args) => target.log(...args) : noop,
		warn: (...args) => target.warn(...args),
		error: (...args) => target.error(...args),
	}
}

/**
 * Logger that drops everything, for callers that want no output.
 */
export function createSilentLogger(): Logger {
	return { info: noop, debug: noop, warn: noop, error: noop }
}

/**
 * Prefix every message with `[Component]`.
 */
export function withPrefix(logger: Logger, component: string): Logger {
	const prefix = `[${component}]`
	return {
		info: (...args) => logger.info(prefix, ...args),
		debug: (...args) => logger.debug(prefix, ...args),
		warn: (...args) => logger.warn(prefix, ...args),
		error: (...args) => logger.error(prefix, ...args),
	}
}

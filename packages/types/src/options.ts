import { z } from "zod"

/**
 * Engine defaults
 */
export const PATCH_DEFAULTS = {
	PATCH_CONTEXT: 50,
	CONTENT_TOLERANCE: 0.5,
	LINE_TOLERANCE: Number.POSITIVE_INFINITY,
	CONCURRENCY: 4,
	PATCH_DIR_NAME: "SourcePatch",
	CONFIG_FILE_NAME: "patchweave.ini",
	EXTENSIONS: [".h", ".hpp", ".inl", ".c", ".cc", ".cpp", ".cs", ".usf", ".ush"],
} as const

/**
 * exact: lines must be identical
 * trimmed: lines must be identical after collapsing whitespace
 * levenshtein: normalized edit similarity in [0, 1]
 */
export const lineComparatorSchema = z.enum(["exact", "trimmed", "levenshtein"])

export type LineComparatorName = z.infer<typeof lineComparatorSchema>

/**
 * register and unregister are accepted for parity with the command line and
 * map to apply and clear; placing plugin-owned files is not the engine's job.
 */
export const patchActionSchema = z.enum(["generate", "apply", "clear", "register", "unregister"])

export type PatchAction = z.infer<typeof patchActionSchema>

export const matchOptionsSchema = z.object({
	patchContext: z.number().int().min(0).default(PATCH_DEFAULTS.PATCH_CONTEXT),
	contentTolerance: z.number().min(0).max(1).default(PATCH_DEFAULTS.CONTENT_TOLERANCE),
	lineTolerance: z.number().min(0).default(PATCH_DEFAULTS.LINE_TOLERANCE),
	lineComparator: lineComparatorSchema.default("exact"),
})

export type MatchOptions = z.infer<typeof matchOptionsSchema>

/**
 * Guard tags end up inside regular expressions and file names.
 */
export const guardTagSchema = z
	.string()
	.regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "Tag must start with a letter or underscore and contain only letters, digits and underscores")

export const runOptionsSchema = matchOptionsSchema.extend({
	tag: guardTagSchema,
	sourceRoot: z.string().min(1),
	destinationRoot: z.string().min(1),
	/** Defaults to `<sourceRoot>/SourcePatch` */
	patchDir: z.string().min(1).optional(),
	/** Defaults to `<sourceRoot>/patchweave.ini`; a missing default file means no rules */
	configFile: z.string().min(1).optional(),
	defines: z.record(z.string()).default({}),
	actions: z.array(patchActionSchema).min(1),
	include: z.array(z.string()).default([]),
	exclude: z.array(z.string()).default([]),
	force: z.boolean().default(false),
	dryRun: z.boolean().default(false),
	/** Sandbox directory for dry runs; defaults to a fresh directory under the OS temp dir */
	dryRunRoot: z.string().min(1).optional(),
	verbose: z.boolean().default(false),
	concurrency: z.number().int().min(1).default(PATCH_DEFAULTS.CONCURRENCY),
	extensions: z.array(z.string().startsWith(".")).default([...PATCH_DEFAULTS.EXTENSIONS]),
})

export type RunOptions = z.infer<typeof runOptionsSchema>

export type RunOptionsInput = z.input<typeof runOptionsSchema>

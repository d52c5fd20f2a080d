import { z } from "zod"

import { guardStyleSchema, segmentKindSchema } from "./guards.js"

/**
 * Patch artifact format version written to disk
 */
export const PATCH_FORMAT_VERSION = 1

/**
 * Addition block that directly followed a deletion block in the live file.
 */
export const patchReplacementSchema = z.object({
	style: guardStyleSchema,
	indent: z.string(),
	comment: z.string(),
	lines: z.array(z.string()),
})

export type PatchReplacement = z.infer<typeof patchReplacementSchema>

export const patchRecordSchema = z.object({
	id: z.string().min(1),
	targetPath: z.string().min(1),
	kind: segmentKindSchema,
	style: guardStyleSchema,
	indent: z.string(),
	comment: z.string(),
	precedingContext: z.array(z.string()),
	followingContext: z.array(z.string()),
	// Inserted lines for an addition, stock lines to comment out for a deletion
	body: z.array(z.string()),
	replacement: patchReplacementSchema.optional(),
	originalLine: z.number().int().min(0),
})

export type PatchRecord = z.infer<typeof patchRecordSchema>

/**
 * One stored version of a file's patch, as persisted on disk.
 */
export const patchArtifactSchema = z.object({
	formatVersion: z.literal(PATCH_FORMAT_VERSION),
	targetPath: z.string().min(1),
	order: z.number().int().positive(),
	createdAt: z.string(),
	records: z.array(patchRecordSchema),
})

export type PatchArtifact = z.infer<typeof patchArtifactSchema>

/**
 * Records produced by one generation of one file, in file order.
 */
export interface PatchVersion {
	/** Creation order, strictly increasing within a set */
	order: number
	createdAt: string
	records: PatchRecord[]
}

/**
 * Every stored version for one target path, oldest first.
 */
export interface PatchVersionSet {
	targetPath: string
	versions: PatchVersion[]
}

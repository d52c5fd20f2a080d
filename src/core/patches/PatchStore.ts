import * as path from "path"

import {
	PATCH_FORMAT_VERSION,
	patchArtifactSchema,
	type PatchArtifact,
	type PatchVersion,
	type PatchVersionSet,
} from "@patchweave/types"

import { PatchErrors } from "../errors"
import type { PatchFileSystem } from "../../utils/file-system"
import { normalizeRelativePath } from "../../utils/path"

const ARTIFACT_SUFFIX = /^(.+)\.(\d+)\.patch\.json$/

/**
 * Persistence of patch versions, keyed by target path.
 */
export interface PatchStore {
	/** Every target path with at least one stored version, sorted */
	listTargets(): Promise<string[]>
	/** Stored versions, oldest first; an empty set when nothing is stored */
	load(targetPath: string): Promise<PatchVersionSet>
	saveVersion(targetPath: string, version: PatchVersion): Promise<void>
	removeVersions(targetPath: string, orders: readonly number[]): Promise<void>
}

/**
 * Stores each version as `<patchDir>/<targetPath>.<order>.patch.json`, so the
 * patch directory mirrors the target tree. The directory is listed once per
 * store; later saves and removals through the store keep that index current.
 */
export class FilePatchStore implements PatchStore {
	private artifacts?: Promise<Map<string, Set<number>>>

	constructor(
		private readonly fileSystem: PatchFileSystem,
		readonly patchDir: string,
	) {}

	artifactPath(targetPath: string, order: number): string {
		return path.join(this.patchDir, `${normalizeRelativePath(targetPath)}.${order}.patch.json`)
	}

	async listTargets(): Promise<string[]> {
		const index = await this.artifactIndex()
		return [...index.keys()].sort()
	}

	async load(targetPath: string): Promise<PatchVersionSet> {
		const normalized = normalizeRelativePath(targetPath)
		const orders = [...((await this.artifactIndex()).get(normalized) ?? [])].sort((a, b) => a - b)

		const versions: PatchVersion[] = []
		for (const order of orders) {
			versions.push(await this.readArtifact(normalized, order))
		}
		return { targetPath: normalized, versions }
	}

	async saveVersion(targetPath: string, version: PatchVersion): Promise<void> {
		const normalized = normalizeRelativePath(targetPath)
		const artifact: PatchArtifact = {
			formatVersion: PATCH_FORMAT_VERSION,
			targetPath: normalized,
			order: version.order,
			createdAt: version.createdAt,
			records: version.records,
		}
		const artifactPath = this.artifactPath(normalized, version.order)
		try {
			await this.fileSystem.writeFile(artifactPath, `${JSON.stringify(artifact, null, "\t")}\n`)
		} catch (error) {
			throw PatchErrors.writeFailed(artifactPath, error instanceof Error ? error : undefined)
		}
		await this.updateIndex(normalized, (orders) => orders.add(version.order))
	}

	async removeVersions(targetPath: string, orders: readonly number[]): Promise<void> {
		const normalized = normalizeRelativePath(targetPath)
		for (const order of orders) {
			await this.fileSystem.removeFile(this.artifactPath(normalized, order))
			await this.updateIndex(normalized, (stored) => stored.delete(order))
		}
	}

	private artifactIndex(): Promise<Map<string, Set<number>>> {
		this.artifacts ??= this.fileSystem.listFiles(this.patchDir).then(
			(files) => {
				const index = new Map<string, Set<number>>()
				for (const file of files) {
					const match = ARTIFACT_SUFFIX.exec(file)
					if (match?.[1] && match[2]) {
						const orders = index.get(match[1]) ?? new Set<number>()
						orders.add(Number(match[2]))
						index.set(match[1], orders)
					}
				}
				return index
			},
			(error: unknown) => {
				this.artifacts = undefined
				throw error
			},
		)
		return this.artifacts
	}

	/**
	 * Nothing to do before the first listing; it will see the change on disk.
	 */
	private async updateIndex(targetPath: string, update: (orders: Set<number>) => void): Promise<void> {
		if (!this.artifacts) {
			return
		}
		const index = await this.artifacts
		const orders = index.get(targetPath) ?? new Set<number>()
		update(orders)
		if (orders.size === 0) {
			index.delete(targetPath)
		} else {
			index.set(targetPath, orders)
		}
	}

	private async readArtifact(targetPath: string, order: number): Promise<PatchVersion> {
		const artifactPath = this.artifactPath(targetPath, order)
		const raw = await this.fileSystem.readFile(artifactPath)
		if (raw === undefined) {
			throw PatchErrors.fileNotFound(artifactPath)
		}

		let json: unknown
		try {
			json = JSON.parse(raw)
		} catch (error) {
			throw PatchErrors.invalidPatchArtifact(artifactPath, error instanceof Error ? error.message : "not JSON")
		}

		const parsed = patchArtifactSchema.safeParse(json)
		if (!parsed.success) {
			const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
			throw PatchErrors.invalidPatchArtifact(artifactPath, issues.join("; "))
		}
		if (parsed.data.targetPath !== targetPath || parsed.data.order !== order) {
			throw PatchErrors.invalidPatchArtifact(
				artifactPath,
				`artifact describes ${parsed.data.targetPath} version ${parsed.data.order}`,
			)
		}

		return { order, createdAt: parsed.data.createdAt, records: parsed.data.records }
	}
}

import { readFile } from "node:fs/promises"
import { isNotFound, writeFileUtf8 } from "@/src/io/fs"
import { parseManifest } from "@/src/manifest/parse"
import type { Manifest, ManifestItem, ReferenceTag } from "@/src/manifest/types"
import { serializeManifest } from "@/src/manifest/write"
import type { AbsolutePath } from "@/src/types/branded"
import type { ManifestDiscoveredAt } from "@/src/types/context"
import type { ApiRefError, Result } from "@/src/types/errors"

export interface ManifestLoadResult {
	created: boolean
	manifest: Manifest
	manifestPath: AbsolutePath
}

/**
 * Load a manifest from a specific path.
 */
export async function loadManifest(
	manifestPath: AbsolutePath,
	discoveredAt: ManifestDiscoveredAt,
): Promise<Result<ManifestLoadResult, ApiRefError>> {
	let contents: string
	try {
		contents = await readFile(manifestPath, "utf8")
	} catch (error) {
		if (isNotFound(error)) {
			return {
				error: {
					message: `Manifest not found: ${manifestPath}`,
					path: manifestPath,
					target: "manifest",
					type: "not_found",
				},
				ok: false,
			}
		}
		return {
			error: {
				message: `Unable to read ${manifestPath}.`,
				operation: "readFile",
				path: manifestPath,
				rawError: error instanceof Error ? error : undefined,
				type: "io",
			},
			ok: false,
		}
	}

	const parsed = parseManifest(contents, manifestPath, discoveredAt)
	if (!parsed.ok) {
		return parsed
	}

	return { ok: true, value: { created: false, manifest: parsed.value, manifestPath } }
}

/**
 * Create an empty manifest with proper typed structures.
 */
export function createEmptyManifest(
	sourcePath: AbsolutePath,
	discoveredAt: ManifestDiscoveredAt,
): Manifest {
	return {
		extras: {},
		origin: { discoveredAt, sourcePath },
		references: new Map<ReferenceTag, readonly ManifestItem[]>(),
	}
}

/**
 * Save a manifest to disk.
 */
export async function saveManifest(
	manifest: Manifest,
	manifestPath: AbsolutePath,
): Promise<Result<void, ApiRefError>> {
	return writeFileUtf8(manifestPath, serializeManifest(manifest))
}

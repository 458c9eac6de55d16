import type { REFERENCE_TAGS } from "@/src/constants"
import type { AbsolutePath } from "@/src/types/branded"
import type { ManifestOrigin } from "@/src/types/context"
import type { ApiRefError, IoError, Result, ValidationError } from "@/src/types/errors"

export type ReferenceTag = (typeof REFERENCE_TAGS)[number]

export type ItemMetadata = Readonly<Record<string, string>>

export interface ManifestItem {
	/** Local path as written in the manifest. */
	include: string
	metadata: ItemMetadata
}

export interface Manifest {
	references: ReadonlyMap<ReferenceTag, readonly ManifestItem[]>
	/** Top-level tables apiref does not own, written back untouched. */
	extras: Readonly<Record<string, unknown>>
	origin: ManifestOrigin
}

export type ManifestParseResult = Result<Manifest, ApiRefError>

export type ManifestDiscoveryError =
	| (ValidationError & { path: AbsolutePath })
	| (IoError & { path: AbsolutePath })

export type ManifestDiscoveryResult =
	| { ok: true; value: AbsolutePath | null }
	| { ok: false; error: ManifestDiscoveryError }

/**
 * A manifest chosen for a command. A created manifest exists only in memory
 * until something is registered in it.
 */
export interface ProjectManifest {
	created: boolean
	manifest: Manifest
	manifestPath: AbsolutePath
}

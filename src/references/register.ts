import path from "node:path"
import { SOURCE_URL_KEY } from "@/src/constants"
import { addItem, getItems, removeItems } from "@/src/manifest/transform"
import type {
	ItemMetadata,
	Manifest,
	ManifestItem,
	ReferenceTag,
} from "@/src/manifest/types"

export interface ReferenceRequest {
	tag: ReferenceTag
	/** Local path, stored as given and compared after resolving against the manifest directory. */
	include: string
	/** Source identity (the originating URL). Compared exactly. */
	sourceUrl?: string
	metadata?: ItemMetadata
}

export type RegistrationResult =
	| { status: "added"; manifest: Manifest; item: ManifestItem }
	| { status: "duplicate-path"; existing: ManifestItem }
	| { status: "duplicate-identity"; existing: ManifestItem }

export type RegistrationStatus = RegistrationResult["status"]

/**
 * Record a reference at most once per local path and at most once per
 * source identity within its tag. A duplicate is reported, never merged.
 */
export function registerReference(
	manifest: Manifest,
	request: ReferenceRequest,
): RegistrationResult {
	const items = getItems(manifest, request.tag)
	const target = resolveInclude(manifest, request.include)

	const samePath = items.find((item) => resolveInclude(manifest, item.include) === target)
	if (samePath) {
		return { existing: samePath, status: "duplicate-path" }
	}

	const sourceUrl = request.sourceUrl ?? ""
	if (sourceUrl.length > 0) {
		const sameSource = items.find((item) => item.metadata[SOURCE_URL_KEY] === sourceUrl)
		if (sameSource) {
			return { existing: sameSource, status: "duplicate-identity" }
		}
	}

	const metadata: Record<string, string> = { ...request.metadata }
	if (sourceUrl.length > 0) {
		metadata[SOURCE_URL_KEY] = sourceUrl
	}

	const updated = addItem(manifest, request.tag, request.include, metadata)
	return {
		item: { include: request.include, metadata },
		manifest: updated,
		status: "added",
	}
}

export interface ReferenceSelector {
	tag: ReferenceTag
	include?: string
	sourceUrl?: string
}

/**
 * Items under the tag whose include or source identity matches.
 */
export function findReferences(
	manifest: Manifest,
	selector: ReferenceSelector,
): ManifestItem[] {
	return getItems(manifest, selector.tag).filter((item) =>
		matchesSelector(manifest, item, selector),
	)
}

export function unregisterReference(
	manifest: Manifest,
	selector: ReferenceSelector,
): { manifest: Manifest; removed: ManifestItem[] } {
	return removeItems(manifest, selector.tag, (item) =>
		matchesSelector(manifest, item, selector),
	)
}

/**
 * Absolute form of an include, relative paths resolved against the
 * directory that holds the manifest.
 */
export function resolveInclude(manifest: Manifest, include: string): string {
	return path.resolve(path.dirname(manifest.origin.sourcePath), include)
}

function matchesSelector(
	manifest: Manifest,
	item: ManifestItem,
	selector: ReferenceSelector,
): boolean {
	if (
		selector.include !== undefined &&
		resolveInclude(manifest, item.include) === resolveInclude(manifest, selector.include)
	) {
		return true
	}
	return (
		selector.sourceUrl !== undefined &&
		selector.sourceUrl.length > 0 &&
		item.metadata[SOURCE_URL_KEY] === selector.sourceUrl
	)
}

import type {
	ItemMetadata,
	Manifest,
	ManifestItem,
	ReferenceTag,
} from "@/src/manifest/types"

/**
 * Pure transformation functions for Manifest.
 * These return new Manifest instances - no mutation.
 */

/**
 * Get the items recorded under a tag, in manifest order.
 */
export function getItems(manifest: Manifest, tag: ReferenceTag): readonly ManifestItem[] {
	return manifest.references.get(tag) ?? []
}

/**
 * Append an item under a tag.
 * Returns a new Manifest with the item added.
 */
export function addItem(
	manifest: Manifest,
	tag: ReferenceTag,
	include: string,
	metadata: ItemMetadata = {},
): Manifest {
	const references = new Map(manifest.references)
	references.set(tag, [...getItems(manifest, tag), { include, metadata: { ...metadata } }])
	return { ...manifest, references }
}

/**
 * Remove every item under a tag that matches the predicate.
 * Returns a new Manifest and the removed items.
 */
export function removeItems(
	manifest: Manifest,
	tag: ReferenceTag,
	predicate: (item: ManifestItem) => boolean,
): { manifest: Manifest; removed: ManifestItem[] } {
	const kept: ManifestItem[] = []
	const removed: ManifestItem[] = []
	for (const item of getItems(manifest, tag)) {
		if (predicate(item)) {
			removed.push(item)
		} else {
			kept.push(item)
		}
	}

	if (removed.length === 0) {
		return { manifest, removed }
	}

	const references = new Map(manifest.references)
	if (kept.length === 0) {
		references.delete(tag)
	} else {
		references.set(tag, kept)
	}
	return { manifest: { ...manifest, references }, removed }
}

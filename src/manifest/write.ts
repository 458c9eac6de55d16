import { stringify } from "smol-toml"
import { INCLUDE_KEY, REFERENCE_TAGS } from "@/src/constants"
import type { Manifest, ManifestItem } from "@/src/manifest/types"

/**
 * Serialize a Manifest to TOML string.
 * Tables apiref does not own come first, then one array of tables per tag.
 */
export function serializeManifest(manifest: Manifest): string {
	const output: Record<string, unknown> = { ...manifest.extras }

	for (const tag of REFERENCE_TAGS) {
		const items = manifest.references.get(tag)
		if (items && items.length > 0) {
			output[tag] = items.map(serializeItem)
		}
	}

	const toml = stringify(output).trimEnd()
	return `${toml}\n`
}

function serializeItem(item: ManifestItem): Record<string, string> {
	const output: Record<string, string> = { [INCLUDE_KEY]: item.include }
	const keys = Object.keys(item.metadata).sort()
	for (const key of keys) {
		const value = item.metadata[key]
		if (key !== INCLUDE_KEY && value !== undefined) {
			output[key] = value
		}
	}
	return output
}

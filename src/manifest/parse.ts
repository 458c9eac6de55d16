import { parse, TomlError } from "smol-toml"
import { z } from "zod"
import { INCLUDE_KEY, MANIFEST_FILENAME, REFERENCE_TAGS } from "@/src/constants"
import type {
	Manifest,
	ManifestItem,
	ManifestParseResult,
	ReferenceTag,
} from "@/src/manifest/types"
import type { AbsolutePath } from "@/src/types/branded"
import type { ManifestDiscoveredAt } from "@/src/types/context"

const trimmedString = (label: string) =>
	z
		.string()
		.transform((value) => value.trim())
		.refine((value) => value.length > 0, {
			message: `${label} must not be empty.`,
		})

const itemSchema = z
	.object({ [INCLUDE_KEY]: trimmedString(INCLUDE_KEY) })
	.catchall(z.string())
	.transform((value): ManifestItem => {
		const { [INCLUDE_KEY]: include, ...metadata } = value
		return { include, metadata }
	})

const manifestSchema = z
	.object({
		"openapi-project-reference": z.array(itemSchema).optional(),
		"openapi-reference": z.array(itemSchema).optional(),
	})
	.passthrough()

const TAG_SET: ReadonlySet<string> = new Set(REFERENCE_TAGS)

export function parseManifest(
	contents: string,
	sourcePath: AbsolutePath,
	discoveredAt: ManifestDiscoveredAt,
): ManifestParseResult {
	let raw: unknown
	try {
		raw = parse(contents)
	} catch (error) {
		const message = error instanceof TomlError ? error.message : String(error)
		return {
			error: {
				message: `Invalid TOML: ${message}`,
				path: sourcePath,
				rawError: error instanceof Error ? error : undefined,
				source: MANIFEST_FILENAME,
				type: "parse",
			},
			ok: false,
		}
	}

	const result = manifestSchema.safeParse(raw)
	if (!result.success) {
		return {
			error: {
				field: "manifest",
				message: `Invalid ${MANIFEST_FILENAME}.`,
				path: sourcePath,
				source: "zod",
				type: "validation",
				zodError: result.error,
			},
			ok: false,
		}
	}

	const references = new Map<ReferenceTag, readonly ManifestItem[]>()
	for (const tag of REFERENCE_TAGS) {
		const items = result.data[tag]
		if (items && items.length > 0) {
			references.set(tag, items)
		}
	}

	const extras: Record<string, unknown> = {}
	for (const [key, value] of Object.entries(result.data)) {
		if (!TAG_SET.has(key)) {
			extras[key] = value
		}
	}

	const manifest: Manifest = {
		extras,
		origin: { discoveredAt, sourcePath },
		references,
	}
	return { ok: true, value: manifest }
}

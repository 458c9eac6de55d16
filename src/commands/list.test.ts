import { describe, expect, it } from "vitest"
import { listWithSelection } from "@/src/commands/list"
import type { ManifestSelection } from "@/src/commands/manifest-selection"
import type { Manifest } from "@/src/manifest/types"
import { buildManifest } from "@/tests/helpers/manifest"

function buildSelection(manifest: Manifest): ManifestSelection {
	return {
		created: false,
		discoveredAt: "cwd",
		manifest,
		manifestPath: manifest.origin.sourcePath,
		usedParent: false,
	}
}

describe("listWithSelection", () => {
	it("prints one line per reference, grouped by tag", () => {
		const manifest = buildManifest("/work/apiref.toml", [
			{ include: "../server/apiref.toml", tag: "openapi-project-reference" },
			{
				include: "openapi/openapi.json",
				metadata: {
					"code-generator": "orval",
					"source-url": "https://api.example.test/openapi.json",
				},
				tag: "openapi-reference",
			},
		])

		expect(listWithSelection(buildSelection(manifest))).toEqual({
			status: "completed",
			value: [
				"openapi-reference openapi/openapi.json (orval, https://api.example.test/openapi.json)",
				"openapi-project-reference ../server/apiref.toml",
			],
		})
	})

	it("reports an empty manifest", () => {
		const manifest = buildManifest("/work/apiref.toml")

		expect(listWithSelection(buildSelection(manifest))).toEqual({
			reason: "No references in /work/apiref.toml.",
			status: "unchanged",
		})
	})
})

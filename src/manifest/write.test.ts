import { describe, expect, it } from "vitest"
import "@/tests/helpers/assertions"
import { parseManifest } from "@/src/manifest/parse"
import { serializeManifest } from "@/src/manifest/write"
import { abs } from "@/tests/helpers/branded"
import { buildManifest } from "@/tests/helpers/manifest"

const testPath = "/work/apiref.toml"

describe("serializeManifest", () => {
	it("writes one array of tables per tag with include first", () => {
		const manifest = buildManifest(testPath, [
			{
				include: "openapi/openapi.json",
				metadata: {
					"source-url": "https://api.example.test/openapi.json",
					"code-generator": "orval",
				},
				tag: "openapi-reference",
			},
		])

		const lines = serializeManifest(manifest)
			.split("\n")
			.filter((line) => line.length > 0)

		expect(lines).toEqual([
			"[[openapi-reference]]",
			'include = "openapi/openapi.json"',
			'code-generator = "orval"',
			'source-url = "https://api.example.test/openapi.json"',
		])
	})

	it("ends with a single newline", () => {
		const manifest = buildManifest(testPath, [
			{ include: "a.json", tag: "openapi-reference" },
		])

		const output = serializeManifest(manifest)

		expect(output.endsWith('"a.json"\n')).toBe(true)
	})

	it("reads back what it writes, extras included", () => {
		const toml = `
[tooling]
formatter = "biome"

[[openapi-reference]]
include = "a.json"
source-url = "https://api.example.test/a.json"

[[openapi-reference]]
include = "b.json"

[[openapi-project-reference]]
include = "../server/apiref.toml"
`
		const first = parseManifest(toml, abs(testPath), "cwd")
		expect(first).toBeOk()
		if (!first.ok) return

		const second = parseManifest(serializeManifest(first.value), abs(testPath), "cwd")

		expect(second).toBeOk()
		if (second.ok) {
			expect(second.value.extras).toEqual(first.value.extras)
			expect([...second.value.references]).toEqual([...first.value.references])
		}
	})
})

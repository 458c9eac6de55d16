import { describe, expect, it } from "vitest"
import "@/tests/helpers/assertions"
import { parseManifest } from "@/src/manifest/parse"
import { abs } from "@/tests/helpers/branded"

const testPath = abs("/work/apiref.toml")

describe("parseManifest", () => {
	it("rejects invalid TOML syntax", () => {
		const result = parseManifest("[[openapi-reference]\ninclude = 1", testPath, "cwd")

		expect(result).toBeErrOfType("parse")
		if (!result.ok) {
			expect(result.error.message).toContain("Invalid TOML")
		}
	})

	it("parses an empty manifest", () => {
		const result = parseManifest("", testPath, "cwd")

		expect(result).toBeOk()
		if (result.ok) {
			expect(result.value.references.size).toBe(0)
			expect(result.value.extras).toEqual({})
			expect(result.value.origin).toEqual({ discoveredAt: "cwd", sourcePath: testPath })
		}
	})

	it("splits include from metadata for each tag", () => {
		const toml = `
[[openapi-reference]]
include = "openapi/openapi.json"
source-url = "https://api.example.test/openapi.json"
code-generator = "orval"

[[openapi-project-reference]]
include = "../server/apiref.toml"
`
		const result = parseManifest(toml, testPath, "explicit")

		expect(result).toBeOk()
		if (result.ok) {
			expect(result.value.references.get("openapi-reference")).toEqual([
				{
					include: "openapi/openapi.json",
					metadata: {
						"code-generator": "orval",
						"source-url": "https://api.example.test/openapi.json",
					},
				},
			])
			expect(result.value.references.get("openapi-project-reference")).toEqual([
				{ include: "../server/apiref.toml", metadata: {} },
			])
		}
	})

	it("preserves tables it does not own", () => {
		const toml = `
[tooling]
formatter = "biome"

[[openapi-reference]]
include = "a.json"
`
		const result = parseManifest(toml, testPath, "cwd")

		expect(result).toBeOk()
		if (result.ok) {
			expect(result.value.extras).toEqual({ tooling: { formatter: "biome" } })
		}
	})

	it("rejects items without an include", () => {
		const toml = `
[[openapi-reference]]
source-url = "https://api.example.test/openapi.json"
`
		expect(parseManifest(toml, testPath, "cwd")).toBeErrOfType("validation")
	})

	it("rejects non-string metadata values", () => {
		const toml = `
[[openapi-reference]]
include = "a.json"
retries = 3
`
		expect(parseManifest(toml, testPath, "cwd")).toBeErrOfType("validation")
	})

	it("rejects a blank include", () => {
		const toml = `
[[openapi-reference]]
include = "   "
`
		expect(parseManifest(toml, testPath, "cwd")).toBeErrOfType("validation")
	})
})

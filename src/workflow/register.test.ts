import { readFile, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { describe, expect, it, vi } from "vitest"
import "@/tests/helpers/assertions"
import { CommandResult } from "@/src/commands/types"
import { downloadToFile } from "@/src/download/fetch"
import { createEmptyManifest, loadManifest, saveManifest } from "@/src/manifest/fs"
import { getItems } from "@/src/manifest/transform"
import type { ProjectManifest } from "@/src/manifest/types"
import { buildRequirements, type PackageRequirements } from "@/src/packages/types"
import { resolveInclude } from "@/src/references/register"
import type { AbsolutePath } from "@/src/types/branded"
import type { InstallError, Result } from "@/src/types/errors"
import {
	type ReferenceSource,
	runRegistration,
	type WorkflowDependencies,
} from "@/src/workflow/register"
import { abs } from "@/tests/helpers/branded"
import { exists, withTempDir } from "@/tests/helpers/fs"

const sourceUrl = "https://api.example.test/openapi.json"
const document = '{"openapi": "3.0.1"}'

function createHarness(
	dir: AbsolutePath,
	overrides: {
		project?: ProjectManifest
		installResult?: Result<void, InstallError>
		body?: string
		selection?: CommandResult<ProjectManifest>
	} = {},
) {
	const project: ProjectManifest = overrides.project ?? {
		created: true,
		manifest: createEmptyManifest(abs(join(dir, "apiref.toml")), "cwd"),
		manifestPath: abs(join(dir, "apiref.toml")),
	}
	const install = vi.fn(
		async (
			_packages: PackageRequirements,
			_projectDir: AbsolutePath,
		): Promise<Result<void, InstallError>> =>
			overrides.installResult ?? { ok: true, value: undefined },
	)
	const resolvePackages = vi.fn(async () => buildRequirements([["openapi-typescript", "7.4.1"]]))
	const selectManifest = vi.fn(
		async (): Promise<CommandResult<ProjectManifest>> =>
			overrides.selection ?? CommandResult.completed(project),
	)
	const body = overrides.body ?? document
	const deps: WorkflowDependencies = {
		download: (url, destination, options) =>
			downloadToFile(url, destination, {
				...options,
				fetch: async () => new Response(body),
			}),
		installer: { install },
		resolvePackages,
		saveManifest,
		selectManifest,
	}

	return {
		deps,
		install,
		resolvePackages,
		selectManifest,
	}
}

function urlSource(value: string | undefined, outputFile?: string): ReferenceSource {
	return { kind: "url", outputFile, sourceUrl: value }
}

async function loadFrom(dir: string): Promise<ProjectManifest> {
	const loaded = await loadManifest(abs(join(dir, "apiref.toml")), "cwd")
	if (!loaded.ok) {
		throw new Error(loaded.error.message)
	}
	return loaded.value
}

describe("runRegistration", () => {
	it("downloads, adds packages and records a new URL reference", async () => {
		await withTempDir(async (dir) => {
			const harness = createHarness(dir)

			const result = await runRegistration(
				{ cwd: dir, source: urlSource(sourceUrl) },
				harness.deps,
			)

			expect(result).toEqual({
				download: { path: join(dir, "openapi/openapi.json"), status: "written" },
				include: "openapi/openapi.json",
				manifestPath: join(dir, "apiref.toml"),
				registration: "added",
				state: "done",
			})
			expect(harness.resolvePackages).toHaveBeenCalledWith("openapi-typescript")
			expect(harness.install).toHaveBeenCalledTimes(1)
			expect(harness.install.mock.calls[0]?.[1]).toBe(dir)
			expect(await readFile(join(dir, "openapi/openapi.json"), "utf8")).toBe(document)

			const saved = await loadFrom(dir)
			expect(getItems(saved.manifest, "openapi-reference")).toEqual([
				{
					include: "openapi/openapi.json",
					metadata: { "code-generator": "openapi-typescript", "source-url": sourceUrl },
				},
			])
		})
	})

	it("downloads to the same file the manifest records", async () => {
		await withTempDir(async (dir) => {
			const harness = createHarness(dir)

			const result = await runRegistration(
				{ cwd: dir, source: urlSource(sourceUrl, " specs/api.json ") },
				harness.deps,
			)

			expect(result.state).toBe("done")
			if (result.state !== "done") return
			const saved = await loadFrom(dir)
			expect(result.include).toBe("specs/api.json")
			expect(result.download?.path).toBe(resolveInclude(saved.manifest, result.include))
			expect(await readFile(join(dir, "specs/api.json"), "utf8")).toBe(document)
			expect(await exists(join(dir, " specs"))).toBe(false)
		})
	})

	it("records the selected generator", async () => {
		await withTempDir(async (dir) => {
			const harness = createHarness(dir)

			await runRegistration(
				{ cwd: dir, generator: "Orval", source: urlSource(sourceUrl) },
				harness.deps,
			)

			expect(harness.resolvePackages).toHaveBeenCalledWith("orval")
			const saved = await loadFrom(dir)
			expect(getItems(saved.manifest, "openapi-reference")[0]?.metadata["code-generator"]).toBe(
				"orval",
			)
		})
	})

	it("rejects an invalid URL before any side effect", async () => {
		await withTempDir(async (dir) => {
			const harness = createHarness(dir)

			const result = await runRegistration(
				{ cwd: dir, source: urlSource("not-a-url") },
				harness.deps,
			)

			expect(result.state).toBe("rejected")
			if (result.state === "rejected") {
				expect(result.error.message).toBe(
					"source-URL was not valid. Valid values are URLs: not-a-url",
				)
			}
			expect(harness.selectManifest).not.toHaveBeenCalled()
			expect(harness.install).not.toHaveBeenCalled()
			expect(await exists(join(dir, "apiref.toml"))).toBe(false)
			expect(await exists(join(dir, "openapi"))).toBe(false)
		})
	})

	it("rejects a missing URL", async () => {
		await withTempDir(async (dir) => {
			const harness = createHarness(dir)

			const result = await runRegistration(
				{ cwd: dir, source: urlSource(undefined) },
				harness.deps,
			)

			expect(result.state === "rejected" && result.error.message).toBe(
				"A source URL is required.",
			)
		})
	})

	it("rejects an unknown generator", async () => {
		await withTempDir(async (dir) => {
			const harness = createHarness(dir)

			const result = await runRegistration(
				{ cwd: dir, generator: "swagger-codegen", source: urlSource(sourceUrl) },
				harness.deps,
			)

			expect(result.state === "rejected" && result.error.message).toBe(
				"Invalid value 'swagger-codegen' given as code generator. Valid values are openapi-typescript, orval, hey-api.",
			)
			expect(harness.install).not.toHaveBeenCalled()
		})
	})

	it("stops before downloading when adding a package fails", async () => {
		await withTempDir(async (dir) => {
			const installError: InstallError = {
				message: "Could not add package `openapi-typescript`.",
				packageId: "openapi-typescript",
				projectDir: dir,
				reason: "exit",
				stderr: "E404",
				stdout: "",
				type: "install",
			}
			const harness = createHarness(dir, {
				installResult: { error: installError, ok: false },
			})

			const result = await runRegistration(
				{ cwd: dir, source: urlSource(sourceUrl) },
				harness.deps,
			)

			expect(result).toEqual({
				error: installError,
				stage: "ensure-dependencies",
				state: "failed",
			})
			expect(await exists(join(dir, "openapi"))).toBe(false)
			expect(await exists(join(dir, "apiref.toml"))).toBe(false)
		})
	})

	it("leaves the manifest alone when the download conflicts", async () => {
		await withTempDir(async (dir) => {
			await writeFile(join(dir, "local.json"), "local edits")
			const harness = createHarness(dir)

			const result = await runRegistration(
				{ cwd: dir, source: urlSource(sourceUrl, "local.json") },
				harness.deps,
			)

			expect(result.state).toBe("failed")
			if (result.state === "failed") {
				expect(result.stage).toBe("acquire-content")
				expect(result.error.type).toBe("download")
			}
			expect(await exists(join(dir, "apiref.toml"))).toBe(false)
		})
	})

	it("reports a repeated registration as a duplicate path", async () => {
		await withTempDir(async (dir) => {
			await runRegistration({ cwd: dir, source: urlSource(sourceUrl) }, createHarness(dir).deps)
			const first = await readFile(join(dir, "apiref.toml"), "utf8")

			const harness = createHarness(dir, { project: await loadFrom(dir) })
			const result = await runRegistration(
				{ cwd: dir, source: urlSource(sourceUrl) },
				harness.deps,
			)

			expect(result.state).toBe("done")
			if (result.state === "done") {
				expect(result.registration).toBe("duplicate-path")
				expect(result.download?.status).toBe("unchanged")
			}
			expect(await readFile(join(dir, "apiref.toml"), "utf8")).toBe(first)
		})
	})

	it("reports the same URL at another path as a duplicate identity", async () => {
		await withTempDir(async (dir) => {
			await runRegistration({ cwd: dir, source: urlSource(sourceUrl) }, createHarness(dir).deps)
			const first = await readFile(join(dir, "apiref.toml"), "utf8")

			const harness = createHarness(dir, { project: await loadFrom(dir) })
			const result = await runRegistration(
				{ cwd: dir, source: urlSource(sourceUrl, "specs/copy.json") },
				harness.deps,
			)

			expect(result.state === "done" && result.registration).toBe("duplicate-identity")
			expect(await readFile(join(dir, "apiref.toml"), "utf8")).toBe(first)
		})
	})

	it("records an existing local file without downloading", async () => {
		await withTempDir(async (dir) => {
			await writeFile(join(dir, "api.yaml"), "openapi: 3.0.1\n")
			const harness = createHarness(dir)

			const result = await runRegistration(
				{ cwd: dir, source: { kind: "file", path: "api.yaml" } },
				harness.deps,
			)

			expect(result).toEqual({
				download: undefined,
				include: "api.yaml",
				manifestPath: join(dir, "apiref.toml"),
				registration: "added",
				state: "done",
			})
			const saved = await loadFrom(dir)
			expect(getItems(saved.manifest, "openapi-reference")).toEqual([
				{ include: "api.yaml", metadata: { "code-generator": "openapi-typescript" } },
			])
		})
	})

	it("records a project reference under its own tag", async () => {
		await withTempDir(async (dir) => {
			await writeFile(join(dir, "server.toml"), "")
			const harness = createHarness(dir)

			await runRegistration(
				{ cwd: dir, source: { kind: "project", path: "server.toml" } },
				harness.deps,
			)

			const saved = await loadFrom(dir)
			expect(getItems(saved.manifest, "openapi-project-reference")).toEqual([
				{ include: "server.toml", metadata: { "code-generator": "openapi-typescript" } },
			])
		})
	})

	it("rejects a local file that does not exist", async () => {
		await withTempDir(async (dir) => {
			const harness = createHarness(dir)

			const result = await runRegistration(
				{ cwd: dir, source: { kind: "file", path: "missing.json" } },
				harness.deps,
			)

			expect(result.state === "rejected" && result.error.message).toBe(
				`The file '${join(dir, "missing.json")}' does not exist or is not a file.`,
			)
			expect(harness.install).not.toHaveBeenCalled()
		})
	})

	it("stops when manifest selection is cancelled", async () => {
		await withTempDir(async (dir) => {
			const harness = createHarness(dir, { selection: CommandResult.cancelled() })

			const result = await runRegistration(
				{ cwd: dir, source: urlSource(sourceUrl) },
				harness.deps,
			)

			expect(result).toEqual({ state: "cancelled" })
			expect(harness.install).not.toHaveBeenCalled()
		})
	})
})

import path from "node:path"
import { consola } from "consola"
import type { CommandResult } from "@/src/commands/types"
import {
	CODE_GENERATOR_KEY,
	DEFAULT_OPENAPI_DIR,
	DEFAULT_OPENAPI_FILE,
	OPENAPI_PROJECT_REFERENCE,
	OPENAPI_REFERENCE,
} from "@/src/constants"
import type { DownloadOptions, DownloadOutcome, DownloadResult } from "@/src/download/fetch"
import {
	coerceGeneratorId,
	DEFAULT_GENERATOR,
	GENERATOR_IDS,
	type GeneratorId,
} from "@/src/generators/registry"
import { ensureDir, safeStat } from "@/src/io/fs"
import type { Manifest, ProjectManifest, ReferenceTag } from "@/src/manifest/types"
import type { DependencyInstaller } from "@/src/packages/install"
import type { PackageRequirements } from "@/src/packages/types"
import { type RegistrationStatus, registerReference } from "@/src/references/register"
import type { AbsolutePath, SourceUrl } from "@/src/types/branded"
import { coerceAbsolutePath, coerceSourceUrl } from "@/src/types/coerce"
import type { ApiRefError, Result, ValidationError } from "@/src/types/errors"

export type ReferenceSource =
	| { kind: "url"; sourceUrl: string | undefined; outputFile?: string }
	| { kind: "file"; path: string | undefined }
	| { kind: "project"; path: string | undefined }

export interface RegistrationRequest {
	source: ReferenceSource
	generator?: string
	cwd: AbsolutePath
}

export type WorkflowStage =
	| "resolve-inputs"
	| "ensure-dependencies"
	| "acquire-content"
	| "register-reference"

export interface WorkflowDependencies {
	selectManifest(): Promise<CommandResult<ProjectManifest>>
	resolvePackages(generator: GeneratorId): Promise<PackageRequirements>
	installer: DependencyInstaller
	download(
		sourceUrl: SourceUrl,
		destinationPath: string,
		options: Pick<DownloadOptions, "cwd" | "overwrite">,
	): Promise<DownloadResult>
	saveManifest(manifest: Manifest, manifestPath: AbsolutePath): Promise<Result<void>>
}

export type WorkflowResult =
	| {
			state: "done"
			registration: RegistrationStatus
			include: string
			manifestPath: AbsolutePath
			download?: DownloadOutcome
	  }
	| { state: "rejected"; error: ApiRefError }
	| { state: "cancelled" }
	| { state: "failed"; stage: WorkflowStage; error: ApiRefError }

interface ResolvedInputs {
	tag: ReferenceTag
	generator: GeneratorId
	project: ProjectManifest
	/** Absolute local path of the referenced document or project. */
	localPath: AbsolutePath
	sourceUrl?: SourceUrl
}

/**
 * Register an API document reference:
 * resolve inputs, add the generator's packages, download remote content,
 * then record the reference. The manifest is only written in the last step,
 * so any earlier failure leaves it untouched.
 */
export async function runRegistration(
	request: RegistrationRequest,
	deps: WorkflowDependencies,
): Promise<WorkflowResult> {
	const inputs = await resolveInputs(request, deps)
	if (inputs.state !== "resolved") {
		return inputs
	}
	const { generator, project } = inputs.value
	const projectDir = path.dirname(project.manifestPath) as AbsolutePath

	consola.start("Updating dependencies...")
	const packages = await deps.resolvePackages(generator)
	const installed = await deps.installer.install(packages, projectDir)
	if (!installed.ok) {
		return { error: installed.error, stage: "ensure-dependencies", state: "failed" }
	}

	let download: DownloadOutcome | undefined
	if (inputs.value.sourceUrl) {
		const downloaded = await deps.download(
			inputs.value.sourceUrl,
			inputs.value.localPath,
			{ cwd: request.cwd, overwrite: false },
		)
		if (!downloaded.ok) {
			return { error: downloaded.error, stage: "acquire-content", state: "failed" }
		}
		download = downloaded.value
	}

	const include = toInclude(project.manifestPath, inputs.value.localPath)
	const registration = registerReference(project.manifest, {
		include,
		metadata: { [CODE_GENERATOR_KEY]: generator },
		sourceUrl: inputs.value.sourceUrl,
		tag: inputs.value.tag,
	})

	switch (registration.status) {
		case "duplicate-path":
			consola.warn(
				`One or more references to ${include} already exist. Duplicate references could lead to unexpected behavior.`,
			)
			break
		case "duplicate-identity":
			consola.warn(
				`A reference to '${inputs.value.sourceUrl ?? include}' already exists in '${project.manifestPath}'.`,
			)
			break
		case "added": {
			const saved = await persist(registration.manifest, project, deps)
			if (!saved.ok) {
				return { error: saved.error, stage: "register-reference", state: "failed" }
			}
			consola.success(`Added reference: ${include}.`)
			break
		}
	}

	return {
		download,
		include,
		manifestPath: project.manifestPath,
		registration: registration.status,
		state: "done",
	}
}

type InputsResult =
	| { state: "resolved"; value: ResolvedInputs }
	| { state: "rejected"; error: ApiRefError }
	| { state: "cancelled" }

async function resolveInputs(
	request: RegistrationRequest,
	deps: WorkflowDependencies,
): Promise<InputsResult> {
	const generator =
		request.generator === undefined ? DEFAULT_GENERATOR : coerceGeneratorId(request.generator)
	if (!generator) {
		return reject(
			"code-generator",
			`Invalid value '${request.generator}' given as code generator. Valid values are ${GENERATOR_IDS.join(", ")}.`,
		)
	}

	const source = request.source
	let tag: ReferenceTag
	let localPath: AbsolutePath
	let sourceUrl: SourceUrl | undefined

	if (source.kind === "url") {
		if (!source.sourceUrl || source.sourceUrl.trim().length === 0) {
			return reject("source-url", "A source URL is required.")
		}
		const url = coerceSourceUrl(source.sourceUrl)
		if (!url) {
			return reject(
				"source-url",
				`source-URL was not valid. Valid values are URLs: ${source.sourceUrl}`,
			)
		}
		const outputFile =
			source.outputFile ?? path.join(DEFAULT_OPENAPI_DIR, DEFAULT_OPENAPI_FILE)
		const destination = coerceAbsolutePath(outputFile, request.cwd)
		if (!destination) {
			return reject("output-file", "Output file must not be empty.")
		}
		tag = OPENAPI_REFERENCE
		localPath = destination
		sourceUrl = url
	} else {
		const label = source.kind === "file" ? "source-file" : "source-project"
		const resolved = coerceAbsolutePath(source.path ?? "", request.cwd)
		if (!resolved) {
			return reject(label, `A ${source.kind} path is required.`)
		}
		const stats = await safeStat(resolved)
		if (!stats.ok) {
			return { error: stats.error, state: "rejected" }
		}
		if (!stats.value?.isFile()) {
			return reject(label, `The ${source.kind} '${resolved}' does not exist or is not a file.`)
		}
		tag = source.kind === "file" ? OPENAPI_REFERENCE : OPENAPI_PROJECT_REFERENCE
		localPath = resolved
	}

	const selected = await deps.selectManifest()
	switch (selected.status) {
		case "cancelled":
			return { state: "cancelled" }
		case "failed":
			return { error: selected.error, state: "rejected" }
		case "unchanged":
			return reject("project", selected.reason)
		case "completed":
			return {
				state: "resolved",
				value: { generator, localPath, project: selected.value, sourceUrl, tag },
			}
	}
}

function reject(field: string, message: string): { state: "rejected"; error: ValidationError } {
	return {
		error: { field, message, source: "manual", type: "validation" },
		state: "rejected",
	}
}

async function persist(
	manifest: Manifest,
	project: ProjectManifest,
	deps: WorkflowDependencies,
): Promise<Result<void>> {
	if (project.created) {
		const ensured = await ensureDir(path.dirname(project.manifestPath))
		if (!ensured.ok) {
			return ensured
		}
		consola.info(`Created ${project.manifestPath}.`)
	}
	return deps.saveManifest(manifest, project.manifestPath)
}

/**
 * Include recorded for a registration: the resolved local path made relative
 * to the manifest directory, with forward slashes. This is not the path as
 * typed on the command line; registerReference stores whatever it is given,
 * and the workflow always gives it this form.
 */
export function toInclude(manifestPath: AbsolutePath, localPath: AbsolutePath): string {
	const relative = path.relative(path.dirname(manifestPath), localPath)
	return relative.split(path.sep).join("/")
}

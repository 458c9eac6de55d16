import { consola } from "consola"
import { resolveCwd, resolveProjectManifest } from "@/src/commands/manifest-selection"
import { CommandResult, printOutcome } from "@/src/commands/types"
import { downloadToFile } from "@/src/download/fetch"
import { env } from "@/src/env"
import { loadGeneratorTable } from "@/src/generators/registry"
import { saveManifest } from "@/src/manifest/fs"
import { createNpmInstaller } from "@/src/packages/install"
import { resolvePackageVersions } from "@/src/packages/resolve"
import type { AbsolutePath } from "@/src/types/branded"
import type { Result, ValidationError } from "@/src/types/errors"
import {
	type ReferenceSource,
	runRegistration,
	type WorkflowDependencies,
	type WorkflowResult,
} from "@/src/workflow/register"

export interface AddCommandOptions {
	codeGenerator?: string
	project?: string
	init: boolean
	nonInteractive: boolean
}

export async function runAddCommand(
	source: ReferenceSource,
	options: AddCommandOptions,
): Promise<void> {
	const cwdResult = resolveCwd()
	if (cwdResult.status !== "completed") {
		printOutcome(cwdResult)
		return
	}
	const cwd = cwdResult.value

	const deps = buildWorkflowDependencies(options, cwd)
	if (!deps.ok) {
		printOutcome(CommandResult.failed(deps.error))
		return
	}

	const result = await runRegistration(
		{ cwd, generator: options.codeGenerator, source },
		deps.value,
	)
	printOutcome(toCommandResult(result))
}

export function buildWorkflowDependencies(
	options: AddCommandOptions,
	cwd: AbsolutePath,
): Result<WorkflowDependencies, ValidationError> {
	const table = loadGeneratorTable()
	if (!table.ok) {
		return table
	}

	return {
		ok: true,
		value: {
			download: (sourceUrl, destinationPath, downloadOptions) =>
				downloadToFile(sourceUrl, destinationPath, downloadOptions),
			installer: createNpmInstaller({
				command: env.APIREF_NPM_PATH,
				timeoutMs: env.APIREF_INSTALL_TIMEOUT_MS,
			}),
			resolvePackages: (generator) =>
				resolvePackageVersions(generator, {
					table: table.value,
					timeoutMs: env.APIREF_VERSION_LOOKUP_TIMEOUT_MS,
					url: env.APIREF_PACKAGE_VERSIONS_URL,
				}),
			saveManifest,
			selectManifest: () =>
				resolveProjectManifest({
					createIfMissing: options.init,
					cwd,
					nonInteractive: options.nonInteractive,
					project: options.project,
				}),
		},
	}
}

export function toCommandResult(result: WorkflowResult): CommandResult<string> {
	switch (result.state) {
		case "cancelled":
			return CommandResult.cancelled()
		case "rejected":
		case "failed":
			return CommandResult.failed(result.error)
		case "done":
			if (result.registration === "added") {
				consola.info(`Manifest: ${result.manifestPath} (updated).`)
				return CommandResult.completed(result.include)
			}
			return CommandResult.unchanged(
				`Reference already present: ${result.include}. Manifest: ${result.manifestPath} (no changes).`,
			)
	}
}

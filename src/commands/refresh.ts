import path from "node:path"
import { consola } from "consola"
import {
	type ManifestSelection,
	resolveCwd,
	resolveProjectManifest,
} from "@/src/commands/manifest-selection"
import { CommandResult, printOutcome } from "@/src/commands/types"
import { OPENAPI_REFERENCE } from "@/src/constants"
import { type DownloadOutcome, downloadToFile } from "@/src/download/fetch"
import { findReferences, resolveInclude } from "@/src/references/register"
import type { AbsolutePath } from "@/src/types/branded"
import { coerceSourceUrl } from "@/src/types/coerce"

export interface RefreshCommandOptions {
	project?: string
}

export async function refreshCommand(
	sourceUrl: string,
	options: RefreshCommandOptions,
): Promise<void> {
	consola.info("apiref refresh")

	const cwdResult = resolveCwd()
	if (cwdResult.status !== "completed") {
		printOutcome(cwdResult)
		return
	}
	const cwd = cwdResult.value

	const selection = await resolveProjectManifest({
		createIfMissing: false,
		cwd,
		nonInteractive: true,
		project: options.project,
	})
	if (selection.status !== "completed") {
		printOutcome(selection)
		return
	}

	printOutcome(await refreshWithSelection(selection.value, sourceUrl, {}))
}

/**
 * Download every reference recorded for sourceUrl again, replacing the
 * local copy. The manifest itself is not changed.
 */
export async function refreshWithSelection(
	selection: ManifestSelection,
	sourceUrl: string,
	options: { fetch?: typeof fetch },
): Promise<CommandResult<DownloadOutcome[]>> {
	const url = coerceSourceUrl(sourceUrl)
	if (!url) {
		return CommandResult.failed({
			field: "source-url",
			message: `source-URL was not valid. Valid values are URLs: ${sourceUrl}`,
			source: "manual",
			type: "validation",
		})
	}

	const items = findReferences(selection.manifest, {
		sourceUrl: url,
		tag: OPENAPI_REFERENCE,
	})
	if (items.length === 0) {
		return CommandResult.failed({
			message: `No reference to '${url}' found in '${selection.manifestPath}'.`,
			path: selection.manifestPath,
			target: "reference",
			type: "not_found",
		})
	}

	const outcomes: DownloadOutcome[] = []
	for (const item of items) {
		const destination = resolveInclude(selection.manifest, item.include)
		const downloaded = await downloadToFile(url, destination, {
			cwd: path.dirname(selection.manifestPath) as AbsolutePath,
			fetch: options.fetch,
			overwrite: true,
		})
		if (!downloaded.ok) {
			return CommandResult.failed(downloaded.error)
		}
		consola.success(`Refreshed reference: ${item.include}.`)
		outcomes.push(downloaded.value)
	}

	return CommandResult.completed(outcomes)
}

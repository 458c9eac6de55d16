import path from "node:path"
import { consola } from "consola"
import {
	type ManifestSelection,
	resolveCwd,
	resolveProjectManifest,
} from "@/src/commands/manifest-selection"
import { CommandResult, printOutcome } from "@/src/commands/types"
import { REFERENCE_TAGS } from "@/src/constants"
import { saveManifest } from "@/src/manifest/fs"
import type { ManifestItem } from "@/src/manifest/types"
import { unregisterReference } from "@/src/references/register"
import type { AbsolutePath } from "@/src/types/branded"
import { coerceSourceUrl } from "@/src/types/coerce"

export interface RemoveCommandOptions {
	project?: string
}

export async function removeCommand(
	reference: string,
	options: RemoveCommandOptions,
): Promise<void> {
	consola.info("apiref remove")

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

	printOutcome(await removeWithSelection(selection.value, reference, cwd))
}

/**
 * Drop every reference whose source URL or local path matches. A path is
 * taken relative to cwd, the same way it was given when the reference was added.
 */
export async function removeWithSelection(
	selection: ManifestSelection,
	reference: string,
	cwd: AbsolutePath,
): Promise<CommandResult<ManifestItem[]>> {
	const trimmed = reference.trim()
	if (!trimmed) {
		return CommandResult.failed({
			field: "reference",
			message: "A source URL or path is required.",
			source: "manual",
			type: "validation",
		})
	}

	const sourceUrl = coerceSourceUrl(trimmed)
	const selector = sourceUrl
		? { sourceUrl }
		: { include: path.resolve(cwd, trimmed) }

	let manifest = selection.manifest
	const removed: ManifestItem[] = []
	for (const tag of REFERENCE_TAGS) {
		const result = unregisterReference(manifest, { ...selector, tag })
		manifest = result.manifest
		removed.push(...result.removed)
	}

	if (removed.length === 0) {
		return CommandResult.unchanged(
			`No reference to ${trimmed} found in ${selection.manifestPath}.`,
		)
	}

	const saved = await saveManifest(manifest, selection.manifestPath)
	if (!saved.ok) {
		return CommandResult.failed(saved.error)
	}

	for (const item of removed) {
		consola.success(`Removed reference: ${item.include}.`)
	}
	consola.info(`Manifest: ${selection.manifestPath} (updated).`)
	return CommandResult.completed(removed)
}

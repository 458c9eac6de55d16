import path from "node:path"
import { confirm, isCancel } from "@clack/prompts"
import { consola } from "consola"
import { CommandResult } from "@/src/commands/types"
import { MANIFEST_FILENAME } from "@/src/constants"
import { safeStat } from "@/src/io/fs"
import { findProjectRoot } from "@/src/manifest/discover"
import { createEmptyManifest, loadManifest } from "@/src/manifest/fs"
import type { ProjectManifest } from "@/src/manifest/types"
import type { AbsolutePath } from "@/src/types/branded"
import { coerceAbsolutePath, coerceAbsolutePathDirect } from "@/src/types/coerce"
import type { ManifestDiscoveredAt } from "@/src/types/context"

export interface ManifestSelection extends ProjectManifest {
	discoveredAt: ManifestDiscoveredAt
	usedParent: boolean
}

export interface ManifestSelectionOptions {
	cwd: AbsolutePath
	/** Explicit manifest file, or a directory containing one. */
	project?: string
	createIfMissing: boolean
	nonInteractive: boolean
}

export async function resolveProjectManifest(
	options: ManifestSelectionOptions,
): Promise<CommandResult<ManifestSelection>> {
	if (options.project !== undefined) {
		return resolveExplicitManifest(options.project, options)
	}

	const rootResult = await findProjectRoot(options.cwd)
	if (!rootResult.ok) {
		return CommandResult.failed(rootResult.error)
	}

	if (!rootResult.value) {
		return resolveMissingManifest(
			path.join(options.cwd, MANIFEST_FILENAME) as AbsolutePath,
			"cwd",
			options,
		)
	}

	const projectRoot = rootResult.value
	const manifestPath = path.join(projectRoot, MANIFEST_FILENAME) as AbsolutePath
	const usedParent = projectRoot !== options.cwd
	const selection = await loadSelection(manifestPath, usedParent ? "parent" : "cwd")
	if (selection.status === "completed" && usedParent) {
		consola.warn(`Using ${manifestPath} from a parent directory.`)
	}
	return selection
}

async function resolveExplicitManifest(
	project: string,
	options: ManifestSelectionOptions,
): Promise<CommandResult<ManifestSelection>> {
	const requested = coerceAbsolutePath(project, options.cwd)
	if (!requested) {
		return CommandResult.failed({
			field: "project",
			message: "Project path must not be empty.",
			source: "manual",
			type: "validation",
		})
	}

	const stats = await safeStat(requested)
	if (!stats.ok) {
		return CommandResult.failed(stats.error)
	}

	const manifestPath = stats.value?.isDirectory()
		? (path.join(requested, MANIFEST_FILENAME) as AbsolutePath)
		: requested

	const manifestStats =
		manifestPath === requested ? stats : await safeStat(manifestPath)
	if (!manifestStats.ok) {
		return CommandResult.failed(manifestStats.error)
	}

	if (!manifestStats.value) {
		return resolveMissingManifest(manifestPath, "explicit", options)
	}

	return loadSelection(manifestPath, "explicit")
}

async function loadSelection(
	manifestPath: AbsolutePath,
	discoveredAt: ManifestDiscoveredAt,
): Promise<CommandResult<ManifestSelection>> {
	const loaded = await loadManifest(manifestPath, discoveredAt)
	if (!loaded.ok) {
		return CommandResult.failed(loaded.error)
	}
	return CommandResult.completed({
		created: false,
		discoveredAt,
		manifest: loaded.value.manifest,
		manifestPath,
		usedParent: discoveredAt === "parent",
	})
}

async function resolveMissingManifest(
	manifestPath: AbsolutePath,
	discoveredAt: ManifestDiscoveredAt,
	options: ManifestSelectionOptions,
): Promise<CommandResult<ManifestSelection>> {
	if (options.createIfMissing) {
		return CommandResult.completed(createSelection(manifestPath, discoveredAt))
	}

	if (options.nonInteractive) {
		return CommandResult.failed({
			message: `No ${MANIFEST_FILENAME} found.`,
			path: manifestPath,
			target: "manifest",
			type: "not_found",
		})
	}

	const shouldCreate = await confirm({
		initialValue: false,
		message: `No ${MANIFEST_FILENAME} found. Create ${manifestPath}?`,
	})
	if (isCancel(shouldCreate) || !shouldCreate) {
		return CommandResult.cancelled()
	}

	return CommandResult.completed(createSelection(manifestPath, discoveredAt))
}

function createSelection(
	manifestPath: AbsolutePath,
	discoveredAt: ManifestDiscoveredAt,
): ManifestSelection {
	return {
		created: true,
		discoveredAt,
		manifest: createEmptyManifest(manifestPath, discoveredAt),
		manifestPath,
		usedParent: false,
	}
}

export function resolveCwd(): CommandResult<AbsolutePath> {
	const cwd = coerceAbsolutePathDirect(process.cwd())
	if (!cwd) {
		return CommandResult.failed({
			field: "cwd",
			message: "Unable to resolve current working directory.",
			source: "manual",
			type: "validation",
		})
	}
	return CommandResult.completed(cwd)
}

import { realpathSync } from "node:fs"
import { stat } from "node:fs/promises"
import { homedir } from "node:os"
import path from "node:path"
import { MANIFEST_FILENAME } from "@/src/constants"
import { isNotFound } from "@/src/io/fs"
import type {
	ManifestDiscoveryError,
	ManifestDiscoveryResult,
} from "@/src/manifest/types"
import type { AbsolutePath } from "@/src/types/branded"

type FileExistsResult =
	| { ok: true; value: boolean }
	| { ok: false; error: ManifestDiscoveryError }

type StatResult =
	| { ok: true; value: Awaited<ReturnType<typeof stat>> }
	| { ok: false; error: ManifestDiscoveryError }

export interface FindProjectRootOptions {
	/** Upper bound for the walk when startDir is inside it. Defaults to the home directory. */
	homeDir?: string
}

/**
 * Walk up from startDir to find the closest apiref.toml.
 * Stops at the home directory boundary (if inside home) or filesystem root.
 */
export async function findProjectRoot(
	startDir: string,
	options: FindProjectRootOptions = {},
): Promise<ManifestDiscoveryResult> {
	const absoluteStart = path.resolve(startDir) as AbsolutePath
	const startStat = await safeStat(absoluteStart)
	if (!startStat.ok) {
		return startStat
	}

	if (!startStat.value.isDirectory()) {
		return {
			error: {
				field: "start",
				message: "Manifest discovery start path must be a directory.",
				path: absoluteStart,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	const homeDir = path.resolve(options.homeDir ?? homedir())
	const rootDir = path.parse(absoluteStart).root
	const stopDir = isWithinHome(absoluteStart, homeDir) ? homeDir : rootDir

	let current: string = absoluteStart
	while (true) {
		const manifestPath = path.join(current, MANIFEST_FILENAME) as AbsolutePath
		const existsResult = await fileExists(manifestPath, current)
		if (!existsResult.ok) {
			return existsResult
		}

		if (existsResult.value) {
			return { ok: true, value: current as AbsolutePath }
		}

		if (samePath(current, stopDir)) {
			break
		}

		const parent = path.dirname(current)
		if (parent === current) {
			break
		}

		current = parent
	}

	return { ok: true, value: null }
}

function samePath(left: string, right: string): boolean {
	return canonical(left) === canonical(right)
}

function canonical(candidate: string): string {
	try {
		return realpathSync(candidate)
	} catch {
		return candidate
	}
}

/**
 * Check if candidate path is within homeDir, handling symlinks.
 * Both paths are resolved to their canonical form before comparison.
 */
function isWithinHome(candidate: string, homeDir: string): boolean {
	const realCandidate = canonical(candidate)
	const realHome = canonical(homeDir)

	if (realCandidate === realHome) {
		return true
	}

	const relative = path.relative(realHome, realCandidate)
	return relative.length > 0 && !relative.startsWith("..") && !path.isAbsolute(relative)
}

async function fileExists(
	filePath: AbsolutePath,
	currentDir: string,
): Promise<FileExistsResult> {
	try {
		const stats = await stat(filePath)
		if (!stats.isFile()) {
			return {
				error: {
					message: `${MANIFEST_FILENAME} exists but is not a file: ${filePath}`,
					operation: "stat",
					path: filePath,
					type: "io",
				},
				ok: false,
			}
		}

		return { ok: true, value: true }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: false }
		}

		if (isPermissionError(error)) {
			return {
				error: {
					message: "Cannot access parent directory. Check permissions.",
					operation: "stat",
					path: currentDir as AbsolutePath,
					rawError: error instanceof Error ? error : undefined,
					type: "io",
				},
				ok: false,
			}
		}

		return {
			error: {
				message: `Unable to access ${filePath}.`,
				operation: "stat",
				path: filePath,
				rawError: error instanceof Error ? error : undefined,
				type: "io",
			},
			ok: false,
		}
	}
}

async function safeStat(targetPath: AbsolutePath): Promise<StatResult> {
	try {
		const stats = await stat(targetPath)
		return { ok: true, value: stats }
	} catch (error) {
		if (isNotFound(error)) {
			return {
				error: {
					field: "start",
					message: "Start path does not exist.",
					path: targetPath,
					source: "manual",
					type: "validation",
				},
				ok: false,
			}
		}

		return {
			error: {
				message: `Unable to access ${targetPath}.`,
				operation: "stat",
				path: targetPath,
				rawError: error instanceof Error ? error : undefined,
				type: "io",
			},
			ok: false,
		}
	}
}

function isPermissionError(error: unknown): boolean {
	return (
		typeof error === "object" &&
		error !== null &&
		"code" in error &&
		["EACCES", "EPERM"].includes((error as { code?: string }).code ?? "")
	)
}

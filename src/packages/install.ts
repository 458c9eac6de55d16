import { execFile } from "node:child_process"
import { promisify } from "node:util"
import { consola } from "consola"
import type { PackageRequirement, PackageRequirements } from "@/src/packages/types"
import type { AbsolutePath } from "@/src/types/branded"
import type { InstallError, Result } from "@/src/types/errors"

const execFileAsync = promisify(execFile)

export const DEFAULT_INSTALL_TIMEOUT_MS = 20_000

// npm can print a lot while resolving; only the exit code decides success.
const INSTALL_OUTPUT_LIMIT = 64 * 1024 * 1024

/**
 * Adds packages to the project at projectDir. Stops at the first failure.
 */
export interface DependencyInstaller {
	install(
		packages: PackageRequirements,
		projectDir: AbsolutePath,
	): Promise<Result<void, InstallError>>
}

export interface ProcessInstallerOptions {
	command: string
	buildArgs: (requirement: PackageRequirement) => string[]
	timeoutMs?: number
}

/**
 * Record the dependency in package.json and the lockfile without
 * populating node_modules.
 */
export function npmInstallArgs(requirement: PackageRequirement): string[] {
	return [
		"install",
		`${requirement.packageId}@${requirement.version}`,
		"--package-lock-only",
		"--no-audit",
		"--no-fund",
	]
}

export function createNpmInstaller(
	options: { command?: string; timeoutMs?: number } = {},
): DependencyInstaller {
	return createProcessInstaller({
		buildArgs: npmInstallArgs,
		command: options.command ?? "npm",
		timeoutMs: options.timeoutMs,
	})
}

export function createProcessInstaller(
	options: ProcessInstallerOptions,
): DependencyInstaller {
	const timeoutMs = options.timeoutMs ?? DEFAULT_INSTALL_TIMEOUT_MS

	return {
		async install(packages, projectDir) {
			for (const requirement of packages.values()) {
				consola.info(`Adding ${requirement.packageId}@${requirement.version}...`)
				const result = await runInstall(
					options.command,
					options.buildArgs(requirement),
					requirement,
					projectDir,
					timeoutMs,
				)
				if (!result.ok) {
					return result
				}
			}
			return { ok: true, value: undefined }
		},
	}
}

async function runInstall(
	command: string,
	args: string[],
	requirement: PackageRequirement,
	projectDir: AbsolutePath,
	timeoutMs: number,
): Promise<Result<void, InstallError>> {
	try {
		await execFileAsync(command, args, {
			cwd: projectDir,
			encoding: "utf8",
			killSignal: "SIGKILL",
			maxBuffer: INSTALL_OUTPUT_LIMIT,
			timeout: timeoutMs,
			windowsHide: true,
		})
		return { ok: true, value: undefined }
	} catch (error) {
		const code = readField(error, "code")
		const stdout = readText(error, "stdout")
		const stderr = readText(error, "stderr")
		const rawError = error instanceof Error ? error : undefined
		const base = {
			packageId: requirement.packageId,
			projectDir,
			rawError,
			stderr,
			stdout,
			type: "install" as const,
		}

		if (code === "ENOENT") {
			return {
				error: {
					...base,
					message: `${command} was not found on the path.`,
					reason: "missing",
				},
				ok: false,
			}
		}

		if (readField(error, "killed") === true) {
			const seconds = Math.round(timeoutMs / 100) / 10
			return {
				error: {
					...base,
					message: `Adding package \`${requirement.packageId}\` to \`${projectDir}\` took longer than ${seconds} seconds.`,
					reason: "timeout",
				},
				ok: false,
			}
		}

		return {
			error: {
				...base,
				exitCode: typeof code === "number" ? code : undefined,
				message: `Could not add package \`${requirement.packageId}\` to \`${projectDir}\`.`,
				reason: "exit",
			},
			ok: false,
		}
	}
}

function readField(error: unknown, key: string): unknown {
	if (typeof error !== "object" || error === null || !(key in error)) {
		return undefined
	}
	return Reflect.get(error, key)
}

function readText(error: unknown, key: string): string {
	const value = readField(error, key)
	return typeof value === "string" ? value : ""
}

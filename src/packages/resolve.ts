import { consola } from "consola"
import { z } from "zod"
import type { GeneratorId, GeneratorTable } from "@/src/generators/registry"
import { buildRequirements, type PackageRequirements } from "@/src/packages/types"
import type { NetworkError, ParseError, Result, ValidationError } from "@/src/types/errors"

/*
 * Example document:
 * {
 *   "Version": "1.0",
 *   "Packages": {
 *     "openapi-typescript": "7.4.1",
 *     "openapi-fetch": "0.12.2"
 *   }
 * }
 */
const packageVersionsSchema = z.object({
	Packages: z.record(z.string(), z.string()),
	// Informational only; some publishers write it as a number.
	Version: z.unknown().optional(),
})

export type PackageVersionsError = NetworkError | ParseError | ValidationError

export interface FetchPackageVersionsOptions {
	url: string
	timeoutMs: number
	fetch?: typeof fetch
}

export interface ResolvePackageVersionsOptions extends FetchPackageVersionsOptions {
	table: GeneratorTable
}

/**
 * Packages the selected generator needs. The remote document wins when it
 * can be read; any failure falls back to the built-in table without
 * surfacing an error. An empty remote document is still authoritative.
 */
export async function resolvePackageVersions(
	generator: GeneratorId,
	options: ResolvePackageVersionsOptions,
): Promise<PackageRequirements> {
	const remote = await fetchPackageVersions(options)
	if (remote.ok) {
		return remote.value
	}

	consola.debug(`Using built-in package versions: ${remote.error.message}`)
	return options.table.get(generator) ?? buildRequirements([])
}

export async function fetchPackageVersions(
	options: FetchPackageVersionsOptions,
): Promise<Result<PackageRequirements, PackageVersionsError>> {
	const fetchImpl = options.fetch ?? fetch

	let body: string
	try {
		const response = await fetchImpl(options.url, {
			signal: AbortSignal.timeout(options.timeoutMs),
		})
		if (!response.ok) {
			return {
				error: {
					message: `Package version lookup returned ${response.status}.`,
					source: options.url,
					status: response.status,
					type: "network",
				},
				ok: false,
			}
		}
		body = await response.text()
	} catch (error) {
		return {
			error: {
				message: "Package version lookup failed.",
				rawError: error instanceof Error ? error : undefined,
				source: options.url,
				type: "network",
			},
			ok: false,
		}
	}

	let parsed: unknown
	try {
		parsed = JSON.parse(body)
	} catch (error) {
		return {
			error: {
				message: "Invalid JSON in package version document.",
				rawError: error instanceof Error ? error : undefined,
				source: options.url,
				type: "parse",
			},
			ok: false,
		}
	}

	const result = packageVersionsSchema.safeParse(parsed)
	if (!result.success) {
		return {
			error: {
				field: "Packages",
				message: "Package version document has an unexpected shape.",
				source: "zod",
				type: "validation",
				zodError: result.error,
			},
			ok: false,
		}
	}

	return { ok: true, value: buildRequirements(Object.entries(result.data.Packages)) }
}

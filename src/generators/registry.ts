import { z } from "zod"
import builtinPackages from "@/src/generators/packages.json" with { type: "json" }
import { buildRequirements, type PackageRequirements } from "@/src/packages/types"
import type { Result, ValidationError } from "@/src/types/errors"

export const GENERATOR_IDS = ["openapi-typescript", "orval", "hey-api"] as const

export type GeneratorId = (typeof GENERATOR_IDS)[number]

export const DEFAULT_GENERATOR: GeneratorId = "openapi-typescript"

/**
 * Built-in package requirements per code generator, used when the remote
 * package-version document cannot be read.
 */
export type GeneratorTable = ReadonlyMap<GeneratorId, PackageRequirements>

const GENERATOR_ID_SET: ReadonlySet<string> = new Set(GENERATOR_IDS)

export function isGeneratorId(value: string): value is GeneratorId {
	return GENERATOR_ID_SET.has(value)
}

export function coerceGeneratorId(value: string): GeneratorId | null {
	const trimmed = value.trim().toLowerCase()
	return isGeneratorId(trimmed) ? trimmed : null
}

const versionsSchema = z.record(z.string(), z.string().trim().min(1))

const tableSchema = z
	.object({
		"hey-api": versionsSchema,
		"openapi-typescript": versionsSchema,
		orval: versionsSchema,
	})
	.strict()

export function parseGeneratorTable(raw: unknown): Result<GeneratorTable, ValidationError> {
	const result = tableSchema.safeParse(raw)
	if (!result.success) {
		return {
			error: {
				field: "generators",
				message: "Invalid built-in generator package table.",
				source: "zod",
				type: "validation",
				zodError: result.error,
			},
			ok: false,
		}
	}

	const table = new Map<GeneratorId, PackageRequirements>()
	for (const id of GENERATOR_IDS) {
		table.set(id, buildRequirements(Object.entries(result.data[id])))
	}
	return { ok: true, value: table }
}

/**
 * Load the table shipped with the CLI. Called once at startup.
 */
export function loadGeneratorTable(): Result<GeneratorTable, ValidationError> {
	return parseGeneratorTable(builtinPackages)
}

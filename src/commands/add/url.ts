import { consola } from "consola"
import { type AddCommandOptions, runAddCommand } from "@/src/commands/add/shared"

export interface AddUrlCommandOptions extends AddCommandOptions {
	outputFile?: string
}

export async function addUrl(
	sourceUrl: string | undefined,
	options: AddUrlCommandOptions,
): Promise<void> {
	consola.info("apiref add url")
	await runAddCommand({ kind: "url", outputFile: options.outputFile, sourceUrl }, options)
}

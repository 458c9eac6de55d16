import { consola } from "consola"
import { type AddCommandOptions, runAddCommand } from "@/src/commands/add/shared"

export async function addFile(
	sourceFile: string | undefined,
	options: AddCommandOptions,
): Promise<void> {
	consola.info("apiref add file")
	await runAddCommand({ kind: "file", path: sourceFile }, options)
}

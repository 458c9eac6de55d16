import { consola } from "consola"
import { type AddCommandOptions, runAddCommand } from "@/src/commands/add/shared"

export async function addProject(
	sourceProject: string | undefined,
	options: AddCommandOptions,
): Promise<void> {
	consola.info("apiref add project")
	await runAddCommand({ kind: "project", path: sourceProject }, options)
}

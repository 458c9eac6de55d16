import { consola } from "consola"
import {
	type ManifestSelection,
	resolveCwd,
	resolveProjectManifest,
} from "@/src/commands/manifest-selection"
import { CommandResult, printOutcome } from "@/src/commands/types"
import { CODE_GENERATOR_KEY, REFERENCE_TAGS, SOURCE_URL_KEY } from "@/src/constants"
import { getItems } from "@/src/manifest/transform"

export interface ListCommandOptions {
	project?: string
}

export async function listCommand(options: ListCommandOptions): Promise<void> {
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

	const result = listWithSelection(selection.value)
	if (result.status === "completed") {
		for (const line of result.value) {
			consola.log(line)
		}
		return
	}
	printOutcome(result)
}

export function listWithSelection(selection: ManifestSelection): CommandResult<string[]> {
	const lines: string[] = []
	for (const tag of REFERENCE_TAGS) {
		for (const item of getItems(selection.manifest, tag)) {
			lines.push(formatItem(tag, item.include, item.metadata))
		}
	}

	if (lines.length === 0) {
		return CommandResult.unchanged(`No references in ${selection.manifestPath}.`)
	}
	return CommandResult.completed(lines)
}

function formatItem(
	tag: string,
	include: string,
	metadata: Readonly<Record<string, string>>,
): string {
	const details = [metadata[CODE_GENERATOR_KEY], metadata[SOURCE_URL_KEY]].filter(
		(value): value is string => value !== undefined && value.length > 0,
	)
	const suffix = details.length > 0 ? ` (${details.join(", ")})` : ""
	return `${tag} ${include}${suffix}`
}

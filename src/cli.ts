#!/usr/bin/env node

import { Command } from "commander"
import { consola } from "consola"
import packageJson from "@/package.json" with { type: "json" }
import { addFile } from "@/src/commands/add/file"
import { addProject } from "@/src/commands/add/project"
import type { AddCommandOptions } from "@/src/commands/add/shared"
import { addUrl } from "@/src/commands/add/url"
import { listCommand } from "@/src/commands/list"
import { refreshCommand } from "@/src/commands/refresh"
import { removeCommand } from "@/src/commands/remove"
import { DEFAULT_GENERATOR, GENERATOR_IDS } from "@/src/generators/registry"

interface AddOptions {
	codeGenerator?: string
	project?: string
	init?: boolean
	nonInteractive?: boolean
}

async function main(): Promise<void> {
	const program = new Command()

	program
		.name("apiref")
		.description("Record OpenAPI document references in apiref.toml")
		.version(packageJson.version)
		.showHelpAfterError()
		.showSuggestionAfterError()

	const add = program
		.command("add")
		.description("Add an OpenAPI reference (url, file or project)")

	withAddOptions(
		add
			.command("url")
			.description("Download an OpenAPI document and reference it")
			.argument("[source-url]", "URL of the OpenAPI document")
			.option(
				"--output-file <path>",
				"Where to store the document (default: openapi/openapi.json)",
			),
	).action(
		async (
			sourceUrl: string | undefined,
			options: AddOptions & { outputFile?: string },
		) => {
			await addUrl(sourceUrl, {
				...toAddCommandOptions(options),
				outputFile: options.outputFile,
			})
		},
	)

	withAddOptions(
		add
			.command("file")
			.description("Reference a local OpenAPI document")
			.argument("[source-file]", "Path to the OpenAPI document"),
	).action(async (sourceFile: string | undefined, options: AddOptions) => {
		await addFile(sourceFile, toAddCommandOptions(options))
	})

	withAddOptions(
		add
			.command("project")
			.description("Reference another project's apiref.toml")
			.argument("[source-project]", "Path to the other project's apiref.toml"),
	).action(async (sourceProject: string | undefined, options: AddOptions) => {
		await addProject(sourceProject, toAddCommandOptions(options))
	})

	program
		.command("remove")
		.description("Remove references by source URL or local path")
		.argument("<reference>", "Source URL or local path")
		.option("-p, --project <file>", "Manifest file or the directory holding it")
		.action(async (reference: string, options: { project?: string }) => {
			await removeCommand(reference, { project: options.project })
		})

	program
		.command("refresh")
		.description("Download the documents recorded for a source URL again")
		.argument("<source-url>", "Source URL recorded in the manifest")
		.option("-p, --project <file>", "Manifest file or the directory holding it")
		.action(async (sourceUrl: string, options: { project?: string }) => {
			await refreshCommand(sourceUrl, { project: options.project })
		})

	program
		.command("list")
		.description("List recorded references")
		.option("-p, --project <file>", "Manifest file or the directory holding it")
		.action(async (options: { project?: string }) => {
			await listCommand({ project: options.project })
		})

	if (process.argv.length <= 2) {
		program.outputHelp()
		return
	}

	await program.parseAsync(process.argv)
}

function withAddOptions(command: Command): Command {
	return command
		.option(
			"-c, --code-generator <name>",
			`Code generator (${GENERATOR_IDS.join(", ")}; default: ${DEFAULT_GENERATOR})`,
		)
		.option("-p, --project <file>", "Manifest file or the directory holding it")
		.option("--init", "Create a manifest if one does not exist")
		.option("--non-interactive", "Run without prompts")
}

function toAddCommandOptions(options: AddOptions): AddCommandOptions {
	return {
		codeGenerator: options.codeGenerator,
		init: Boolean(options.init),
		nonInteractive: Boolean(options.nonInteractive),
		project: options.project,
	}
}

main().catch((error) => {
	consola.error(error instanceof Error ? error.message : error)
	process.exit(1)
})

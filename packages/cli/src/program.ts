import {
	type SourceFormat,
	type VertexOrder,
	SOURCE_FORMATS,
	isAdjnormError,
	loadConfig,
} from "@adjnorm/core"
import { Command, Option } from "commander"
import { createConfigCommand } from "./commands/config"
import { normalize } from "./normalize"

const VERTEX_ORDERS: readonly VertexOrder[] = [
	"lexicographic",
	"numeric",
	"insertion",
]

interface CliOptions {
	output?: string
	suffix?: string
	format?: SourceFormat
	order?: VertexOrder
	relabel?: boolean
	artifacts?: boolean
	verbose?: boolean
}

/**
 * Build the adjnorm program. A failed run sets process.exitCode instead of
 * exiting.
 */
export function createProgram(): Command {
	const program = new Command()
		.name("adjnorm")
		.description(
			"Remove isolated vertices from an adjacency-list graph file",
		)
		.version("0.1.0")
		.argument("<input>", "Adjacency-list file to normalize")
		.option(
			"-o, --output <file>",
			"Output file (default: input name with the suffix before the extension)",
		)
		.option("--suffix <suffix>", "Suffix for the derived output name")
		.addOption(
			new Option("-f, --format <format>", "Input format").choices(
				SOURCE_FORMATS,
			),
		)
		.addOption(
			new Option("--order <order>", "Vertex and neighbor order").choices(
				VERTEX_ORDERS,
			),
		)
		.option("--relabel", "Rename vertices to 0..n-1 before writing")
		.option(
			"--artifacts",
			"Save loaded/filtered JSON snapshots alongside the output",
		)
		.option("-v, --verbose", "Show detailed output")
		.action(async (input: string, options: CliOptions) => {
			const run = await normalize(input, options, loadConfig())
			if (run.status === "failed") {
				process.exitCode = 1
			}
		})

	program.addCommand(createConfigCommand())

	return program
}

/**
 * Parse argv and run the matching command. Read, write and config errors are
 * reported on stderr with exit code 1; anything else propagates.
 */
export async function runCli(argv: readonly string[]): Promise<void> {
	try {
		await createProgram().parseAsync(argv)
	} catch (error) {
		if (!isAdjnormError(error)) throw error
		console.error(`\x1b[31m✗\x1b[0m ${error.message}`)
		process.exitCode = 1
	}
}

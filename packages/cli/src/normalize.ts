/**
 * Main normalize command - strips isolated vertices from a graph file
 */

import { resolve } from "node:path"
import {
	type AdjnormConfig,
	DEFAULT_OUTPUT_SUFFIX,
	type NormalizeRun,
	type SourceFormat,
	type UndirectedGraph,
	type VertexId,
	type VertexOrder,
	runNormalize,
	writeGraphSnapshot,
} from "@adjnorm/core"
import { formatRunSummary } from "./utils/output"
import { deriveOutputPath, stripExtension } from "./utils/paths"

export interface NormalizeOptions {
	output?: string
	suffix?: string
	format?: SourceFormat
	order?: VertexOrder
	relabel?: boolean
	artifacts?: boolean
	verbose?: boolean
}

/**
 * Merge CLI flags over the stored config and the built-in defaults
 */
export function resolveOptions(
	inputPath: string,
	options: NormalizeOptions,
	config: AdjnormConfig,
) {
	const suffix = options.suffix ?? config.outputSuffix ?? DEFAULT_OUTPUT_SUFFIX
	const input = resolve(inputPath)
	return {
		input,
		output: resolve(options.output ?? deriveOutputPath(inputPath, suffix)),
		format: options.format ?? config.format ?? "adjacency",
		order: options.order ?? config.order ?? "lexicographic",
		relabel: options.relabel ?? false,
	}
}

/**
 * Log isolated vertices that were left out of the output
 */
function reportIsolated(isolated: VertexId[], verbose: boolean): void {
	if (isolated.length === 0) return
	console.log(
		`  \x1b[33m!\x1b[0m Excluded ${isolated.length} isolated vertex(es) with no neighbors`,
	)
	if (verbose) {
		for (const vertex of isolated) {
			console.log(`    - ${vertex}`)
		}
	}
}

/**
 * Save the graphs a completed run loaded and wrote as JSON next to the output
 */
async function writeArtifacts(run: NormalizeRun): Promise<void> {
	const stem = stripExtension(run.output)
	const artifacts: Array<[string, UndirectedGraph | undefined]> = [
		["loaded", run.graphs.loaded],
		["filtered", run.graphs.written],
	]

	for (const [suffix, graph] of artifacts) {
		if (!graph) continue
		const artifactPath = `${stem}.${suffix}.json`
		await writeGraphSnapshot(artifactPath, graph)
		console.log(`  \x1b[32m✓\x1b[0m Saved: ${artifactPath}`)
	}
}

/**
 * Main normalize function. Returns the run; the caller decides the exit code.
 */
export async function normalize(
	inputPath: string,
	options: NormalizeOptions,
	config: AdjnormConfig,
): Promise<NormalizeRun> {
	const verbose = options.verbose ?? false
	const resolved = resolveOptions(inputPath, options, config)

	console.log(`\nNormalizing: ${resolved.input}`)
	if (verbose) {
		console.log(`  Format: ${resolved.format}`)
		console.log(`  Order: ${resolved.order}`)
	}

	const run = await runNormalize(resolved)

	if (run.status === "failed") {
		const failed = run.steps.find((step) => step.status === "failed")
		console.error(
			`\x1b[31m✗\x1b[0m ${failed?.step ?? "normalize"} failed: ${run.failure?.message ?? failed?.error ?? "unknown error"}`,
		)
		if (verbose) {
			console.error(`\n${formatRunSummary(run)}`)
		}
		return run
	}

	reportIsolated(run.isolated, verbose)
	console.log(`  \x1b[32m✓\x1b[0m Saved: ${run.output}`)

	if (options.artifacts) {
		await writeArtifacts(run)
	}

	if (verbose) {
		console.log(`\n${formatRunSummary(run)}`)
	}

	console.log("\n\x1b[32m✓\x1b[0m Done!")
	return run
}

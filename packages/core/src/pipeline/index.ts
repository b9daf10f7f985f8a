import { ReadError, WriteError } from "../errors"
import { filterIsolatedVertices } from "../graph/filter"
import { relabelVertices } from "../graph/relabel"
import { computeGraphStats } from "../graph/stats"
import type { SourceFormat, VertexOrder } from "../graph/types"
import { serializeAdjacencyList } from "../output/adjacency-list"
import { parseGraph } from "../parsers"
import { loadGraphFile, writeGraphFile } from "./storage"
import type {
	NormalizeConfig,
	NormalizeRun,
	PipelineStep,
	RunFailure,
	StepResult,
} from "./types"

export * from "./types"
export * from "./storage"

type StepOutcome<T> =
	| { ok: true; value: T; result: StepResult }
	| { ok: false; error: unknown; result: StepResult }

/**
 * Run one step, recording timing and turning a thrown error into a failed
 * step result
 */
async function runStep<T>(
	step: PipelineStep,
	fn: () => T | Promise<T>,
	outputFile?: string,
): Promise<StepOutcome<T>> {
	const startedAt = new Date().toISOString()
	const startTime = Date.now()

	try {
		const value = await fn()
		return {
			ok: true,
			value,
			result: {
				step,
				status: "completed",
				startedAt,
				completedAt: new Date().toISOString(),
				duration: Date.now() - startTime,
				outputFile,
			},
		}
	} catch (error) {
		return {
			ok: false,
			error,
			result: {
				step,
				status: "failed",
				startedAt,
				completedAt: new Date().toISOString(),
				duration: Date.now() - startTime,
				error: error instanceof Error ? error.message : String(error),
			},
		}
	}
}

function toFailure(error: unknown): RunFailure {
	const message = error instanceof Error ? error.message : String(error)
	if (error instanceof ReadError) return { kind: "read", message }
	if (error instanceof WriteError) return { kind: "write", message }
	throw error
}

/**
 * Load -> filter -> (relabel) -> serialize a graph file.
 *
 * ReadError and WriteError end the run with a failed status; a read failure
 * stops before anything is written. Any other error is rethrown.
 */
export async function runNormalize(
	config: NormalizeConfig,
): Promise<NormalizeRun> {
	const run: NormalizeRun = {
		input: config.input,
		output: config.output,
		startedAt: new Date().toISOString(),
		status: "running",
		steps: [],
		isolated: [],
		graphs: {},
	}

	const fail = (error: unknown): NormalizeRun => {
		run.failure = toFailure(error)
		run.status = "failed"
		run.completedAt = new Date().toISOString()
		return run
	}

	const load = await runStep("load", () =>
		loadGraphFile(config.input, config.format),
	)
	run.steps.push(load.result)
	if (!load.ok) return fail(load.error)
	const loaded = load.value
	run.loaded = computeGraphStats(loaded)
	run.graphs.loaded = loaded

	const filter = await runStep("filter", () => filterIsolatedVertices(loaded))
	run.steps.push(filter.result)
	if (!filter.ok) return fail(filter.error)
	run.isolated = filter.value.isolated
	let graph = filter.value.graph

	if (config.relabel) {
		const relabel = await runStep("relabel", () => relabelVertices(graph))
		run.steps.push(relabel.result)
		if (!relabel.ok) return fail(relabel.error)
		graph = relabel.value.graph
	}

	const serialize = await runStep(
		"serialize",
		() => writeGraphFile(config.output, graph, { order: config.order }),
		config.output,
	)
	run.steps.push(serialize.result)
	if (!serialize.ok) return fail(serialize.error)

	run.written = computeGraphStats(graph)
	run.graphs.written = graph
	run.status = "completed"
	run.completedAt = new Date().toISOString()
	return run
}

export interface NormalizeTextOptions {
	format?: SourceFormat
	order?: VertexOrder
	relabel?: boolean
}

/**
 * In-memory variant of runNormalize: parse, drop isolated vertices and
 * serialize
 */
export function normalizeAdjacencyText(
	content: string,
	options: NormalizeTextOptions = {},
): string {
	const loaded = parseGraph(content, options.format ?? "adjacency")
	let { graph } = filterIsolatedVertices(loaded)
	if (options.relabel) {
		graph = relabelVertices(graph).graph
	}
	return serializeAdjacencyList(graph, { order: options.order })
}

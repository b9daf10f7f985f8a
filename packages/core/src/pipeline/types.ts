import type {
	GraphStats,
	SourceFormat,
	UndirectedGraph,
	VertexId,
	VertexOrder,
} from "../graph/types"

export type PipelineStep = "load" | "filter" | "relabel" | "serialize"

export interface NormalizeConfig {
	/** Adjacency-list (or edge-list) file to read */
	input: string
	/** File the filtered adjacency list is written to */
	output: string
	format?: SourceFormat
	order?: VertexOrder
	/** Rename surviving vertices to 0..n-1 before writing */
	relabel?: boolean
}

export type StepStatus = "pending" | "running" | "completed" | "failed"
export type RunStatus = "running" | "completed" | "failed"

export interface StepResult {
	step: PipelineStep
	status: StepStatus
	startedAt?: string
	completedAt?: string
	duration?: number
	outputFile?: string
	error?: string
}

export interface RunFailure {
	kind: "read" | "write"
	message: string
}

export interface NormalizeRun {
	input: string
	output: string
	startedAt: string
	completedAt?: string
	status: RunStatus
	steps: StepResult[]
	loaded?: GraphStats
	written?: GraphStats
	isolated: VertexId[]
	/** The graphs this run produced, for snapshots */
	graphs: {
		loaded?: UndirectedGraph
		/** Filtered (and relabeled) graph, as serialized */
		written?: UndirectedGraph
	}
	failure?: RunFailure
}

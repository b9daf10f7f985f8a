export type VertexId = string

export type SourceFormat = "adjacency" | "edge-list"

export type VertexOrder = "lexicographic" | "numeric" | "insertion"

export interface GraphMetadata {
	/** File name or label the graph was read from */
	source: string
	format: SourceFormat
}

/**
 * Simple undirected graph stored as a symmetric neighbor-set map.
 * A self-loop {v, v} is recorded as v in its own neighbor set.
 */
export interface UndirectedGraph {
	adjacency: Map<VertexId, Set<VertexId>>
	metadata: GraphMetadata
}

export interface GraphStats {
	vertices: number
	/** Distinct unordered pairs, self-loops included */
	edges: number
	isolated: number
	selfLoops: number
}

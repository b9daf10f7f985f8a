import type { UndirectedGraph, VertexId } from "./types"

export interface RelabelResult {
	graph: UndirectedGraph
	/** Original identifier -> new identifier */
	mapping: Map<VertexId, VertexId>
}

/**
 * Rename vertices to "0".."n-1" in first-appearance order, keeping every edge
 */
export function relabelVertices(graph: UndirectedGraph): RelabelResult {
	const mapping = new Map<VertexId, VertexId>()
	for (const vertex of graph.adjacency.keys()) {
		mapping.set(vertex, String(mapping.size))
	}

	const rename = (id: VertexId): VertexId => {
		const next = mapping.get(id)
		if (next === undefined) {
			throw new Error(`Neighbor ${id} is not a vertex of the graph`)
		}
		return next
	}

	const adjacency = new Map<VertexId, Set<VertexId>>()
	for (const [vertex, neighbors] of graph.adjacency) {
		adjacency.set(rename(vertex), new Set(Array.from(neighbors, rename)))
	}

	return {
		graph: { adjacency, metadata: { ...graph.metadata } },
		mapping,
	}
}

import type { UndirectedGraph, VertexId } from "./types"

export interface IsolationFilterResult {
	/** The filtered graph with isolated vertices removed */
	graph: UndirectedGraph
	/** Vertices that were removed because they had no neighbors */
	isolated: VertexId[]
}

/**
 * Filters out isolated vertices (vertices with an empty neighbor set).
 * The input graph is left untouched; removed vertices are also dropped from
 * every remaining neighbor set.
 */
export function filterIsolatedVertices(
	graph: UndirectedGraph,
): IsolationFilterResult {
	const isolated: VertexId[] = []
	for (const [vertex, neighbors] of graph.adjacency) {
		if (neighbors.size === 0) {
			isolated.push(vertex)
		}
	}

	const removed = new Set(isolated)
	const adjacency = new Map<VertexId, Set<VertexId>>()

	for (const [vertex, neighbors] of graph.adjacency) {
		if (removed.has(vertex)) continue
		const kept = new Set<VertexId>()
		for (const neighbor of neighbors) {
			if (!removed.has(neighbor)) kept.add(neighbor)
		}
		adjacency.set(vertex, kept)
	}

	return {
		graph: {
			adjacency,
			metadata: { ...graph.metadata },
		},
		isolated,
	}
}

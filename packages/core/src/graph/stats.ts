import type { GraphStats, UndirectedGraph } from "./types"

export function computeGraphStats(graph: UndirectedGraph): GraphStats {
	let endpoints = 0
	let selfLoops = 0
	let isolated = 0

	for (const [vertex, neighbors] of graph.adjacency) {
		if (neighbors.size === 0) isolated++
		for (const neighbor of neighbors) {
			if (neighbor === vertex) {
				selfLoops++
			} else {
				endpoints++
			}
		}
	}

	return {
		vertices: graph.adjacency.size,
		// Each non-loop edge is seen from both ends
		edges: endpoints / 2 + selfLoops,
		isolated,
		selfLoops,
	}
}

export function degree(graph: UndirectedGraph, vertex: string): number {
	return graph.adjacency.get(vertex)?.size ?? 0
}

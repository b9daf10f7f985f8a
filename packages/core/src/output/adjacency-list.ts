/**
 * Adjacency-list text output
 */

import { orderedAdjacency } from "../graph/order"
import type { UndirectedGraph, VertexOrder } from "../graph/types"

export interface SerializeOptions {
	/** Vertex and neighbor order, defaults to lexicographic */
	order?: VertexOrder
}

/**
 * Write one `<vertex> <neighbor> ...` line per vertex, each newline-terminated.
 * Neighborless vertices are not skipped here; filter the graph first.
 */
export function serializeAdjacencyList(
	graph: UndirectedGraph,
	options: SerializeOptions = {},
): string {
	const order = options.order ?? "lexicographic"
	let text = ""
	for (const [vertex, neighbors] of orderedAdjacency(graph, order)) {
		text += `${vertex} ${neighbors.join(" ")}\n`
	}
	return text
}

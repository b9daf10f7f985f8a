import { GraphBuilder } from "../graph/builder"
import type { UndirectedGraph } from "../graph/types"
import { tokenizeLines } from "./tokenize"

/**
 * Parse a whitespace-separated adjacency list.
 *
 * The first token of a line is a vertex and every later token one of its
 * neighbors. A line holding only a vertex declares it with no edges; blank
 * lines are skipped.
 */
export function parseAdjacencyList(
	content: string,
	source = "<memory>",
): UndirectedGraph {
	const builder = new GraphBuilder(source, "adjacency")

	for (const [vertex, ...neighbors] of tokenizeLines(content)) {
		if (vertex === undefined) continue
		builder.addVertex(vertex)
		for (const neighbor of neighbors) {
			builder.addEdge(vertex, neighbor)
		}
	}

	return builder.build()
}

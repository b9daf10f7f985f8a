import { GraphBuilder } from "../graph/builder"
import type { UndirectedGraph } from "../graph/types"
import { tokenizeLines } from "./tokenize"

/**
 * Parse an edge list: one `u v` pair per line.
 * Lines with fewer than two tokens are skipped and extra tokens ignored,
 * so an edge list never declares an isolated vertex.
 */
export function parseEdgeList(
	content: string,
	source = "<memory>",
): UndirectedGraph {
	const builder = new GraphBuilder(source, "edge-list")

	for (const [u, v] of tokenizeLines(content)) {
		if (u === undefined || v === undefined) continue
		builder.addEdge(u, v)
	}

	return builder.build()
}

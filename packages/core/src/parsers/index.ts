import type { SourceFormat, UndirectedGraph } from "../graph/types"
import { parseAdjacencyList } from "./adjacency-list"
import { parseEdgeList } from "./edge-list"

export { parseAdjacencyList } from "./adjacency-list"
export { parseEdgeList } from "./edge-list"
export { tokenizeLines } from "./tokenize"

export const SOURCE_FORMATS: readonly SourceFormat[] = [
	"adjacency",
	"edge-list",
]

/**
 * Parse text in the given source format
 */
export function parseGraph(
	content: string,
	format: SourceFormat,
	source?: string,
): UndirectedGraph {
	switch (format) {
		case "adjacency":
			return parseAdjacencyList(content, source)
		case "edge-list":
			return parseEdgeList(content, source)
	}
}

import type { UndirectedGraph, VertexId, VertexOrder } from "./types"

const INTEGER = /^-?\d+$/

/**
 * Code-unit comparison, independent of the host locale
 */
function compareLexicographic(a: string, b: string): number {
	if (a === b) return 0
	return a < b ? -1 : 1
}

/**
 * Integer identifiers first, by value; everything else after, lexicographically
 */
function compareNumeric(a: string, b: string): number {
	const aInt = INTEGER.test(a)
	const bInt = INTEGER.test(b)
	if (aInt && bInt) {
		const diff = BigInt(a) - BigInt(b)
		if (diff !== 0n) return diff < 0n ? -1 : 1
		return compareLexicographic(a, b)
	}
	if (aInt) return -1
	if (bInt) return 1
	return compareLexicographic(a, b)
}

/**
 * Order a list of vertex identifiers. `insertion` keeps the given order.
 */
export function orderVertices(
	ids: Iterable<VertexId>,
	order: VertexOrder,
): VertexId[] {
	const list = Array.from(ids)
	switch (order) {
		case "lexicographic":
			return list.sort(compareLexicographic)
		case "numeric":
			return list.sort(compareNumeric)
		case "insertion":
			return list
	}
}

/**
 * Vertices with their neighbor lists, both in the requested order
 */
export function orderedAdjacency(
	graph: UndirectedGraph,
	order: VertexOrder,
): Array<[VertexId, VertexId[]]> {
	return orderVertices(graph.adjacency.keys(), order).map((vertex) => [
		vertex,
		orderVertices(graph.adjacency.get(vertex) ?? [], order),
	])
}

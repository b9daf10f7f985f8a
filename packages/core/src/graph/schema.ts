import { z } from "zod"
import type { UndirectedGraph } from "./types"

export const GraphMetadataSchema = z.object({
	source: z.string(),
	format: z.enum(["adjacency", "edge-list"]),
})

export const GraphSnapshotSchema = z
	.object({
		adjacency: z.record(z.array(z.string().min(1))),
		metadata: GraphMetadataSchema,
	})
	.refine(
		(snapshot) => {
			const ids = new Set(Object.keys(snapshot.adjacency))
			return Object.values(snapshot.adjacency).every((neighbors) =>
				neighbors.every((n) => ids.has(n)),
			)
		},
		{ message: "Neighbor references non-existent vertex" },
	)
	.refine(
		(snapshot) =>
			Object.entries(snapshot.adjacency).every(([vertex, neighbors]) =>
				neighbors.every(
					(n) =>
						Object.hasOwn(snapshot.adjacency, n) &&
						snapshot.adjacency[n]?.includes(vertex),
				),
			),
		{ message: "Adjacency is not symmetric" },
	)

export type GraphSnapshot = z.infer<typeof GraphSnapshotSchema>

/**
 * JSON-safe copy of a graph, in insertion order
 */
export function toGraphSnapshot(graph: UndirectedGraph): GraphSnapshot {
	const adjacency = Object.fromEntries(
		Array.from(graph.adjacency, ([vertex, neighbors]) => [
			vertex,
			Array.from(neighbors),
		]),
	)
	return { adjacency, metadata: { ...graph.metadata } }
}

/**
 * Validate a parsed JSON snapshot and rebuild the graph from it
 */
export function fromGraphSnapshot(input: unknown): UndirectedGraph {
	const snapshot = GraphSnapshotSchema.parse(input)
	const adjacency = new Map<string, Set<string>>()
	for (const [vertex, neighbors] of Object.entries(snapshot.adjacency)) {
		adjacency.set(vertex, new Set(neighbors))
	}
	return { adjacency, metadata: snapshot.metadata }
}

import { describe, expect, test } from "vitest"
import { GraphBuilder } from "./builder"
import { filterIsolatedVertices } from "./filter"
import type { UndirectedGraph } from "./types"

function sample(): UndirectedGraph {
	return new GraphBuilder("sample")
		.addVertex("A")
		.addEdge("A", "B")
		.addEdge("A", "C")
		.addVertex("D")
		.addEdge("E", "F")
		.addVertex("G")
		.build()
}

describe("filterIsolatedVertices", () => {
	test("removes vertices with no neighbors", () => {
		const { graph, isolated } = filterIsolatedVertices(sample())

		expect(isolated).toEqual(["D", "G"])
		expect(Array.from(graph.adjacency.keys())).toEqual([
			"A",
			"B",
			"C",
			"E",
			"F",
		])
	})

	test("keeps the full neighbor set of every connected vertex", () => {
		const original = sample()
		const { graph } = filterIsolatedVertices(original)

		for (const [vertex, neighbors] of graph.adjacency) {
			expect(neighbors).toEqual(original.adjacency.get(vertex))
		}
	})

	test("leaves no neighborless vertex", () => {
		const { graph } = filterIsolatedVertices(sample())

		for (const neighbors of graph.adjacency.values()) {
			expect(neighbors.size).toBeGreaterThan(0)
		}
	})

	test("does not mutate the input graph", () => {
		const original = sample()
		filterIsolatedVertices(original)

		expect(original.adjacency.size).toBe(7)
		expect(original.adjacency.get("D")).toEqual(new Set())
	})

	test("is idempotent", () => {
		const once = filterIsolatedVertices(sample())
		const twice = filterIsolatedVertices(once.graph)

		expect(twice.isolated).toEqual([])
		expect(twice.graph.adjacency).toEqual(once.graph.adjacency)
	})

	test("drops removed vertices from other neighbor sets", () => {
		// Asymmetric input: B lists X but X has no neighbors of its own
		const graph: UndirectedGraph = {
			adjacency: new Map([
				["A", new Set(["B"])],
				["B", new Set(["A", "X"])],
				["X", new Set<string>()],
			]),
			metadata: { source: "manual", format: "adjacency" },
		}

		const result = filterIsolatedVertices(graph)

		expect(result.isolated).toEqual(["X"])
		expect(result.graph.adjacency.get("B")).toEqual(new Set(["A"]))
	})

	test("handles an empty graph", () => {
		const { graph, isolated } = filterIsolatedVertices(
			new GraphBuilder("empty").build(),
		)

		expect(graph.adjacency.size).toBe(0)
		expect(isolated).toEqual([])
	})
})

import type {
	GraphMetadata,
	SourceFormat,
	UndirectedGraph,
	VertexId,
} from "./types"

export class GraphBuilder {
	private adjacency: Map<VertexId, Set<VertexId>> = new Map()
	private metadata: GraphMetadata

	constructor(source: string, format: SourceFormat = "adjacency") {
		this.metadata = { source, format }
	}

	addVertex(id: VertexId): this {
		if (!this.adjacency.has(id)) {
			this.adjacency.set(id, new Set())
		}
		return this
	}

	/**
	 * Add the undirected edge {u, v}, creating either endpoint if needed.
	 * Repeating an edge in either direction is a no-op.
	 */
	addEdge(u: VertexId, v: VertexId): this {
		this.neighborSet(u).add(v)
		this.neighborSet(v).add(u)
		return this
	}

	hasVertex(id: VertexId): boolean {
		return this.adjacency.has(id)
	}

	neighbors(id: VertexId): VertexId[] {
		return Array.from(this.adjacency.get(id) ?? [])
	}

	build(): UndirectedGraph {
		return {
			adjacency: this.adjacency,
			metadata: { ...this.metadata },
		}
	}

	private neighborSet(id: VertexId): Set<VertexId> {
		let set = this.adjacency.get(id)
		if (!set) {
			set = new Set()
			this.adjacency.set(id, set)
		}
		return set
	}
}

import { readFile, writeFile } from "node:fs/promises"
import { basename } from "node:path"
import { type GraphSnapshot, toGraphSnapshot } from "../graph/schema"
import type {
	SourceFormat,
	UndirectedGraph,
	VertexOrder,
} from "../graph/types"
import { ReadError, WriteError } from "../errors"
import { serializeAdjacencyList } from "../output/adjacency-list"
import { parseGraph } from "../parsers"

/**
 * Read and parse a graph file. Fails with ReadError when the file cannot be
 * opened or read; malformed lines never fail.
 */
export async function loadGraphFile(
	path: string,
	format: SourceFormat = "adjacency",
): Promise<UndirectedGraph> {
	let content: string
	try {
		content = await readFile(path, "utf-8")
	} catch (error) {
		throw new ReadError(path, error)
	}
	return parseGraph(content, format, basename(path))
}

/**
 * Serialize a graph to an adjacency-list file. Fails with WriteError when the
 * destination cannot be created or written; a partial file may remain.
 */
export async function writeGraphFile(
	path: string,
	graph: UndirectedGraph,
	options: { order?: VertexOrder } = {},
): Promise<void> {
	await writeTextFile(path, serializeAdjacencyList(graph, options))
}

/**
 * Save a JSON snapshot of a graph
 */
export async function writeGraphSnapshot(
	path: string,
	graph: UndirectedGraph,
): Promise<GraphSnapshot> {
	const snapshot = toGraphSnapshot(graph)
	await writeTextFile(path, JSON.stringify(snapshot, null, 2))
	return snapshot
}

async function writeTextFile(path: string, content: string): Promise<void> {
	try {
		await writeFile(path, content, "utf-8")
	} catch (error) {
		throw new WriteError(path, error)
	}
}

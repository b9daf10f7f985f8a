export { serializeAdjacencyList } from "./adjacency-list"
export type { SerializeOptions } from "./adjacency-list"

export * from "./types"
export * from "./builder"
export * from "./filter"
export * from "./order"
export * from "./relabel"
export * from "./schema"
export * from "./stats"

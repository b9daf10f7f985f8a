// Graph model and transforms
export * from "./graph"

// Parsers
export * from "./parsers"

// Output
export * from "./output"

// Pipeline
export * from "./pipeline"

// Config
export * from "./config"

// Errors
export * from "./errors"

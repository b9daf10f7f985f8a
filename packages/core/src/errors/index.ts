/**
 * Error types raised at the filesystem boundaries of the pipeline
 */

export type AdjnormErrorCode = "READ_ERROR" | "WRITE_ERROR" | "CONFIG_ERROR"

export class AdjnormError extends Error {
	readonly code: AdjnormErrorCode
	readonly path: string

	constructor(
		code: AdjnormErrorCode,
		path: string,
		message: string,
		cause?: unknown,
	) {
		super(message, { cause })
		this.name = new.target.name
		this.code = code
		this.path = path
	}
}

/**
 * The source graph file could not be opened or read
 */
export class ReadError extends AdjnormError {
	constructor(path: string, cause?: unknown) {
		super(
			"READ_ERROR",
			path,
			`Cannot read ${path}: ${describeCause(cause)}`,
			cause,
		)
	}
}

/**
 * The destination file could not be created or written
 */
export class WriteError extends AdjnormError {
	constructor(path: string, cause?: unknown) {
		super(
			"WRITE_ERROR",
			path,
			`Cannot write ${path}: ${describeCause(cause)}`,
			cause,
		)
	}
}

export class ConfigError extends AdjnormError {
	constructor(path: string, detail: string, cause?: unknown) {
		super("CONFIG_ERROR", path, `Invalid config ${path}: ${detail}`, cause)
	}
}

export function isAdjnormError(error: unknown): error is AdjnormError {
	return error instanceof AdjnormError
}

function describeCause(cause: unknown): string {
	if (cause === undefined) return "unknown error"
	return cause instanceof Error ? cause.message : String(cause)
}

import type {
	GraphStats,
	NormalizeRun,
	StepResult,
	StepStatus,
} from "@adjnorm/core"

const STEP_MARKERS: Record<StepStatus, string> = {
	completed: "\x1b[32m✓\x1b[0m",
	failed: "\x1b[31m✗\x1b[0m",
	running: "\x1b[33m⋯\x1b[0m",
	pending: "○",
}

/**
 * Step timings: whole milliseconds below a second, seconds with two decimals
 * above
 */
export function formatDuration(ms: number): string {
	if (ms < 1000) return `${Math.round(ms)}ms`
	return `${(ms / 1000).toFixed(2)}s`
}

/**
 * One summary line per pipeline step, with the file the step wrote and the
 * error of a failed step on the lines below
 */
export function formatStepResult(step: StepResult): string {
	const lines = [`  ${STEP_MARKERS[step.status]} ${step.step}`]
	if (step.duration !== undefined) {
		lines[0] += ` (${formatDuration(step.duration)})`
	}
	if (step.outputFile) {
		lines.push(`    -> ${step.outputFile}`)
	}
	if (step.error) {
		lines.push(`    Error: ${step.error}`)
	}
	return lines.join("\n")
}

/**
 * Format graph statistics
 */
export function formatGraphStats(label: string, stats: GraphStats): string {
	const lines = [
		`${label}:`,
		`  Vertices: ${stats.vertices}`,
		`  Edges: ${stats.edges}`,
	]
	if (stats.selfLoops > 0) {
		lines.push(`  Self-loops: ${stats.selfLoops}`)
	}
	if (stats.isolated > 0) {
		lines.push(`  Isolated: ${stats.isolated}`)
	}
	return lines.join("\n")
}

/**
 * Format a normalize run summary
 */
export function formatRunSummary(run: NormalizeRun): string {
	const lines: string[] = []

	const statusColor =
		run.status === "completed"
			? "\x1b[32m"
			: run.status === "failed"
				? "\x1b[31m"
				: "\x1b[33m"
	const resetColor = "\x1b[0m"

	lines.push(`Input: ${run.input}`)
	lines.push(`Output: ${run.output}`)
	lines.push(`Status: ${statusColor}${run.status}${resetColor}`)
	lines.push("")
	lines.push("Steps:")
	for (const step of run.steps) {
		lines.push(formatStepResult(step))
	}

	if (run.loaded) {
		lines.push("")
		lines.push(formatGraphStats("Loaded", run.loaded))
	}
	if (run.written) {
		lines.push("")
		lines.push(formatGraphStats("Written", run.written))
	}

	return lines.join("\n")
}

import { existsSync } from "node:fs"
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import {
	type MockInstance,
	afterEach,
	beforeEach,
	describe,
	expect,
	test,
	vi,
} from "vitest"
import { runCli } from "./program"

let dir: string
let log: MockInstance<typeof console.log>
let errorLog: MockInstance<typeof console.error>

function cli(...args: string[]): Promise<void> {
	return runCli(["node", "adjnorm", ...args])
}

beforeEach(async () => {
	dir = await mkdtemp(join(tmpdir(), "adjnorm-cli-"))
	vi.stubEnv("ADJNORM_CONFIG", join(dir, "config.json"))
	log = vi.spyOn(console, "log").mockImplementation(() => {})
	errorLog = vi.spyOn(console, "error").mockImplementation(() => {})
})

afterEach(async () => {
	vi.restoreAllMocks()
	vi.unstubAllEnvs()
	process.exitCode = undefined
	await rm(dir, { recursive: true, force: true })
})

describe("adjnorm", () => {
	test("writes <name>_normalized next to the input", async () => {
		const input = join(dir, "graph.txt")
		await writeFile(input, "A B C\nB A\nD\n")

		await cli(input)

		expect(process.exitCode).toBeUndefined()
		expect(await readFile(join(dir, "graph_normalized.txt"), "utf-8")).toBe(
			"A B C\nB A\nC A\n",
		)
		expect(log).toHaveBeenCalledWith(
			"  \x1b[33m!\x1b[0m Excluded 1 isolated vertex(es) with no neighbors",
		)
	})

	test("honours --output and --order", async () => {
		const input = join(dir, "graph.txt")
		const output = join(dir, "custom.adj")
		await writeFile(input, "10 2\n2 9\n")

		await cli(input, "-o", output, "--order", "numeric")

		expect(await readFile(output, "utf-8")).toBe("2 9 10\n9 2\n10 2\n")
	})

	test("uses the configured suffix", async () => {
		const input = join(dir, "graph.txt")
		await writeFile(input, "A B\n")

		await cli("config", "set", "outputSuffix", "_clean")
		await cli(input)

		expect(await readFile(join(dir, "graph_clean.txt"), "utf-8")).toBe(
			"A B\nB A\n",
		)
	})

	test("--suffix overrides the configured suffix", async () => {
		const input = join(dir, "graph.txt")
		await writeFile(input, "A B\n")

		await cli("config", "set", "outputSuffix", "_clean")
		await cli(input, "--suffix", "_flag")

		expect(existsSync(join(dir, "graph_flag.txt"))).toBe(true)
		expect(existsSync(join(dir, "graph_clean.txt"))).toBe(false)
	})

	test("writes snapshots with --artifacts", async () => {
		const input = join(dir, "graph.txt")
		await writeFile(input, "A B\nC\n")

		await cli(input, "--artifacts")

		const loaded = JSON.parse(
			await readFile(join(dir, "graph_normalized.loaded.json"), "utf-8"),
		)
		const filtered = JSON.parse(
			await readFile(join(dir, "graph_normalized.filtered.json"), "utf-8"),
		)
		expect(loaded.adjacency).toEqual({ A: ["B"], B: ["A"], C: [] })
		expect(filtered.adjacency).toEqual({ A: ["B"], B: ["A"] })
	})

	test("snapshots the input graph even when the output replaces it", async () => {
		const input = join(dir, "g.txt")
		await writeFile(input, "A B\nC\n")

		await cli(input, "-o", input, "--artifacts")

		expect(await readFile(input, "utf-8")).toBe("A B\nB A\n")
		const loaded = JSON.parse(
			await readFile(join(dir, "g.loaded.json"), "utf-8"),
		)
		expect(loaded.adjacency).toEqual({ A: ["B"], B: ["A"], C: [] })
	})

	test("snapshots the relabeled graph that was written", async () => {
		const input = join(dir, "graph.txt")
		await writeFile(input, "x y\n")

		await cli(input, "--relabel", "--artifacts")

		expect(await readFile(join(dir, "graph_normalized.txt"), "utf-8")).toBe(
			"0 1\n1 0\n",
		)
		const loaded = JSON.parse(
			await readFile(join(dir, "graph_normalized.loaded.json"), "utf-8"),
		)
		const filtered = JSON.parse(
			await readFile(join(dir, "graph_normalized.filtered.json"), "utf-8"),
		)
		expect(loaded.adjacency).toEqual({ x: ["y"], y: ["x"] })
		expect(filtered.adjacency).toEqual({ "0": ["1"], "1": ["0"] })
	})

	test("exits with 1 when the output cannot be written", async () => {
		const input = join(dir, "graph.txt")
		const output = join(dir, "no-such-dir", "out.txt")
		await writeFile(input, "A B\n")

		await cli(input, "-o", output)

		expect(process.exitCode).toBe(1)
		expect(existsSync(output)).toBe(false)
		expect(errorLog).toHaveBeenCalledTimes(1)
		expect(
			String(errorLog.mock.calls[0]?.[0]).startsWith(
				`\x1b[31m✗\x1b[0m serialize failed: Cannot write ${output}:`,
			),
		).toBe(true)
	})

	test("exits with 1 when the input cannot be read", async () => {
		const input = join(dir, "missing.txt")

		await cli(input)

		expect(process.exitCode).toBe(1)
		expect(existsSync(join(dir, "missing_normalized.txt"))).toBe(false)
		expect(errorLog).toHaveBeenCalledTimes(1)
	})

	test("exits with 1 when the config file is invalid", async () => {
		const input = join(dir, "graph.txt")
		await writeFile(input, "A B\n")
		await writeFile(join(dir, "config.json"), '{"order":"random"}')

		await cli(input)

		expect(process.exitCode).toBe(1)
		expect(existsSync(join(dir, "graph_normalized.txt"))).toBe(false)
	})
})

/**
 * Configuration storage for the adjnorm CLI
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs"
import { homedir } from "node:os"
import { dirname, join } from "node:path"
import { z } from "zod"
import { ConfigError } from "../errors"

export const DEFAULT_OUTPUT_SUFFIX = "_normalized"

export const AdjnormConfigSchema = z
	.object({
		outputSuffix: z.string().min(1).optional(),
		order: z.enum(["lexicographic", "numeric", "insertion"]).optional(),
		format: z.enum(["adjacency", "edge-list"]).optional(),
	})
	.strict()

export type AdjnormConfig = z.infer<typeof AdjnormConfigSchema>

export type AdjnormConfigKey = keyof AdjnormConfig

export const CONFIG_KEYS: readonly AdjnormConfigKey[] = [
	"outputSuffix",
	"order",
	"format",
]

export function isConfigKey(key: string): key is AdjnormConfigKey {
	return CONFIG_KEYS.some((k) => k === key)
}

/**
 * Get the path to the config file.
 * ADJNORM_CONFIG overrides the default location under ~/.config.
 */
export function getConfigPath(): string {
	return (
		process.env.ADJNORM_CONFIG ??
		join(homedir(), ".config", "adjnorm", "config.json")
	)
}

/**
 * Load config from disk. A missing file yields an empty config; an unreadable
 * or invalid one throws ConfigError.
 */
export function loadConfig(): AdjnormConfig {
	const configPath = getConfigPath()

	if (!existsSync(configPath)) {
		return {}
	}

	let raw: unknown
	try {
		raw = JSON.parse(readFileSync(configPath, "utf-8"))
	} catch (error) {
		throw new ConfigError(
			configPath,
			error instanceof Error ? error.message : String(error),
			error,
		)
	}

	const result = AdjnormConfigSchema.safeParse(raw)
	if (!result.success) {
		const detail = result.error.issues
			.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
			.join("; ")
		throw new ConfigError(configPath, detail, result.error)
	}
	return result.data
}

/**
 * Save config to disk
 */
export function saveConfig(config: AdjnormConfig): void {
	const configPath = getConfigPath()
	const configDir = dirname(configPath)

	if (!existsSync(configDir)) {
		mkdirSync(configDir, { recursive: true })
	}

	writeFileSync(configPath, JSON.stringify(config, null, 2))
}

/**
 * Validate one key/value pair and store it
 */
export function setConfigValue(
	key: AdjnormConfigKey,
	value: string,
): AdjnormConfig {
	const next = AdjnormConfigSchema.safeParse({
		...loadConfig(),
		[key]: value,
	})
	if (!next.success) {
		const issue = next.error.issues[0]
		throw new ConfigError(
			getConfigPath(),
			`${key}: ${issue?.message ?? "invalid value"}`,
			next.error,
		)
	}
	saveConfig(next.data)
	return next.data
}

export function unsetConfigValue(key: AdjnormConfigKey): AdjnormConfig {
	const config = loadConfig()
	delete config[key]
	saveConfig(config)
	return config
}

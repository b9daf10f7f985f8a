import {
	type AdjnormConfigKey,
	CONFIG_KEYS,
	getConfigPath,
	isConfigKey,
	loadConfig,
	saveConfig,
	setConfigValue,
	unsetConfigValue,
} from "@adjnorm/core"
import { Command, InvalidArgumentError } from "commander"

function parseKey(key: string): AdjnormConfigKey {
	if (!isConfigKey(key)) {
		throw new InvalidArgumentError(
			`Unknown key. Available keys: ${CONFIG_KEYS.join(", ")}`,
		)
	}
	return key
}

export function createConfigCommand(): Command {
	const configCommand = new Command("config").description(
		"Manage adjnorm configuration",
	)

	configCommand
		.command("set")
		.description("Set a configuration value")
		.argument("<key>", `One of: ${CONFIG_KEYS.join(", ")}`, parseKey)
		.argument("<value>", "Value to store")
		.action((key: AdjnormConfigKey, value: string) => {
			setConfigValue(key, value)
			console.log(`${key} saved to ${getConfigPath()}`)
		})

	configCommand
		.command("unset")
		.description("Remove a configuration value")
		.argument("<key>", `One of: ${CONFIG_KEYS.join(", ")}`, parseKey)
		.action((key: AdjnormConfigKey) => {
			unsetConfigValue(key)
			console.log(`${key} cleared`)
		})

	configCommand
		.command("show")
		.description("Show current configuration")
		.action(() => {
			const configPath = getConfigPath()
			const config = loadConfig()

			console.log(`Config file: ${configPath}\n`)
			for (const key of CONFIG_KEYS) {
				console.log(`${key}: ${config[key] ?? "not set"}`)
			}
		})

	configCommand
		.command("clear")
		.description("Remove every stored value")
		.action(() => {
			saveConfig({})
			console.log("Configuration cleared")
		})

	configCommand
		.command("path")
		.description("Show the config file path")
		.action(() => {
			console.log(getConfigPath())
		})

	return configCommand
}


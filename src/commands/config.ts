import type { Command } from 'commander'
import {
	CONFIG_KEYS,
	getConfigPath,
	isConfigKey,
	loadConfig,
	parseConfigValue,
	saveConfig,
} from '../core/config.js'

export function registerConfigCommand(program: Command): void {
	const config = program.command('config').description('Manage configuration')

	config
		.command('show')
		.description('Show current configuration')
		.action(() => {
			const cfg = loadConfig()
			console.log(`Config file: ${getConfigPath()}\n`)
			console.log(
				JSON.stringify(
					{
						...cfg,
						apiKey: cfg.apiKey ? '***configured***' : undefined,
					},
					null,
					2,
				),
			)
		})

	config
		.command('set <key> <value>')
		.description('Set a configuration value')
		.action((key: string, value: string) => {
			if (!isConfigKey(key)) {
				throw new Error(`Invalid key: ${key}. Valid keys: ${CONFIG_KEYS.join(', ')}`)
			}
			saveConfig(parseConfigValue(key, value))
			console.log(`Set ${key} = ${key === 'apiKey' ? '***' : value}`)
		})

	config
		.command('path')
		.description('Show config file path')
		.action(() => {
			console.log(getConfigPath())
		})
}

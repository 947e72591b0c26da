import type { Command } from 'commander'
import { startStdioServer } from '../server.js'

export function registerServeCommand(program: Command, version: string): void {
	program
		.command('serve', { isDefault: true })
		.description('Serve the tools over MCP on stdin/stdout (default)')
		.action(async () => {
			await startStdioServer({ version })
		})
}

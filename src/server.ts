import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import { type InvokeOptions, invoke } from './core/adapter.js'
import { errorMessage } from './core/errors.js'
import { createLogger } from './core/logger.js'
import { getExposedOperations } from './core/registry.js'

export const SERVER_NAME = 'financial_datasets'

const log = createLogger('server')

export interface ServerOptions {
	version: string
	/** Passed to every invocation; the per-call abort signal is added on top. */
	invokeOptions?: Omit<InvokeOptions, 'signal'>
}

/**
 * The host supplies the cutoff in the request's `_meta`; callers never see
 * it in a tool's input schema.
 */
export function readInjectedCutoff(meta: unknown): string | undefined {
	if (typeof meta !== 'object' || meta === null || !('cutoff_date' in meta)) return undefined
	const value = meta.cutoff_date
	return value === undefined || value === null ? undefined : String(value)
}

export function createServer(options: ServerOptions): McpServer {
	const server = new McpServer({ name: SERVER_NAME, version: options.version })

	for (const spec of getExposedOperations(options.invokeOptions?.config)) {
		server.registerTool(
			spec.name,
			{
				title: spec.title,
				description: spec.description,
				inputSchema: spec.inputShape,
				annotations: { readOnlyHint: true, openWorldHint: true },
			},
			async (args, extra) => {
				const text = await invoke(
					spec.name,
					{ ...args, cutoff_date: readInjectedCutoff(extra._meta) },
					{ ...options.invokeOptions, signal: extra.signal },
				)
				return { content: [{ type: 'text', text }] }
			},
		)
		log.debug(`registered ${spec.name}`)
	}

	return server
}

/** Serves on stdin/stdout until the host closes the stream or signals the process. */
export async function startStdioServer(options: ServerOptions): Promise<void> {
	const server = createServer(options)
	const transport = new StdioServerTransport()

	const shutdown = (cause: string) => {
		log.info(`${cause}, shutting down`)
		void server
			.close()
			.catch((err: unknown) => log.error(`close failed: ${errorMessage(err)}`))
			.finally(() => process.exit(0))
	}
	process.once('SIGINT', () => shutdown('SIGINT'))
	process.once('SIGTERM', () => shutdown('SIGTERM'))
	process.stdin.once('close', () => shutdown('stdin close'))

	await server.connect(transport)
	log.info(`${SERVER_NAME} v${options.version} running on stdio`)
}

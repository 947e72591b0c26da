import { z } from 'zod'
import { invocationArgsSchema, uncheckedCutoffArgsSchema } from '../operations/schemas.js'
import type { OperationSpec } from '../operations/types.js'
import type { InvocationArgs, ToolOutcome } from '../types.js'
import type { Clock } from './clock.js'
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS, type PitConfig, loadConfig } from './config.js'
import { clampEndDate, resolveCutoff } from './cutoff.js'
import { errorMessage } from './errors.js'
import { requestUpstream } from './http.js'
import { createLogger } from './logger.js'
import { getOperation } from './registry.js'

const log = createLogger('adapter')

export interface InvokeOptions {
	/** Aborts the outstanding request when the host abandons the call. */
	signal?: AbortSignal
	clock?: Clock
	/** Replaces the process-wide configuration for this call. */
	config?: PitConfig
}

type PreparedArgs = { ok: true; args: InvocationArgs } | { ok: false; reason: string }

function describeIssues(error: z.ZodError): string {
	return error.issues.map((i) => `${i.path.join('.') || 'args'}: ${i.message}`).join('; ')
}

/**
 * Validates caller arguments against the operation's schema, applies its
 * defaults and attaches the cutoff. Unknown argument names are dropped.
 * The cutoff's format is only checked for operations that use it.
 */
export function prepareArgs(
	spec: OperationSpec,
	raw: Record<string, unknown>,
	cutoffDate: string,
): PreparedArgs {
	const own = z.object(spec.inputShape).safeParse(raw)
	if (!own.success) return { ok: false, reason: describeIssues(own.error) }

	const schema = spec.cutoff === 'none' ? uncheckedCutoffArgsSchema : invocationArgsSchema
	const full = schema.safeParse({ ...own.data, cutoff_date: cutoffDate })
	if (!full.success) return { ok: false, reason: describeIssues(full.error) }
	return { ok: true, args: full.data }
}

export function applyCutoff(spec: OperationSpec, args: InvocationArgs): InvocationArgs {
	if (spec.cutoff !== 'clamp-end-date') return args
	const endDate = clampEndDate(args.end_date ?? args.cutoff_date, args.cutoff_date)
	if (endDate !== args.end_date) {
		log.debug(`${spec.name}: end_date ${args.end_date} clamped to cutoff ${endDate}`)
	}
	return { ...args, end_date: endDate }
}

export function buildUrl(spec: OperationSpec, args: InvocationArgs, baseUrl: string): string {
	const url = new URL(`${baseUrl.replace(/\/+$/, '')}${spec.path}`)
	for (const [key, value] of spec.query(args)) {
		if (value !== undefined && value !== '') {
			url.searchParams.append(key, String(value))
		}
	}
	return url.toString()
}

function isEmpty(value: unknown): boolean {
	if (value === undefined || value === null || value === '') return true
	if (Array.isArray(value)) return value.length === 0
	if (typeof value === 'object') return Object.keys(value).length === 0
	return false
}

/** The envelope field of a decoded body, or undefined when it holds nothing. */
export function extractEnvelope(body: unknown, field: string): unknown {
	if (typeof body !== 'object' || body === null || Array.isArray(body)) return undefined
	const value: unknown = Object.getOwnPropertyDescriptor(body, field)?.value
	return isEmpty(value) ? undefined : value
}

/** Data renders as pretty JSON; every other outcome as the operation's not-found text. */
export function renderOutcome(spec: OperationSpec, outcome: ToolOutcome): string {
	if (outcome.kind === 'data') return JSON.stringify(outcome.value, null, 2)
	return spec.notFound
}

function requireOperation(name: string): OperationSpec {
	const spec = getOperation(name)
	if (!spec) throw new Error(`Unknown operation "${name}"`)
	return spec
}

export async function invokeOutcome(
	name: string,
	rawArgs: Record<string, unknown>,
	options: InvokeOptions = {},
): Promise<ToolOutcome> {
	const spec = requireOperation(name)
	const config = options.config ?? loadConfig()

	const injected = rawArgs.cutoff_date
	const cutoffDate = resolveCutoff({
		injected: injected === undefined ? undefined : String(injected),
		configured: config.cutoffDate,
		clock: options.clock,
	})

	const prepared = prepareArgs(spec, rawArgs, cutoffDate)
	if (!prepared.ok) {
		log.warn(`${spec.name}: invalid arguments (${prepared.reason})`)
		return { kind: 'invalid-args', reason: prepared.reason }
	}

	const args = applyCutoff(spec, prepared.args)
	const baseUrl = config.baseUrl ?? DEFAULT_BASE_URL
	let url: string
	try {
		url = buildUrl(spec, args, baseUrl)
	} catch (err) {
		const reason = `cannot build request URL from base "${baseUrl}": ${errorMessage(err)}`
		log.warn(`${spec.name}: ${reason}`)
		return { kind: 'upstream-error', url: baseUrl, reason }
	}
	log.debug(`${spec.name}: GET ${url}`)

	const response = await requestUpstream(url, {
		apiKey: config.apiKey,
		timeoutMs: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
		signal: options.signal,
	})

	if (response.kind === 'upstream-error') {
		log.warn(`${spec.name}: ${response.reason}`)
		return { kind: 'upstream-error', url, reason: response.reason, status: response.status }
	}

	const value = extractEnvelope(response.body, spec.envelope)
	if (value === undefined) {
		log.debug(`${spec.name}: no ${spec.envelope} in response`)
		return { kind: 'not-found', url }
	}
	return { kind: 'data', value, url }
}

/**
 * Runs one operation and renders its result as the tool's text.
 * Upstream failures and empty results resolve to the not-found string; this
 * only rejects for an operation name that was never registered.
 */
export async function invoke(
	name: string,
	rawArgs: Record<string, unknown> = {},
	options: InvokeOptions = {},
): Promise<string> {
	const spec = requireOperation(name)
	return renderOutcome(spec, await invokeOutcome(name, rawArgs, options))
}

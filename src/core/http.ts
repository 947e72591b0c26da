import type { UpstreamResponse } from '../types.js'
import { UpstreamError, errorMessage, isAbortError } from './errors.js'

export interface RequestOptions {
	apiKey?: string
	timeoutMs: number
	/** Fires when the host abandons the call. */
	signal?: AbortSignal
}

const MAX_ERROR_BODY = 200

/**
 * One GET against the upstream API. Throws `UpstreamError` for non-2xx and
 * undecodable bodies; transport errors and aborts propagate as thrown.
 */
export async function upstreamGet(url: string, options: RequestOptions): Promise<unknown> {
	if (options.signal?.aborted) throw options.signal.reason

	const headers: Record<string, string> = { Accept: 'application/json' }
	if (options.apiKey) headers['X-API-KEY'] = options.apiKey

	const controller = new AbortController()
	const timer = setTimeout(() => controller.abort(), options.timeoutMs)
	const onAbort = () => controller.abort()
	options.signal?.addEventListener('abort', onAbort, { once: true })

	try {
		const res = await fetch(url, { headers, signal: controller.signal })
		if (!res.ok) {
			const text = await res.text()
			throw new UpstreamError(
				`upstream error ${res.status}: ${text.slice(0, MAX_ERROR_BODY)}`,
				url,
				res.status,
			)
		}
		const text = await res.text()
		try {
			return JSON.parse(text)
		} catch (err) {
			throw new UpstreamError(`malformed response body: ${errorMessage(err)}`, url, res.status)
		}
	} finally {
		clearTimeout(timer)
		options.signal?.removeEventListener('abort', onAbort)
	}
}

/** `upstreamGet` with every failure folded into an `upstream-error` outcome. */
export async function requestUpstream(
	url: string,
	options: RequestOptions,
): Promise<UpstreamResponse> {
	try {
		return { kind: 'data', body: await upstreamGet(url, options) }
	} catch (err) {
		if (err instanceof UpstreamError) {
			return { kind: 'upstream-error', reason: err.message, status: err.status }
		}
		if (isAbortError(err)) {
			const reason = options.signal?.aborted
				? 'request cancelled'
				: `request timed out after ${options.timeoutMs}ms`
			return { kind: 'upstream-error', reason }
		}
		return { kind: 'upstream-error', reason: `request failed: ${errorMessage(err)}` }
	}
}

/** A non-2xx response, or a body that could not be decoded, from the upstream API. */
export class UpstreamError extends Error {
	readonly status?: number
	readonly url: string

	constructor(message: string, url: string, status?: number) {
		super(message)
		this.name = 'UpstreamError'
		this.url = url
		this.status = status
	}
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}

// DOMException is not an Error subclass in every runtime, so match on name
export function isAbortError(err: unknown): boolean {
	if (typeof err !== 'object' || err === null || !('name' in err)) return false
	return err.name === 'AbortError' || err.name === 'TimeoutError'
}

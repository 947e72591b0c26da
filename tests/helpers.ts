import { vi } from 'vitest'

export type FetchMock = ReturnType<typeof stubFetch>

/** Replaces global fetch with a mock answering every call with `status` and `body`. */
export function stubFetch(body: unknown, status = 200) {
	const mock = vi.fn(
		async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> =>
			new Response(typeof body === 'string' ? body : JSON.stringify(body), { status }),
	)
	vi.stubGlobal('fetch', mock)
	return mock
}

export function requestedUrl(mock: FetchMock, call = 0): string {
	return String(mock.mock.calls[call][0])
}

export function requestedQuery(mock: FetchMock, call = 0): Record<string, string> {
	return Object.fromEntries(new URL(requestedUrl(mock, call)).searchParams)
}

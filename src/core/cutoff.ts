import { type Clock, systemClock, today } from './clock.js'

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/

export function isIsoDate(value: string): boolean {
	const m = ISO_DATE.exec(value)
	if (!m) return false
	const [year, month, day] = [Number(m[1]), Number(m[2]), Number(m[3])]
	const d = new Date(Date.UTC(year, month - 1, day))
	return d.getUTCFullYear() === year && d.getUTCMonth() === month - 1 && d.getUTCDate() === day
}

/**
 * Upper bound actually sent upstream for a date-range query.
 * An end date after the cutoff, or one that is not YYYY-MM-DD, becomes the cutoff.
 */
export function clampEndDate(endDate: string, cutoffDate: string): string {
	if (!isIsoDate(endDate)) return cutoffDate
	return endDate > cutoffDate ? cutoffDate : endDate
}

export interface CutoffSources {
	/** Value injected by the host for this call. */
	injected?: string
	/** Process-wide default from configuration. */
	configured?: string
	clock?: Clock
}

/**
 * Picks the cutoff for one invocation. Falls back to the clock's current date,
 * read at call time so a long-lived server never serves a stale default.
 */
export function resolveCutoff(sources: CutoffSources): string {
	if (sources.injected) return sources.injected
	if (sources.configured) return sources.configured
	return today(sources.clock ?? systemClock)
}

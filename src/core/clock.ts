export interface Clock {
	now(): Date
}

export const systemClock: Clock = {
	now: () => new Date(),
}

/** Calendar date of `date` in UTC as YYYY-MM-DD. */
export function formatIsoDate(date: Date): string {
	return date.toISOString().slice(0, 10)
}

export function today(clock: Clock = systemClock): string {
	return formatIsoDate(clock.now())
}

import type { CacheEntry, SignalMeta, SignalStatus } from "@signalboard/core"

/**
 * One dashboard row: a registered signal joined with its cached result.
 */
export interface SignalView {
	id: string
	title: string
	status: SignalStatus
	value: string
	ts: Date
	ageSeconds: number
	details: string | null
	link: string | null
}

export const NO_DATA = "no data yet"

/**
 * Joins `metas` with cache entries, in `metas` order. Signals without a cached
 * result show as `unknown` with zero age.
 */
export function buildViews(
	metas: readonly SignalMeta[],
	entries: ReadonlyMap<string, CacheEntry>,
	now: Date,
): SignalView[] {
	return metas.map((meta): SignalView => {
		const result = entries.get(meta.id)?.result
		if (!result) {
			return {
				id: meta.id,
				title: meta.title,
				status: "unknown",
				value: NO_DATA,
				ts: now,
				ageSeconds: 0,
				details: null,
				link: null,
			}
		}

		return {
			id: meta.id,
			title: meta.title,
			status: result.status,
			value: result.value,
			ts: result.ts,
			ageSeconds: Math.max(Math.floor((now.getTime() - result.ts.getTime()) / 1000), 0),
			details: result.details ?? null,
			link: result.link ?? null,
		}
	})
}

/**
 * Largest whole unit: `45s`, `12m`, `3h`, `9d`.
 */
export function formatAge(ageSeconds: number): string {
	if (ageSeconds < 60) return `${ageSeconds}s`
	if (ageSeconds < 3600) return `${Math.floor(ageSeconds / 60)}m`
	if (ageSeconds < 86400) return `${Math.floor(ageSeconds / 3600)}h`
	return `${Math.floor(ageSeconds / 86400)}d`
}

import type { Signal, SignalFetchOptions, SignalMeta, SignalResult, SignalStatus } from "@signalboard/core"

import {
	HttpStatusError,
	InvalidPayloadError,
	NetworkError,
	badResult,
	describeError,
	signalResult,
} from "@signalboard/core"

import type { DogWalk, IDogWalkApi } from "./dog-walk-api.ts"

import { DogWalkApi } from "./dog-walk-api.ts"

const DAY_MS = 86_400_000

export interface DogWalkSignalOptions {
	/** Default: `dog-walk` */
	id?: string
	/** Default: `Dog: latest walk` */
	title?: string
	/** Default: `http://localhost:5010` */
	baseUrl?: string
	/** Default: 120 */
	pollIntervalSeconds?: number
	/** mDNS names can take a few seconds to resolve. Default: 6 */
	timeoutSeconds?: number
	client?: IDogWalkApi
	now?: () => Date
}

/**
 * How long ago the dog was last walked: `ok` today, `warn` yesterday, `bad`
 * after two days or more.
 *
 * Walk times carry no zone and are read as UTC.
 */
export class DogWalkSignal implements Signal {
	readonly meta: SignalMeta

	private readonly client: IDogWalkApi
	private readonly now: () => Date

	constructor(options: DogWalkSignalOptions = {}) {
		this.meta = {
			id: options.id ?? "dog-walk",
			title: options.title ?? "Dog: latest walk",
			pollIntervalSeconds: options.pollIntervalSeconds ?? 120,
			timeoutSeconds: options.timeoutSeconds ?? 6,
		}
		this.client = options.client ?? new DogWalkApi(options.baseUrl ?? "http://localhost:5010")
		this.now = options.now ?? (() => new Date())
	}

	async fetch(options?: SignalFetchOptions): Promise<SignalResult> {
		const now = this.now()
		const link = this.client.url

		let walk: DogWalk
		try {
			walk = await this.client.fetchLatestWalk(options)
		} catch (err) {
			if (err instanceof HttpStatusError) {
				return badResult(`dogwalk HTTP ${err.status}`, { ts: now, details: err.statusText, link })
			}
			if (err instanceof NetworkError) {
				return badResult("dogwalk unreachable", { ts: now, details: err.message, link })
			}
			if (err instanceof InvalidPayloadError) {
				return badResult("dogwalk payload invalid", { ts: now, details: err.message, link })
			}
			return badResult("dogwalk fetch failed", { ts: now, details: describeError(err), link })
		}

		const endedAt = parseWalkTime(walk.date, walk.end)
		if (!endedAt) {
			return badResult("bad walk timestamp", {
				ts: now,
				details: `date=${JSON.stringify(walk.date)} end=${JSON.stringify(walk.end)}`,
				link,
			})
		}

		const ageDays = Math.max(Math.floor((now.getTime() - endedAt.getTime()) / DAY_MS), 0)

		let details = `${walk.duration}m (${walk.start}–${walk.end})`
		if (walk.notes) {
			details += ` · ${walk.notes}`
		}

		return signalResult(statusFor(ageDays), ageDays === 0 ? "walked today" : `${ageDays}d since last walk`, {
			ts: endedAt,
			details,
			link,
		})
	}
}

function statusFor(ageDays: number): SignalStatus {
	if (ageDays >= 2) return "bad"
	if (ageDays === 1) return "warn"
	return "ok"
}

/**
 * `2026-01-25` + `10:55` → UTC instant, or null if either part is malformed.
 */
export function parseWalkTime(date: string, time: string): Date | null {
	const dateMatch = /^(\d{4})-(\d{2})-(\d{2})$/.exec(date.trim())
	const timeMatch = /^(\d{1,2}):(\d{2})$/.exec(time.trim())
	if (!dateMatch || !timeMatch) {
		return null
	}

	const [, year, month, day] = dateMatch.map(Number)
	const [, hour, minute] = timeMatch.map(Number)
	if (
		year === undefined ||
		month === undefined ||
		day === undefined ||
		hour === undefined ||
		minute === undefined ||
		hour > 23 ||
		minute > 59
	) {
		return null
	}

	const result = new Date(Date.UTC(year, month - 1, day, hour, minute))
	// Date.UTC rolls over out-of-range days (2026-02-30 → March 2).
	if (result.getUTCMonth() !== month - 1 || result.getUTCDate() !== day) {
		return null
	}
	return result
}

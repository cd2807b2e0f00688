import type { Signal, SignalFetchOptions, SignalMeta, SignalResult } from "@signalboard/core"

import {
	HttpStatusError,
	InvalidPayloadError,
	NetworkError,
	badResult,
	describeError,
	okResult,
	signalResult,
} from "@signalboard/core"

import type { IMedCheckApi, MedCheckStatus } from "./med-check-api.ts"

import { MedCheckApi } from "./med-check-api.ts"

export interface MedCheckSignalOptions {
	/** Default: `med-check` */
	id?: string
	/** Default: `MedCheck` */
	title?: string
	/** Default: `http://localhost:5055` */
	baseUrl?: string
	/**
	 * A dose not yet taken turns `bad` once the daily reset is this close.
	 * Default: 7200 (two hours)
	 */
	badWithinSeconds?: number
	/** Default: 120 */
	pollIntervalSeconds?: number
	/** Default: 1.5 */
	timeoutSeconds?: number
	client?: IMedCheckApi
	now?: () => Date
}

/**
 * Whether today's medication has been taken.
 *
 * @example
 * ```ts
 * export default new MedCheckSignal({ baseUrl: "http://apps.local:5055" })
 * ```
 */
export class MedCheckSignal implements Signal {
	readonly meta: SignalMeta

	private readonly badWithinSeconds: number
	private readonly client: IMedCheckApi
	private readonly now: () => Date

	constructor(options: MedCheckSignalOptions = {}) {
		this.meta = {
			id: options.id ?? "med-check",
			title: options.title ?? "MedCheck",
			pollIntervalSeconds: options.pollIntervalSeconds ?? 120,
			timeoutSeconds: options.timeoutSeconds ?? 1.5,
		}
		this.badWithinSeconds = options.badWithinSeconds ?? 2 * 3600
		this.client = options.client ?? new MedCheckApi(options.baseUrl ?? "http://localhost:5055")
		this.now = options.now ?? (() => new Date())
	}

	async fetch(options?: SignalFetchOptions): Promise<SignalResult> {
		const now = this.now()
		const link = this.client.url

		let status: MedCheckStatus
		try {
			status = await this.client.fetchStatus(options)
		} catch (err) {
			if (err instanceof HttpStatusError) {
				return badResult(`medcheck HTTP ${err.status}`, { ts: now, details: err.statusText, link })
			}
			if (err instanceof NetworkError) {
				return badResult("medcheck unreachable", { ts: now, details: err.message, link })
			}
			if (err instanceof InvalidPayloadError) {
				return badResult("medcheck payload invalid", { ts: now, details: err.message, link })
			}
			return badResult("medcheck fetch failed", { ts: now, details: describeError(err), link })
		}

		const { timeZone } = status
		const resets = formatLocalTime(status.resetsAt, timeZone)

		if (status.taken) {
			const takenAt = status.takenAt ?? now
			return okResult("taken ✅", {
				ts: takenAt,
				details: `taken at ${formatLocalTime(takenAt, timeZone)} · resets ${resets}`,
				link,
			})
		}

		const secondsToReset = Math.floor((status.resetsAt.getTime() - now.getTime()) / 1000)
		return signalResult(secondsToReset <= this.badWithinSeconds ? "bad" : "warn", "not taken ⚠️", {
			ts: status.resetsAt,
			details: `resets ${resets} (in ${formatDuration(secondsToReset)})`,
			link,
		})
	}
}

/**
 * `3:00 AM` in `timeZone`, or `03:00 UTC` if the zone is unknown.
 */
export function formatLocalTime(date: Date, timeZone: string): string {
	let parts: Intl.DateTimeFormatPart[]
	try {
		parts = new Intl.DateTimeFormat("en-US", {
			timeZone,
			hour: "numeric",
			minute: "2-digit",
			hour12: true,
		}).formatToParts(date)
	} catch (err) {
		if (!(err instanceof RangeError)) {
			throw err
		}
		const hh = String(date.getUTCHours()).padStart(2, "0")
		const mm = String(date.getUTCMinutes()).padStart(2, "0")
		return `${hh}:${mm} UTC`
	}

	const part = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? ""
	return `${part("hour")}:${part("minute")} ${part("dayPeriod")}`
}

/**
 * `2h 5m`, `2h`, or `5m`. Negative durations format as `0m`.
 */
export function formatDuration(seconds: number): string {
	const clamped = Math.max(seconds, 0)
	const hours = Math.floor(clamped / 3600)
	const minutes = Math.floor((clamped % 3600) / 60)
	if (hours && minutes) return `${hours}h ${minutes}m`
	if (hours) return `${hours}h`
	return `${minutes}m`
}

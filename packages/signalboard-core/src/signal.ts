import { type } from "arktype"

export const SignalStatus = {
	Ok: "ok",
	Warn: "warn",
	Bad: "bad",
	Unknown: "unknown",
} as const

export type SignalStatus = (typeof SignalStatus)[keyof typeof SignalStatus]

export const SIGNAL_STATUSES: readonly SignalStatus[] = [
	SignalStatus.Ok,
	SignalStatus.Warn,
	SignalStatus.Bad,
	SignalStatus.Unknown,
]

/**
 * Immutable descriptor of a signal.
 */
export interface SignalMeta {
	/** Stable identifier, unique across the registry. Used as the cache key. */
	readonly id: string
	/** Display name */
	readonly title: string
	/** Minimum seconds between fetch attempts. Must be > 0. */
	readonly pollIntervalSeconds: number
	/** Maximum seconds a fetch may run before it is treated as failed. Must be > 0. */
	readonly timeoutSeconds: number
	/**
	 * Fetch outside the refresh batch. The batch records a placeholder and the
	 * result lands in the cache when the background fetch completes.
	 */
	readonly background?: boolean
}

/**
 * Value produced by one fetch.
 *
 * `ts` is the time of the underlying event (last commit, last walk, ...),
 * not the time of the fetch.
 */
export interface SignalResult {
	readonly status: SignalStatus
	/** Short human-readable value */
	readonly value: string
	readonly ts: Date
	readonly details?: string
	readonly link?: string
}

export interface SignalFetchOptions {
	/** Aborted when the engine abandons the fetch (timeout or shutdown). */
	abortSignal?: AbortSignal
}

/**
 * A pluggable unit of work that fetches one external fact.
 *
 * `fetch()` must not throw, retry, or sleep. Any failure is reported as a
 * `bad` result with `details` describing the cause. No I/O may happen at
 * module load or construction time, only inside `fetch()`.
 *
 * @example
 * ```ts
 * export default defineSignal({
 *   meta: { id: "board-health", title: "Board Health", pollIntervalSeconds: 60, timeoutSeconds: 1 },
 *   async fetch() {
 *     return okResult("board alive")
 *   },
 * })
 * ```
 */
export interface Signal {
	readonly meta: SignalMeta
	fetch(options?: SignalFetchOptions): Promise<SignalResult>
}

/**
 * Typed identity helper for signal plugin modules.
 */
export function defineSignal<T extends Signal>(signal: T): T {
	return signal
}

type ResultExtras = Pick<SignalResult, "details" | "link"> & { ts?: Date }

export function signalResult(status: SignalStatus, value: string, extras: ResultExtras = {}): SignalResult {
	const { ts = new Date(), details, link } = extras
	return {
		status,
		value,
		ts,
		...(details !== undefined ? { details } : {}),
		...(link !== undefined ? { link } : {}),
	}
}

export function okResult(value: string, extras?: ResultExtras): SignalResult {
	return signalResult(SignalStatus.Ok, value, extras)
}

export function warnResult(value: string, extras?: ResultExtras): SignalResult {
	return signalResult(SignalStatus.Warn, value, extras)
}

export function badResult(value: string, extras?: ResultExtras): SignalResult {
	return signalResult(SignalStatus.Bad, value, extras)
}

export function unknownResult(value: string, extras?: ResultExtras): SignalResult {
	return signalResult(SignalStatus.Unknown, value, extras)
}

// Schemas

export const signalStatusSchema = type("'ok' | 'warn' | 'bad' | 'unknown'")

export const signalMetaSchema = type({
	id: "string > 0",
	title: "string",
	pollIntervalSeconds: "number > 0",
	timeoutSeconds: "number > 0",
	"background?": "boolean",
})

/**
 * Shape check for values returned by `fetch()` at run time.
 */
export const signalResultSchema = type({
	status: signalStatusSchema,
	value: "string",
	ts: "Date",
	"details?": "string",
	"link?": "string",
})

import { type } from "arktype"

import type { CacheStore } from "./cache-store"
import type { Signal, SignalResult } from "./signal"
import type { RegistryEntry, SignalRegistry } from "./signal-registry"

import { describeError } from "./errors"
import { SignalStatus, badResult, signalResultSchema, unknownResult } from "./signal"

export const FetchOutcome = {
	Succeeded: "succeeded",
	TimedOut: "timed-out",
	Raised: "raised",
	Skipped: "skipped",
	StartedInBackground: "started-in-background",
} as const

export type FetchOutcome = (typeof FetchOutcome)[keyof typeof FetchOutcome]

export interface SignalOutcome {
	signalId: string
	outcome: FetchOutcome
	/** Status written to the cache. Absent for skipped signals. */
	status?: SignalStatus
	durationMs: number
}

export interface RefreshCounts {
	ok: number
	warn: number
	bad: number
	unknown: number
	skipped: number
}

export interface RefreshSummary {
	counts: RefreshCounts
	/** One per registered signal, ordered by id */
	outcomes: SignalOutcome[]
	startedAt: Date
	finishedAt: Date
	durationMs: number
	/** Set when the end-of-batch flush failed. Results are still in memory. */
	flushError?: string
}

export interface RefreshOptions {
	/** Ignore poll intervals and fetch every signal */
	force?: boolean
}

export interface EngineStatus {
	refreshing: boolean
	lastStartedAt: Date | null
	lastFinishedAt: Date | null
	lastSummary: RefreshSummary | null
	scheduler: {
		running: boolean
		tickSeconds: number | null
	}
	background: {
		running: string[]
		done: string[]
	}
}

export interface RefreshEngineOptions {
	registry: SignalRegistry
	cache: CacheStore
	/** Clock used for eligibility and attempt times. Default: `() => new Date()` */
	now?: () => Date
}

export const BACKGROUND_PLACEHOLDER = "generating…"
export const BACKGROUND_ALREADY_RUNNING = "background refresh already running"

export interface Invocation {
	outcome: FetchOutcome
	result: SignalResult
}

const TIMED_OUT: unique symbol = Symbol("timed-out")

/**
 * Invokes eligible signals concurrently and writes their results to the cache.
 *
 * Every fetch runs inside a failure boundary and is bounded by its
 * `timeoutSeconds`, so one slow or broken signal never holds back or fails
 * the batch. A signal is eligible when it has never been attempted or its
 * `pollIntervalSeconds` have elapsed since the last attempt.
 *
 * Only one batch runs at a time. Calling `refreshAll()` while a batch is in
 * flight returns that batch's summary.
 *
 * @example
 * ```ts
 * const engine = new RefreshEngine({ registry, cache })
 *
 * const summary = await engine.refreshAll({ force: true })
 * console.log(summary.counts)
 *
 * engine.start(30)
 * // ...
 * await engine.stop()
 * ```
 */
export class RefreshEngine {
	private readonly registry: SignalRegistry
	private readonly cache: CacheStore
	private readonly now: () => Date

	private inFlight: Promise<RefreshSummary> | null = null
	private lastStartedAt: Date | null = null
	private lastFinishedAt: Date | null = null
	private lastSummary: RefreshSummary | null = null

	private backgroundTasks = new Map<string, Promise<void>>()
	private backgroundDone = new Set<string>()

	private tickSeconds: number | null = null
	private refreshTimer: ReturnType<typeof setTimeout> | null = null
	private scheduledRun: Promise<void> | null = null

	constructor(options: RefreshEngineOptions) {
		this.registry = options.registry
		this.cache = options.cache
		this.now = options.now ?? (() => new Date())
	}

	refreshAll(options: RefreshOptions = {}): Promise<RefreshSummary> {
		if (!this.inFlight) {
			this.inFlight = this.runBatch(options.force ?? false).finally(() => {
				this.inFlight = null
			})
		}
		return this.inFlight
	}

	status(): EngineStatus {
		return {
			refreshing: this.inFlight !== null,
			lastStartedAt: this.lastStartedAt,
			lastFinishedAt: this.lastFinishedAt,
			lastSummary: this.lastSummary,
			scheduler: {
				running: this.tickSeconds !== null,
				tickSeconds: this.tickSeconds,
			},
			background: {
				running: Array.from(this.backgroundTasks.keys()).sort(),
				done: Array.from(this.backgroundDone).sort(),
			},
		}
	}

	/**
	 * Runs a non-forced batch now and then `tickSeconds` after each batch ends.
	 * No-op if already started.
	 */
	start(tickSeconds: number): void {
		if (this.tickSeconds !== null) return

		this.tickSeconds = tickSeconds
		this.runScheduledBatch()
	}

	/**
	 * Cancels the loop. Resolves once the in-flight batch and all background
	 * fetches have completed.
	 */
	async stop(): Promise<void> {
		this.tickSeconds = null
		this.cancelScheduledRefresh()

		await this.scheduledRun
		if (this.inFlight) {
			await this.inFlight
		}
		await Promise.all(this.backgroundTasks.values())
	}

	private async runBatch(force: boolean): Promise<RefreshSummary> {
		const startedAt = this.now()
		const snapshot = this.registry.snapshot()
		this.lastStartedAt = startedAt

		const outcomes = await Promise.all(
			snapshot.metas.map((meta) => {
				const entry = snapshot.entries.get(meta.id)
				if (!entry || !this.isEligible(entry, force)) {
					return Promise.resolve<SignalOutcome>({
						signalId: meta.id,
						outcome: FetchOutcome.Skipped,
						durationMs: 0,
					})
				}
				return meta.background ? Promise.resolve(this.kickOffBackground(entry)) : this.refreshOne(entry)
			}),
		)

		let flushError: string | undefined
		try {
			await this.cache.flush()
		} catch (err) {
			flushError = describeError(err)
			console.error("[signalboard.engine] Cache flush failed:", flushError)
		}

		const finishedAt = this.now()
		const summary: RefreshSummary = {
			counts: countOutcomes(outcomes),
			outcomes,
			startedAt,
			finishedAt,
			durationMs: finishedAt.getTime() - startedAt.getTime(),
			...(flushError !== undefined ? { flushError } : {}),
		}

		this.lastFinishedAt = finishedAt
		this.lastSummary = summary
		return summary
	}

	private isEligible(entry: RegistryEntry, force: boolean): boolean {
		if (force) return true

		const cached = this.cache.get(entry.meta.id)
		if (!cached) return true

		const elapsedMs = this.now().getTime() - cached.lastAttemptAt.getTime()
		return elapsedMs >= entry.meta.pollIntervalSeconds * 1000
	}

	private async refreshOne(entry: RegistryEntry): Promise<SignalOutcome> {
		const attemptAt = this.now()
		const started = performance.now()
		const { outcome, result } = await invokeSignal(entry.signal, this.now)

		this.cache.put(entry.meta.id, result, attemptAt)
		if (outcome !== FetchOutcome.Succeeded) {
			console.warn(`[signalboard.engine] Signal "${entry.meta.id}" ${outcome}: ${result.details ?? result.value}`)
		}

		return {
			signalId: entry.meta.id,
			outcome,
			status: result.status,
			durationMs: Math.round(performance.now() - started),
		}
	}

	private kickOffBackground(entry: RegistryEntry): SignalOutcome {
		const signalId = entry.meta.id
		const running = this.backgroundTasks.has(signalId)
		const placeholder = unknownResult(running ? BACKGROUND_ALREADY_RUNNING : BACKGROUND_PLACEHOLDER, {
			ts: this.now(),
		})
		this.cache.putPlaceholder(signalId, placeholder, this.now())

		if (!running) {
			this.backgroundDone.delete(signalId)
			const task = this.runBackground(entry).finally(() => {
				this.backgroundTasks.delete(signalId)
				this.backgroundDone.add(signalId)
			})
			this.backgroundTasks.set(signalId, task)
		}

		return {
			signalId,
			outcome: FetchOutcome.StartedInBackground,
			status: placeholder.status,
			durationMs: 0,
		}
	}

	private async runBackground(entry: RegistryEntry): Promise<void> {
		const { outcome, result } = await invokeSignal(entry.signal, this.now)

		// Stamped at completion so the result supersedes placeholders written while it ran.
		this.cache.put(entry.meta.id, result, this.now())
		if (outcome !== FetchOutcome.Succeeded) {
			console.warn(
				`[signalboard.engine] Background signal "${entry.meta.id}" ${outcome}: ${result.details ?? result.value}`,
			)
		}

		try {
			await this.cache.flush()
		} catch (err) {
			console.error(`[signalboard.engine] Cache flush after background signal "${entry.meta.id}" failed:`, describeError(err))
		}
	}

	private runScheduledBatch(): void {
		this.scheduledRun = this.refreshAll()
			.then(
				(summary) => {
					const { ok, warn, bad, unknown, skipped } = summary.counts
					console.log(
						`[signalboard.engine] Refresh finished in ${summary.durationMs}ms: ${ok} ok, ${warn} warn, ${bad} bad, ${unknown} unknown, ${skipped} skipped`,
					)
				},
				(err: unknown) => {
					console.error("[signalboard.engine] Scheduled refresh failed:", describeError(err))
				},
			)
			.finally(() => {
				this.scheduledRun = null
				this.scheduleNextRefresh()
			})
	}

	private scheduleNextRefresh(): void {
		if (this.tickSeconds === null) return

		this.cancelScheduledRefresh()
		this.refreshTimer = setTimeout(() => {
			this.refreshTimer = null
			this.runScheduledBatch()
		}, this.tickSeconds * 1000)
	}

	private cancelScheduledRefresh(): void {
		if (this.refreshTimer !== null) {
			clearTimeout(this.refreshTimer)
			this.refreshTimer = null
		}
	}
}

/**
 * Calls `signal.fetch()` inside the failure boundary. Never rejects.
 *
 * On timeout the fetch is abandoned and its abort signal fired; whatever it
 * produces afterwards is discarded.
 */
export async function invokeSignal(signal: Signal, now: () => Date = () => new Date()): Promise<Invocation> {
	const { timeoutSeconds } = signal.meta
	const controller = new AbortController()
	let timer: ReturnType<typeof setTimeout> | undefined

	const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
		timer = setTimeout(() => resolve(TIMED_OUT), timeoutSeconds * 1000)
	})

	try {
		const settled = await Promise.race([
			Promise.resolve().then(() => signal.fetch({ abortSignal: controller.signal })),
			timeout,
		])

		if (settled === TIMED_OUT) {
			controller.abort(new Error(`timeout after ${timeoutSeconds}s`))
			return {
				outcome: FetchOutcome.TimedOut,
				result: badResult("timeout", { details: `timeout after ${timeoutSeconds}s`, ts: now() }),
			}
		}

		const result = signalResultSchema(settled)
		if (result instanceof type.errors) {
			return {
				outcome: FetchOutcome.Raised,
				result: badResult("error", { details: `InvalidResult: ${result.summary}`, ts: now() }),
			}
		}
		if (Number.isNaN(result.ts.getTime())) {
			return {
				outcome: FetchOutcome.Raised,
				result: badResult("error", { details: "InvalidResult: ts must be a valid Date", ts: now() }),
			}
		}

		return { outcome: FetchOutcome.Succeeded, result }
	} catch (err) {
		return {
			outcome: FetchOutcome.Raised,
			result: badResult("error", { details: describeError(err), ts: now() }),
		}
	} finally {
		clearTimeout(timer)
	}
}

function countOutcomes(outcomes: readonly SignalOutcome[]): RefreshCounts {
	const counts: RefreshCounts = { ok: 0, warn: 0, bad: 0, unknown: 0, skipped: 0 }
	for (const { outcome, status } of outcomes) {
		if (outcome === FetchOutcome.Skipped || status === undefined) {
			counts.skipped++
		} else {
			counts[status]++
		}
	}
	return counts
}

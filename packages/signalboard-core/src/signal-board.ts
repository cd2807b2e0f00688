import type { CacheEntry, LoadOutcome } from "./cache-store"
import type { EngineStatus, RefreshSummary } from "./refresh-engine"
import type { SignalMeta } from "./signal"
import type { SignalLoader } from "./signal-loader"
import type { ReloadSummary } from "./signal-registry"

import { CacheStore } from "./cache-store"
import { describeError } from "./errors"
import { RefreshEngine } from "./refresh-engine"
import { SignalRegistry } from "./signal-registry"

export interface SignalBoardOptions {
	loader: SignalLoader
	/** Location of the JSON cache file */
	cachePath: string
	/**
	 * Drop cache entries of signals that disappear on reload.
	 * Default: false, so views keep showing the last value of removed signals.
	 */
	pruneOrphans?: boolean
	now?: () => Date
}

/**
 * Wires registry, cache, and refresh engine together and owns their lifecycle.
 *
 * Views read through `getAllCached()`/`getCached()` and never trigger fetches.
 *
 * @example
 * ```ts
 * const board = new SignalBoard({
 *   loader: directoryLoader({ directory: "./src/signals" }),
 *   cachePath: "data/cache.json",
 * })
 * await board.init()
 * board.start(30)
 *
 * process.on("SIGTERM", () => board.shutdown())
 * ```
 */
export class SignalBoard {
	readonly registry: SignalRegistry
	readonly cache: CacheStore
	readonly engine: RefreshEngine

	private readonly pruneOrphans: boolean

	constructor(options: SignalBoardOptions) {
		this.registry = new SignalRegistry(options.loader)
		this.cache = new CacheStore({ path: options.cachePath })
		this.engine = new RefreshEngine({
			registry: this.registry,
			cache: this.cache,
			...(options.now ? { now: options.now } : {}),
		})
		this.pruneOrphans = options.pruneOrphans ?? false
	}

	/**
	 * Loads the persisted cache and runs the first discovery.
	 */
	async init(): Promise<{ cache: LoadOutcome; registry: ReloadSummary }> {
		const cache = await this.cache.load()
		const registry = await this.reloadRegistry()
		return { cache, registry }
	}

	refreshAll(force = false): Promise<RefreshSummary> {
		return this.engine.refreshAll({ force })
	}

	async reloadRegistry(): Promise<ReloadSummary> {
		const summary = await this.registry.reload()
		if (this.pruneOrphans) {
			const removed = this.cache.retain(this.registry.list().map((meta) => meta.id))
			if (removed > 0) {
				console.log(`[signalboard] Pruned ${removed} cache entries of unregistered signals`)
			}
		}
		return summary
	}

	getAllCached(): ReadonlyMap<string, CacheEntry> {
		return this.cache.getAll()
	}

	getCached(signalIds: Iterable<string>): ReadonlyMap<string, CacheEntry> {
		return this.cache.getMany(signalIds)
	}

	listSignalMetadata(): readonly SignalMeta[] {
		return this.registry.list()
	}

	engineStatus(): EngineStatus {
		return this.engine.status()
	}

	start(tickSeconds: number): void {
		this.engine.start(tickSeconds)
	}

	/**
	 * Stops the refresh loop, waits for running fetches, and flushes the cache
	 * one last time. A failed final flush is logged, not thrown.
	 */
	async shutdown(): Promise<void> {
		await this.engine.stop()
		try {
			await this.cache.flush()
		} catch (err) {
			console.error("[signalboard] Final cache flush failed:", describeError(err))
		}
	}
}

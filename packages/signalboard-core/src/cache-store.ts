import { type } from "arktype"
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises"
import { dirname } from "node:path"

import type { SignalResult } from "./signal"

import { PersistenceError, describeError } from "./errors"
import { SignalStatus, signalStatusSchema } from "./signal"

/**
 * Persisted record of a signal's most recent fetch outcome.
 */
export interface CacheEntry {
	readonly signalId: string
	/** Latest result, including bad ones. Null only if none was ever stored. */
	readonly result: SignalResult | null
	readonly lastAttemptAt: Date
	/** Time of the last attempt that produced a non-bad result */
	readonly lastSuccessAt: Date | null
	readonly consecutiveFailures: number
}

export const LoadStatus = {
	Loaded: "loaded",
	Missing: "missing",
	Corrupt: "corrupt",
} as const

export type LoadStatus = (typeof LoadStatus)[keyof typeof LoadStatus]

export interface LoadOutcome {
	status: LoadStatus
	/** Entries restored into memory */
	entries: number
	/** Entries present in the file but dropped because they failed validation */
	skipped: number
	error?: string
}

export interface CacheStoreOptions {
	/** Location of the JSON cache file */
	path: string
}

const FILE_VERSION = 1

/**
 * Latest known result per signal, held in memory and persisted to a JSON file.
 *
 * Every write replaces the in-memory map with a new one, so a map returned by
 * `getAll()` never changes after it is handed out. `flush()` writes a
 * temporary file and renames it over the target; a concurrent reader of the
 * file sees either the previous or the new content.
 *
 * @example
 * ```ts
 * const cache = new CacheStore({ path: "data/cache.json" })
 * await cache.load()
 *
 * cache.put("github", okResult("2d since last commit"), new Date())
 * await cache.flush()
 * ```
 */
export class CacheStore {
	readonly path: string

	private entries: ReadonlyMap<string, CacheEntry> = new Map()
	private flushChain: Promise<void> = Promise.resolve()
	private tempCounter = 0

	constructor(options: CacheStoreOptions) {
		this.path = options.path
	}

	/**
	 * Replaces in-memory state with the persisted file. A missing or unreadable
	 * file leaves the cache empty; it never throws.
	 */
	async load(): Promise<LoadOutcome> {
		let raw: string
		try {
			raw = await readFile(this.path, "utf8")
		} catch (err) {
			this.entries = new Map()
			if (isNotFound(err)) {
				return { status: LoadStatus.Missing, entries: 0, skipped: 0 }
			}
			const error = describeError(err)
			console.warn(`[signalboard.cache] Could not read ${this.path}, starting empty:`, error)
			return { status: LoadStatus.Corrupt, entries: 0, skipped: 0, error }
		}

		let parsed: unknown
		try {
			parsed = JSON.parse(raw)
		} catch (err) {
			this.entries = new Map()
			const error = describeError(err)
			console.warn(`[signalboard.cache] Corrupt cache file ${this.path}, starting empty:`, error)
			return { status: LoadStatus.Corrupt, entries: 0, skipped: 0, error }
		}

		const file = persistedFile(parsed)
		if (file instanceof type.errors) {
			this.entries = new Map()
			console.warn(`[signalboard.cache] Unrecognized cache file ${this.path}, starting empty:`, file.summary)
			return { status: LoadStatus.Corrupt, entries: 0, skipped: 0, error: file.summary }
		}

		const entries = new Map<string, CacheEntry>()
		let skipped = 0
		for (const [signalId, value] of Object.entries(file.entries)) {
			const entry = persistedEntry(value)
			if (entry instanceof type.errors) {
				console.warn(`[signalboard.cache] Dropping invalid entry "${signalId}":`, entry.summary)
				skipped++
				continue
			}
			entries.set(signalId, deserializeEntry(signalId, entry))
		}

		this.entries = entries
		return { status: LoadStatus.Loaded, entries: entries.size, skipped }
	}

	get(signalId: string): CacheEntry | undefined {
		return this.entries.get(signalId)
	}

	/**
	 * Consistent snapshot of every entry. Later writes do not affect it.
	 */
	getAll(): ReadonlyMap<string, CacheEntry> {
		return this.entries
	}

	/**
	 * Snapshot restricted to `signalIds`. Ids without an entry are omitted.
	 */
	getMany(signalIds: Iterable<string>): ReadonlyMap<string, CacheEntry> {
		const snapshot = this.entries
		const result = new Map<string, CacheEntry>()
		for (const signalId of signalIds) {
			const entry = snapshot.get(signalId)
			if (entry) {
				result.set(signalId, entry)
			}
		}
		return result
	}

	/**
	 * Records the outcome of one fetch attempt.
	 *
	 * A non-bad result resets `consecutiveFailures` and moves `lastSuccessAt`;
	 * a bad one increments the failure count. Attempts older than the stored
	 * `lastAttemptAt` are ignored.
	 *
	 * @returns false if the write was ignored as stale
	 */
	put(signalId: string, result: SignalResult, attemptAt: Date): boolean {
		const previous = this.entries.get(signalId)
		if (previous && attemptAt.getTime() < previous.lastAttemptAt.getTime()) {
			return false
		}

		const failed = result.status === SignalStatus.Bad
		this.write({
			signalId,
			result,
			lastAttemptAt: attemptAt,
			lastSuccessAt: failed ? (previous?.lastSuccessAt ?? null) : attemptAt,
			consecutiveFailures: failed ? (previous?.consecutiveFailures ?? 0) + 1 : 0,
		})
		return true
	}

	/**
	 * Stores a stand-in result for a fetch that is still running. Moves
	 * `lastAttemptAt` but leaves `lastSuccessAt` and `consecutiveFailures` as
	 * they were.
	 *
	 * @returns false if the write was ignored as stale
	 */
	putPlaceholder(signalId: string, result: SignalResult, attemptAt: Date): boolean {
		const previous = this.entries.get(signalId)
		if (previous && attemptAt.getTime() < previous.lastAttemptAt.getTime()) {
			return false
		}

		this.write({
			signalId,
			result,
			lastAttemptAt: attemptAt,
			lastSuccessAt: previous?.lastSuccessAt ?? null,
			consecutiveFailures: previous?.consecutiveFailures ?? 0,
		})
		return true
	}

	private write(entry: CacheEntry): void {
		const next = new Map(this.entries)
		next.set(entry.signalId, Object.freeze(entry))
		this.entries = next
	}

	/**
	 * Drops entries whose id is not in `signalIds`.
	 *
	 * @returns number of entries removed
	 */
	retain(signalIds: Iterable<string>): number {
		const keep = new Set(signalIds)
		const next = new Map<string, CacheEntry>()
		for (const [signalId, entry] of this.entries) {
			if (keep.has(signalId)) {
				next.set(signalId, entry)
			}
		}
		const removed = this.entries.size - next.size
		if (removed > 0) {
			this.entries = next
		}
		return removed
	}

	/**
	 * Persists the current in-memory state. Flushes run one at a time, each
	 * writing whatever state is current when it starts.
	 *
	 * @throws {PersistenceError} If the file could not be written. In-memory
	 * state is left as is.
	 */
	flush(): Promise<void> {
		const run = this.flushChain.then(() => this.writeSnapshot())
		// Keep the chain alive after a failure; the error reaches this call's caller through `run`.
		this.flushChain = run.catch(() => undefined)
		return run
	}

	private async writeSnapshot(): Promise<void> {
		const body = JSON.stringify(serialize(this.entries), null, 2) + "\n"
		const tempPath = `${this.path}.${process.pid}.${++this.tempCounter}.tmp`

		try {
			await mkdir(dirname(this.path), { recursive: true })
			await writeFile(tempPath, body, "utf8")
			await rename(tempPath, this.path)
		} catch (err) {
			await rm(tempPath, { force: true }).catch((cleanupErr: unknown) => {
				console.warn(`[signalboard.cache] Could not remove ${tempPath}:`, describeError(cleanupErr))
			})
			throw new PersistenceError(this.path, `Failed to flush cache (${describeError(err)})`, { cause: err })
		}
	}
}

function isNotFound(err: unknown): boolean {
	return err instanceof Error && "code" in err && err.code === "ENOENT"
}

// Serialization

interface PersistedResult {
	status: SignalResult["status"]
	value: string
	ts: string
	details?: string
	link?: string
}

interface PersistedEntry {
	result: PersistedResult | null
	lastAttemptAt: string
	lastSuccessAt: string | null
	consecutiveFailures: number
}

function serialize(entries: ReadonlyMap<string, CacheEntry>) {
	const out: Record<string, PersistedEntry> = {}
	for (const [signalId, entry] of entries) {
		out[signalId] = {
			result: entry.result ? serializeResult(entry.result) : null,
			lastAttemptAt: entry.lastAttemptAt.toISOString(),
			lastSuccessAt: entry.lastSuccessAt?.toISOString() ?? null,
			consecutiveFailures: entry.consecutiveFailures,
		}
	}
	return { version: FILE_VERSION, savedAt: new Date().toISOString(), entries: out }
}

function serializeResult(result: SignalResult): PersistedResult {
	return {
		status: result.status,
		value: result.value,
		ts: result.ts.toISOString(),
		...(result.details !== undefined ? { details: result.details } : {}),
		...(result.link !== undefined ? { link: result.link } : {}),
	}
}

function deserializeEntry(signalId: string, entry: PersistedEntry): CacheEntry {
	const result = entry.result
	return Object.freeze({
		signalId,
		result: result
			? {
					status: result.status,
					value: result.value,
					ts: new Date(result.ts),
					...(result.details !== undefined ? { details: result.details } : {}),
					...(result.link !== undefined ? { link: result.link } : {}),
				}
			: null,
		lastAttemptAt: new Date(entry.lastAttemptAt),
		lastSuccessAt: entry.lastSuccessAt === null ? null : new Date(entry.lastSuccessAt),
		consecutiveFailures: entry.consecutiveFailures,
	})
}

// Schemas

const persistedResult = type({
	status: signalStatusSchema,
	value: "string",
	ts: "string.date.iso",
	"details?": "string",
	"link?": "string",
})

const persistedEntry = type({
	result: persistedResult.or("null"),
	lastAttemptAt: "string.date.iso",
	lastSuccessAt: "string.date.iso | null",
	consecutiveFailures: "number.integer >= 0",
})

const persistedFile = type({
	version: "1",
	entries: "Record<string, unknown>",
})

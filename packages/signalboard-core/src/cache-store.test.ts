import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest"

import { CacheStore, LoadStatus } from "./cache-store"
import { PersistenceError } from "./errors"
import { badResult, okResult, unknownResult, warnResult } from "./signal"

let directory: string
let cachePath: string

beforeEach(async () => {
	directory = await mkdtemp(join(tmpdir(), "signalboard-cache-"))
	cachePath = join(directory, "cache.json")
	vi.spyOn(console, "warn").mockImplementation(() => {})
})

afterEach(async () => {
	vi.restoreAllMocks()
	await rm(directory, { recursive: true, force: true })
})

const t0 = new Date("2026-03-01T08:00:00.000Z")
const t1 = new Date("2026-03-01T08:01:00.000Z")
const t2 = new Date("2026-03-01T08:02:00.000Z")

// =============================================================================
// PUT
// =============================================================================

describe("put", () => {
	test("stores a successful result", () => {
		const cache = new CacheStore({ path: cachePath })
		const result = okResult("fine", { ts: t0 })

		expect(cache.put("a", result, t0)).toBe(true)

		expect(cache.get("a")).toEqual({
			signalId: "a",
			result,
			lastAttemptAt: t0,
			lastSuccessAt: t0,
			consecutiveFailures: 0,
		})
	})

	test("bad results count failures and keep the last success time", () => {
		const cache = new CacheStore({ path: cachePath })

		cache.put("a", okResult("fine"), t0)
		cache.put("a", badResult("error"), t1)
		cache.put("a", badResult("error"), t2)

		const entry = cache.get("a")
		expect(entry?.result?.status).toBe("bad")
		expect(entry?.lastAttemptAt).toEqual(t2)
		expect(entry?.lastSuccessAt).toEqual(t0)
		expect(entry?.consecutiveFailures).toBe(2)
	})

	test("a bad first result has no success time", () => {
		const cache = new CacheStore({ path: cachePath })

		cache.put("a", badResult("timeout"), t0)

		expect(cache.get("a")?.lastSuccessAt).toBeNull()
		expect(cache.get("a")?.consecutiveFailures).toBe(1)
	})

	test("a warn result resets the failure count", () => {
		const cache = new CacheStore({ path: cachePath })

		cache.put("a", badResult("error"), t0)
		cache.put("a", warnResult("stale"), t1)

		expect(cache.get("a")?.consecutiveFailures).toBe(0)
		expect(cache.get("a")?.lastSuccessAt).toEqual(t1)
	})

	test("ignores attempts older than the stored one", () => {
		const cache = new CacheStore({ path: cachePath })

		cache.put("a", okResult("new"), t2)
		const accepted = cache.put("a", okResult("old"), t1)

		expect(accepted).toBe(false)
		expect(cache.get("a")?.result?.value).toBe("new")
	})
})

describe("putPlaceholder", () => {
	test("moves the attempt time but keeps failure bookkeeping", () => {
		const cache = new CacheStore({ path: cachePath })

		cache.put("a", okResult("fine"), t0)
		cache.put("a", badResult("error"), t1)
		const accepted = cache.putPlaceholder("a", unknownResult("generating"), t2)

		expect(accepted).toBe(true)
		const entry = cache.get("a")
		expect(entry?.result?.value).toBe("generating")
		expect(entry?.lastAttemptAt).toEqual(t2)
		expect(entry?.lastSuccessAt).toEqual(t0)
		expect(entry?.consecutiveFailures).toBe(1)
	})

	test("a first placeholder has no success time", () => {
		const cache = new CacheStore({ path: cachePath })

		cache.putPlaceholder("a", unknownResult("generating"), t0)

		expect(cache.get("a")?.lastSuccessAt).toBeNull()
		expect(cache.get("a")?.consecutiveFailures).toBe(0)
	})

	test("ignores placeholders older than the stored attempt", () => {
		const cache = new CacheStore({ path: cachePath })

		cache.put("a", okResult("new"), t2)

		expect(cache.putPlaceholder("a", unknownResult("generating"), t1)).toBe(false)
		expect(cache.get("a")?.result?.value).toBe("new")
	})
})

// =============================================================================
// READS
// =============================================================================

describe("reads", () => {
	test("getAll returns a snapshot unaffected by later writes", () => {
		const cache = new CacheStore({ path: cachePath })
		cache.put("a", okResult("one"), t0)

		const snapshot = cache.getAll()
		cache.put("b", okResult("two"), t1)
		cache.put("a", okResult("three"), t1)

		expect([...snapshot.keys()]).toEqual(["a"])
		expect(snapshot.get("a")?.result?.value).toBe("one")
		expect(cache.getAll().size).toBe(2)
	})

	test("getMany omits ids without an entry", () => {
		const cache = new CacheStore({ path: cachePath })
		cache.put("a", okResult("one"), t0)
		cache.put("b", okResult("two"), t0)

		const subset = cache.getMany(["b", "missing"])

		expect([...subset.keys()]).toEqual(["b"])
	})

	test("retain drops unlisted entries", () => {
		const cache = new CacheStore({ path: cachePath })
		cache.put("a", okResult("one"), t0)
		cache.put("b", okResult("two"), t0)
		cache.put("c", okResult("three"), t0)

		expect(cache.retain(["a", "c"])).toBe(1)
		expect([...cache.getAll().keys()]).toEqual(["a", "c"])
		expect(cache.retain(["a", "c"])).toBe(0)
	})
})

// =============================================================================
// PERSISTENCE
// =============================================================================

describe("persistence", () => {
	test("flush then load restores entries", async () => {
		const writer = new CacheStore({ path: cachePath })
		writer.put("a", okResult("fine", { ts: t0, details: "all good", link: "https://example.test/a" }), t1)
		writer.put("b", badResult("error", { ts: t1 }), t2)
		await writer.flush()

		const reader = new CacheStore({ path: cachePath })
		const outcome = await reader.load()

		expect(outcome).toEqual({ status: LoadStatus.Loaded, entries: 2, skipped: 0 })
		expect(reader.get("a")).toEqual({
			signalId: "a",
			result: { status: "ok", value: "fine", ts: t0, details: "all good", link: "https://example.test/a" },
			lastAttemptAt: t1,
			lastSuccessAt: t1,
			consecutiveFailures: 0,
		})
		expect(reader.get("b")?.lastSuccessAt).toBeNull()
		expect(reader.get("b")?.consecutiveFailures).toBe(1)
	})

	test("writes versioned JSON with two-space indent", async () => {
		const cache = new CacheStore({ path: cachePath })
		cache.put("a", okResult("fine", { ts: t0 }), t0)
		await cache.flush()

		const raw = await readFile(cachePath, "utf8")
		const parsed: unknown = JSON.parse(raw)

		expect(raw.startsWith('{\n  "version": 1,')).toBe(true)
		expect(parsed).toMatchObject({
			version: 1,
			entries: {
				a: {
					result: { status: "ok", value: "fine", ts: "2026-03-01T08:00:00.000Z" },
					lastAttemptAt: "2026-03-01T08:00:00.000Z",
					lastSuccessAt: "2026-03-01T08:00:00.000Z",
					consecutiveFailures: 0,
				},
			},
		})
	})

	test("creates the parent directory", async () => {
		const nested = join(directory, "state", "nested", "cache.json")
		const cache = new CacheStore({ path: nested })
		cache.put("a", okResult("fine"), t0)

		await cache.flush()

		expect(JSON.parse(await readFile(nested, "utf8"))).toMatchObject({ version: 1 })
	})

	test("missing file loads as empty", async () => {
		const cache = new CacheStore({ path: cachePath })

		const outcome = await cache.load()

		expect(outcome).toEqual({ status: LoadStatus.Missing, entries: 0, skipped: 0 })
		expect(cache.getAll().size).toBe(0)
	})

	test("unparseable file loads as empty", async () => {
		await writeFile(cachePath, '{"version": 1, "entries": {"a": ')
		const cache = new CacheStore({ path: cachePath })

		const outcome = await cache.load()

		expect(outcome.status).toBe(LoadStatus.Corrupt)
		expect(outcome.entries).toBe(0)
		expect(cache.getAll().size).toBe(0)
		expect(console.warn).toHaveBeenCalled()
	})

	test("file with the wrong shape loads as empty", async () => {
		await writeFile(cachePath, JSON.stringify({ version: 7, entries: [] }))
		const cache = new CacheStore({ path: cachePath })

		const outcome = await cache.load()

		expect(outcome.status).toBe(LoadStatus.Corrupt)
		expect(cache.getAll().size).toBe(0)
	})

	test("invalid entries are skipped", async () => {
		await writeFile(
			cachePath,
			JSON.stringify({
				version: 1,
				entries: {
					good: {
						result: { status: "warn", value: "3d", ts: "2026-03-01T08:00:00.000Z" },
						lastAttemptAt: "2026-03-01T08:00:00.000Z",
						lastSuccessAt: "2026-03-01T08:00:00.000Z",
						consecutiveFailures: 0,
					},
					badStatus: {
						result: { status: "purple", value: "?", ts: "2026-03-01T08:00:00.000Z" },
						lastAttemptAt: "2026-03-01T08:00:00.000Z",
						lastSuccessAt: null,
						consecutiveFailures: 0,
					},
					noAttempt: { result: null, lastSuccessAt: null, consecutiveFailures: 0 },
				},
			}),
		)
		const cache = new CacheStore({ path: cachePath })

		const outcome = await cache.load()

		expect(outcome).toEqual({ status: LoadStatus.Loaded, entries: 1, skipped: 2 })
		expect(cache.get("good")?.result?.value).toBe("3d")
	})

	test("load replaces in-memory state", async () => {
		const cache = new CacheStore({ path: cachePath })
		cache.put("stale", okResult("old"), t0)

		await cache.load()

		expect(cache.get("stale")).toBeUndefined()
	})

	test("failed flush throws PersistenceError and keeps memory", async () => {
		// A directory where the file should be makes the rename fail.
		await mkdir(cachePath)
		const cache = new CacheStore({ path: cachePath })
		cache.put("a", okResult("fine"), t0)

		await expect(cache.flush()).rejects.toBeInstanceOf(PersistenceError)

		expect(cache.get("a")?.result?.value).toBe("fine")
		expect((await readdir(directory)).filter((name) => name.endsWith(".tmp"))).toEqual([])
	})

	test("a failed flush does not block later flushes", async () => {
		await mkdir(cachePath)
		const cache = new CacheStore({ path: cachePath })
		cache.put("a", okResult("fine"), t0)
		await expect(cache.flush()).rejects.toBeInstanceOf(PersistenceError)

		await rm(cachePath, { recursive: true })
		await cache.flush()

		expect(JSON.parse(await readFile(cachePath, "utf8"))).toMatchObject({ entries: { a: { consecutiveFailures: 0 } } })
	})

	test("readers never observe a partial file during concurrent flushes", async () => {
		const cache = new CacheStore({ path: cachePath })
		for (let i = 0; i < 200; i++) {
			cache.put(`signal-${i}`, okResult("x".repeat(200), { details: "y".repeat(200) }), t0)
		}
		await cache.flush()

		let reading = true
		let reads = 0
		const reader = (async () => {
			while (reading) {
				const raw = await readFile(cachePath, "utf8")
				const parsed: unknown = JSON.parse(raw)
				expect(parsed).toMatchObject({ version: 1 })
				reads++
			}
		})()

		const flushes: Promise<void>[] = []
		for (let round = 0; round < 20; round++) {
			cache.put(`signal-${round}`, okResult(`round ${round}`), new Date(t0.getTime() + round + 1))
			flushes.push(cache.flush())
		}
		await Promise.all(flushes)
		reading = false
		await reader

		expect(reads).toBeGreaterThan(0)
		expect((await readdir(directory)).filter((name) => name.endsWith(".tmp"))).toEqual([])

		const final = new CacheStore({ path: cachePath })
		await final.load()
		expect(final.get("signal-19")?.result?.value).toBe("round 19")
	})
})

import { HttpStatusError, InvalidPayloadError, NetworkError } from "@signalboard/core"
import { afterEach, describe, expect, test, vi } from "vitest"

import type { DogWalk, IDogWalkApi } from "./dog-walk-api.ts"

import { DogWalkApi } from "./dog-walk-api.ts"
import { DogWalkSignal, parseWalkTime } from "./dog-walk-signal.ts"

const NOW = new Date("2026-01-25T18:00:00.000Z")
const WALK_URL = "http://dogwalk.test/api/latest"

function walk(overrides: Partial<DogWalk> = {}): DogWalk {
	return { date: "2026-01-25", start: "10:40", end: "10:55", duration: 15, notes: null, ...overrides }
}

function createSignal(answer: () => Promise<DogWalk>) {
	const client: IDogWalkApi = { url: WALK_URL, fetchLatestWalk: answer }
	return new DogWalkSignal({ client, now: () => NOW })
}

afterEach(() => {
	vi.restoreAllMocks()
})

describe("DogWalkSignal", () => {
	test("walk today is ok", async () => {
		const signal = createSignal(async () => walk({ notes: "Snowstorm" }))

		const result = await signal.fetch()

		expect(result).toEqual({
			status: "ok",
			value: "walked today",
			ts: new Date("2026-01-25T10:55:00.000Z"),
			details: "15m (10:40–10:55) · Snowstorm",
			link: WALK_URL,
		})
	})

	test("walk yesterday is a warning", async () => {
		const signal = createSignal(async () => walk({ date: "2026-01-24", end: "09:00" }))

		const result = await signal.fetch()

		expect(result.status).toBe("warn")
		expect(result.value).toBe("1d since last walk")
		expect(result.details).toBe("15m (10:40–09:00)")
	})

	test("two days or more is bad", async () => {
		const signal = createSignal(async () => walk({ date: "2026-01-23", end: "17:00" }))

		const result = await signal.fetch()

		expect(result.status).toBe("bad")
		expect(result.value).toBe("2d since last walk")
	})

	test("malformed timestamp is bad", async () => {
		const signal = createSignal(async () => walk({ end: "25:99" }))

		const result = await signal.fetch()

		expect(result).toMatchObject({
			status: "bad",
			value: "bad walk timestamp",
			details: 'date="2026-01-25" end="25:99"',
			ts: NOW,
		})
	})

	test.each([
		[new HttpStatusError(WALK_URL, 500, "Internal Server Error"), "dogwalk HTTP 500", "Internal Server Error"],
		[new NetworkError(WALK_URL, { cause: new Error("ECONNREFUSED") }), "dogwalk unreachable", "ECONNREFUSED"],
		[new InvalidPayloadError("date must be a string"), "dogwalk payload invalid", "date must be a string"],
		[new Error("boom"), "dogwalk fetch failed", "Error: boom"],
	])("client failure %#", async (error, value, details) => {
		const signal = createSignal(async () => {
			throw error
		})

		const result = await signal.fetch()

		expect(result).toMatchObject({ status: "bad", value, details, link: WALK_URL })
	})
})

describe("parseWalkTime", () => {
	test("reads date and time as UTC", () => {
		expect(parseWalkTime("2026-01-25", "9:05")).toEqual(new Date("2026-01-25T09:05:00.000Z"))
	})

	test("rejects impossible dates", () => {
		expect(parseWalkTime("2026-02-30", "10:00")).toBeNull()
		expect(parseWalkTime("25/01/2026", "10:00")).toBeNull()
		expect(parseWalkTime("2026-01-25", "10:60")).toBeNull()
	})
})

describe("DogWalkApi", () => {
	test("parses the latest walk", async () => {
		const fetchSpy = vi.spyOn(globalThis, "fetch").mockResolvedValue(
			Response.json({ date: "2026-01-25", duration: 15, end: "10:55", notes: "  ", start: "10:40" }),
		)

		const api = new DogWalkApi("http://dogwalk.test/")
		const latest = await api.fetchLatestWalk()

		expect(fetchSpy.mock.calls[0]?.[0]).toBe("http://dogwalk.test/api/latest")
		expect(latest).toEqual({ date: "2026-01-25", start: "10:40", end: "10:55", duration: 15, notes: null })
	})

	test("rejects a payload missing fields", async () => {
		vi.spyOn(globalThis, "fetch").mockResolvedValue(Response.json({ date: "2026-01-25" }))

		await expect(new DogWalkApi("http://dogwalk.test").fetchLatestWalk()).rejects.toBeInstanceOf(InvalidPayloadError)
	})
})

import type { EngineStatus, RefreshSummary } from "@signalboard/core"

import { afterEach, beforeEach, describe, expect, test, vi } from "vitest"

import type { TestApp } from "../lib/test-app.ts"

import { createTestApp, stubSignal } from "../lib/test-app.ts"

const NOW = new Date("2026-03-01T12:00:00.000Z")

const SIGNALS = [
	stubSignal({ id: "board-health", title: "Board Health" }, { status: "ok", value: "board alive", ts: NOW }),
	stubSignal({ id: "med-check", title: "MedCheck" }, { status: "bad", value: "not taken ⚠️", ts: NOW }),
]

let ctx: TestApp

beforeEach(async () => {
	vi.spyOn(console, "warn").mockImplementation(() => {})
	ctx = await createTestApp(SIGNALS, () => NOW)
})

afterEach(async () => {
	await ctx.cleanup()
	vi.restoreAllMocks()
})

describe("GET /api/registry", () => {
	test("lists signal metadata ordered by id", async () => {
		const res = await ctx.app.request("/api/registry")

		expect(res.status).toBe(200)
		expect(await res.json()).toEqual({
			location: "static",
			count: 2,
			signals: [
				{ id: "board-health", title: "Board Health", pollIntervalSeconds: 60, timeoutSeconds: 1 },
				{ id: "med-check", title: "MedCheck", pollIntervalSeconds: 60, timeoutSeconds: 1 },
			],
		})
	})
})

describe("POST /api/refresh", () => {
	test("fetches due signals and reports counts", async () => {
		const res = await ctx.app.request("/api/refresh", { method: "POST" })

		expect(res.status).toBe(200)
		const summary = (await res.json()) as RefreshSummary
		expect(summary.counts).toEqual({ ok: 1, warn: 0, bad: 1, unknown: 0, skipped: 0 })
		expect(summary.outcomes.map((o) => [o.signalId, o.outcome])).toEqual([
			["board-health", "succeeded"],
			["med-check", "succeeded"],
		])
		expect(ctx.board.getAllCached().get("med-check")?.consecutiveFailures).toBe(1)
	})

	test("respects poll intervals unless forced", async () => {
		await ctx.app.request("/api/refresh", { method: "POST" })

		const skipped = (await (await ctx.app.request("/api/refresh", { method: "POST" })).json()) as RefreshSummary
		const forced = (await (await ctx.app.request("/api/refresh?force=1", { method: "POST" })).json()) as RefreshSummary

		expect(skipped.counts.skipped).toBe(2)
		expect(forced.counts.skipped).toBe(0)
	})

	test("rejects an invalid force flag", async () => {
		const res = await ctx.app.request("/api/refresh?force=2", { method: "POST" })

		expect(res.status).toBe(400)
	})
})

describe("POST /api/reload", () => {
	test("reports the reloaded signals", async () => {
		const res = await ctx.app.request("/api/reload", { method: "POST" })

		expect(await res.json()).toEqual({
			ok: true,
			count: 2,
			signals: ["board-health", "med-check"],
			errors: [],
		})
	})
})

describe("GET /api/status", () => {
	test("reflects the last batch", async () => {
		const before = (await (await ctx.app.request("/api/status")).json()) as EngineStatus
		await ctx.board.refreshAll(true)
		const after = (await (await ctx.app.request("/api/status")).json()) as EngineStatus

		expect(before.lastSummary).toBeNull()
		expect(before.scheduler).toEqual({ running: false, tickSeconds: null })
		expect(after.refreshing).toBe(false)
		expect(after.lastFinishedAt).toBe("2026-03-01T12:00:00.000Z")
		expect(after.background).toEqual({ running: [], done: [] })
	})
})

describe("GET /health", () => {
	test("is ok", async () => {
		const res = await ctx.app.request("/health")

		expect(await res.json()).toEqual({ status: "ok" })
	})
})

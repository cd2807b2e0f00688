import type { Signal, SignalMeta, SignalResult } from "@signalboard/core"

import { SignalBoard, staticLoader } from "@signalboard/core"
import { mkdtemp, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"

import { createApp } from "../app.ts"
import { DashboardService } from "../dashboard/service.ts"
import { IN_MEMORY, openDatabase } from "../db.ts"
import { SubscriptionService } from "../subscriptions/service.ts"
import { SubscriptionStore } from "../subscriptions/store.ts"

/**
 * A signal that always returns `result`.
 */
export function stubSignal(meta: Pick<SignalMeta, "id" | "title"> & Partial<SignalMeta>, result: SignalResult): Signal {
	return {
		meta: { pollIntervalSeconds: 60, timeoutSeconds: 1, ...meta },
		async fetch() {
			return result
		},
	}
}

/**
 * Wires the whole backend around `signals`, with the cache in a temporary
 * directory and subscriptions in an in-memory database.
 */
export async function createTestApp(signals: Signal[], now: () => Date) {
	const dir = await mkdtemp(join(tmpdir(), "signalboard-backend-"))
	const board = new SignalBoard({
		loader: staticLoader(Object.fromEntries(signals.map((signal) => [signal.meta.id, { default: signal }]))),
		cachePath: join(dir, "cache.json"),
		now,
	})
	await board.init()

	const db = await openDatabase(IN_MEMORY)
	const store = new SubscriptionStore(db, now)
	store.initSchema()

	const subscriptions = new SubscriptionService(store, board.registry)
	const dashboard = new DashboardService({ board, subscriptions, now })
	const app = createApp({ board, dashboard, subscriptions })

	return {
		app,
		board,
		subscriptions,
		dashboard,
		async cleanup() {
			await board.shutdown()
			db.close()
			await rm(dir, { recursive: true, force: true })
		},
	}
}

export type TestApp = Awaited<ReturnType<typeof createTestApp>>

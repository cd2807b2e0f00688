import { serve } from "@hono/node-server"
import { SignalBoard, describeError, directoryLoader } from "@signalboard/core"

import { createApp } from "./app.ts"
import { loadServerConfig } from "./config.ts"
import { DashboardService } from "./dashboard/service.ts"
import { openDatabase } from "./db.ts"
import { SubscriptionService } from "./subscriptions/service.ts"
import { SubscriptionStore } from "./subscriptions/store.ts"

async function main() {
	const config = loadServerConfig()

	const board = new SignalBoard({
		loader: directoryLoader({ directory: config.signalsDir }),
		cachePath: config.cachePath,
		pruneOrphans: config.pruneOrphans,
	})
	const { cache, registry } = await board.init()
	console.log(
		`[signalboard] Cache ${cache.status} (${cache.entries} entries), ${registry.discovered} signals registered, ${registry.failed} failed`,
	)

	const db = await openDatabase(config.databasePath)
	const store = new SubscriptionStore(db)
	store.initSchema()

	const subscriptions = new SubscriptionService(store, board.registry)
	const dashboard = new DashboardService({ board, subscriptions })
	const app = createApp({ board, dashboard, subscriptions })

	if (config.refreshTickSeconds > 0) {
		board.start(config.refreshTickSeconds)
	}

	const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
		console.log(`[signalboard] Listening on http://${info.address}:${info.port}`)
	})

	let shuttingDown = false
	const shutdown = async (signal: string) => {
		if (shuttingDown) return
		shuttingDown = true
		console.log(`[signalboard] ${signal} received, shutting down`)

		server.close()
		await board.shutdown()
		db.close()
	}

	for (const signal of ["SIGINT", "SIGTERM"] as const) {
		process.once(signal, () => {
			shutdown(signal).catch((err: unknown) => {
				console.error("[signalboard] Shutdown failed:", describeError(err))
				process.exitCode = 1
			})
		})
	}
}

main().catch((err: unknown) => {
	console.error("[signalboard] Failed to start:", describeError(err))
	process.exitCode = 1
})

import type { SignalBoard } from "@signalboard/core"

import { trpcServer } from "@hono/trpc-server"
import { Hono } from "hono"

import type { DashboardService } from "./dashboard/service.ts"
import type { SubscriptionService } from "./subscriptions/service.ts"

import { registerAdminHttpHandlers } from "./admin/http.ts"
import { registerDashboardHttpHandlers } from "./dashboard/http.ts"
import { registerSubscriptionHttpHandlers } from "./subscriptions/http.ts"
import { createTRPCRouter } from "./trpc/router.ts"

export interface AppDeps {
	board: SignalBoard
	dashboard: DashboardService
	subscriptions: SubscriptionService
}

export function createApp({ board, dashboard, subscriptions }: AppDeps) {
	const app = new Hono()

	app.get("/health", (c) => c.json({ status: "ok" }))

	registerDashboardHttpHandlers(app, { dashboard })
	registerAdminHttpHandlers(app, { board })
	registerSubscriptionHttpHandlers(app, { subscriptions })

	app.use(
		"/trpc/*",
		trpcServer({
			router: createTRPCRouter({ board, dashboard, subscriptions }),
		}),
	)

	app.onError((err, c) => {
		console.error(`[signalboard] ${c.req.method} ${c.req.path} failed:`, err)
		return c.json({ error: "Internal Server Error" }, 500)
	})

	return app
}

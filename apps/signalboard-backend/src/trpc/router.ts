import type { SignalBoard } from "@signalboard/core"

import { initTRPC } from "@trpc/server"

import type { DashboardService } from "../dashboard/service.ts"
import type { SubscriptionService } from "../subscriptions/service.ts"

import { createSignalsRouter } from "../admin/router.ts"
import { createDashboardRouter } from "../dashboard/router.ts"
import { createSubscriptionsRouter, createUsersRouter } from "../subscriptions/router.ts"

function createTRPC() {
	const t = initTRPC.create()

	return {
		router: t.router,
		procedure: t.procedure,
	}
}

export type TRPC = ReturnType<typeof createTRPC>

export interface TRPCRouterDeps {
	board: SignalBoard
	dashboard: DashboardService
	subscriptions: SubscriptionService
}

export function createTRPCRouter({ board, dashboard, subscriptions }: TRPCRouterDeps) {
	const t = createTRPC()

	return t.router({
		signals: createSignalsRouter(t, { board, dashboard }),
		users: createUsersRouter(t, { subscriptions }),
		subscriptions: createSubscriptionsRouter(t, { subscriptions }),
		dashboard: createDashboardRouter(t, { dashboard }),
	})
}

export type TRPCRouter = ReturnType<typeof createTRPCRouter>

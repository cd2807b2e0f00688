import type { SignalBoard } from "@signalboard/core"

import type { DashboardService } from "../dashboard/service.ts"
import type { TRPC } from "../trpc/router.ts"

import { renderJson } from "../views/render.ts"

export function createSignalsRouter(
	t: TRPC,
	{ board, dashboard }: { board: SignalBoard; dashboard: DashboardService },
) {
	return t.router({
		list: t.procedure.query(() => renderJson(dashboard.allSignals())),
		registry: t.procedure.query(() => {
			const metas = board.listSignalMetadata()
			return { location: board.registry.location, count: metas.length, signals: metas }
		}),
		status: t.procedure.query(() => board.engineStatus()),
	})
}

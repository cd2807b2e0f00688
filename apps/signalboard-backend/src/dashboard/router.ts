import { type } from "arktype"

import type { TRPC } from "../trpc/router.ts"
import type { DashboardService } from "./service.ts"

import { rethrowAsTRPCError } from "../lib/trpc-error.ts"
import { renderJson } from "../views/render.ts"

const forUserInput = type({
	username: "string",
})

export function createDashboardRouter(t: TRPC, { dashboard }: { dashboard: DashboardService }) {
	return t.router({
		forUser: t.procedure.input(forUserInput).query(({ input }) => {
			try {
				return { username: input.username, ...renderJson(dashboard.forUser(input.username)) }
			} catch (error) {
				rethrowAsTRPCError(error)
			}
		}),
	})
}

import { type } from "arktype"

import type { TRPC } from "../trpc/router.ts"
import type { SubscriptionService } from "./service.ts"

import { rethrowAsTRPCError } from "../lib/trpc-error.ts"

const usernameInput = type({
	username: "string",
})

const subscriptionInput = type({
	username: "string",
	signalId: "string",
})

export function createUsersRouter(t: TRPC, { subscriptions }: { subscriptions: SubscriptionService }) {
	return t.router({
		list: t.procedure.query(() => subscriptions.listUsers()),
		create: t.procedure.input(usernameInput).mutation(({ input }) => {
			try {
				return subscriptions.createUser(input.username)
			} catch (error) {
				rethrowAsTRPCError(error)
			}
		}),
		remove: t.procedure.input(usernameInput).mutation(({ input }) => {
			try {
				subscriptions.deleteUser(input.username)
			} catch (error) {
				rethrowAsTRPCError(error)
			}
		}),
	})
}

export function createSubscriptionsRouter(t: TRPC, { subscriptions }: { subscriptions: SubscriptionService }) {
	return t.router({
		list: t.procedure.input(usernameInput).query(({ input }) => {
			try {
				return subscriptions.listSubscriptions(input.username)
			} catch (error) {
				rethrowAsTRPCError(error)
			}
		}),
		add: t.procedure.input(subscriptionInput).mutation(({ input }) => {
			try {
				return subscriptions.subscribe(input.username, input.signalId)
			} catch (error) {
				rethrowAsTRPCError(error)
			}
		}),
		remove: t.procedure.input(subscriptionInput).mutation(({ input }) => {
			try {
				return subscriptions.unsubscribe(input.username, input.signalId)
			} catch (error) {
				rethrowAsTRPCError(error)
			}
		}),
	})
}

import type { Context, Hono } from "hono"

import { type } from "arktype"
import { createMiddleware } from "hono/factory"

import type { SubscriptionService } from "./service.ts"

import { serviceErrorResponse } from "../lib/http.ts"

type Env = { Variables: { subscriptions: SubscriptionService } }

const createUserInput = type({
	username: "string",
})

const subscribeInput = type({
	signalId: "string",
})

export function registerSubscriptionHttpHandlers(
	app: Hono,
	{ subscriptions }: { subscriptions: SubscriptionService },
) {
	const inject = createMiddleware<Env>(async (c, next) => {
		c.set("subscriptions", subscriptions)
		await next()
	})

	app.get("/api/users", inject, handleListUsers)
	app.post("/api/users", inject, handleCreateUser)
	app.delete("/api/users/:username", inject, handleDeleteUser)
	app.get("/api/users/:username/subscriptions", inject, handleListSubscriptions)
	app.post("/api/users/:username/subscriptions", inject, handleSubscribe)
	app.delete("/api/users/:username/subscriptions/:signalId", inject, handleUnsubscribe)
}

function handleListUsers(c: Context<Env>) {
	const users = c.get("subscriptions").listUsers()
	return c.json({ count: users.length, users })
}

async function handleCreateUser(c: Context<Env>) {
	let body: unknown
	try {
		body = await c.req.json()
	} catch {
		return c.json({ error: "Invalid JSON" }, 400)
	}

	const input = createUserInput(body)
	if (input instanceof type.errors) {
		return c.json({ error: input.summary }, 400)
	}

	try {
		const { username, created } = c.get("subscriptions").createUser(input.username)
		return c.json({ username, created }, created ? 201 : 200)
	} catch (error) {
		return serviceErrorResponse(c, error)
	}
}

function handleDeleteUser(c: Context<Env, "/api/users/:username">) {
	try {
		c.get("subscriptions").deleteUser(c.req.param("username"))
		return c.body(null, 204)
	} catch (error) {
		return serviceErrorResponse(c, error)
	}
}

function handleListSubscriptions(c: Context<Env, "/api/users/:username/subscriptions">) {
	const username = c.req.param("username")
	try {
		const signals = c.get("subscriptions").listSubscriptions(username)
		return c.json({ username, count: signals.length, signals })
	} catch (error) {
		return serviceErrorResponse(c, error)
	}
}

async function handleSubscribe(c: Context<Env, "/api/users/:username/subscriptions">) {
	let body: unknown
	try {
		body = await c.req.json()
	} catch {
		return c.json({ error: "Invalid JSON" }, 400)
	}

	const input = subscribeInput(body)
	if (input instanceof type.errors) {
		return c.json({ error: input.summary }, 400)
	}

	try {
		const change = c.get("subscriptions").subscribe(c.req.param("username"), input.signalId)
		return c.json({
			username: change.username,
			signalId: change.signalId,
			subscribed: change.changed,
			signals: change.signals,
		})
	} catch (error) {
		return serviceErrorResponse(c, error)
	}
}

function handleUnsubscribe(c: Context<Env, "/api/users/:username/subscriptions/:signalId">) {
	try {
		const change = c.get("subscriptions").unsubscribe(c.req.param("username"), c.req.param("signalId"))
		return c.json({
			username: change.username,
			signalId: change.signalId,
			removed: change.changed,
			signals: change.signals,
		})
	} catch (error) {
		return serviceErrorResponse(c, error)
	}
}

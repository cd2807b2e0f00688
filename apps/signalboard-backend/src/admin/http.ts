import type { DiscoveryError, SignalBoard } from "@signalboard/core"
import type { Context, Hono } from "hono"

import { type } from "arktype"
import { createMiddleware } from "hono/factory"

type Env = { Variables: { board: SignalBoard } }

const forceParam = type("'0' | '1'")

export function registerAdminHttpHandlers(app: Hono, { board }: { board: SignalBoard }) {
	const inject = createMiddleware<Env>(async (c, next) => {
		c.set("board", board)
		await next()
	})

	app.get("/api/registry", inject, handleGetRegistry)
	app.get("/api/status", inject, handleGetStatus)
	app.post("/api/refresh", inject, handleRefresh)
	app.post("/api/reload", inject, handleReload)
}

function handleGetRegistry(c: Context<Env>) {
	const board = c.get("board")
	const metas = board.listSignalMetadata()
	return c.json({ location: board.registry.location, count: metas.length, signals: metas })
}

function handleGetStatus(c: Context<Env>) {
	return c.json(c.get("board").engineStatus())
}

async function handleRefresh(c: Context<Env>) {
	const force = forceParam(c.req.query("force") ?? "0")
	if (force instanceof type.errors) {
		return c.json({ error: `force ${force.summary}` }, 400)
	}

	const summary = await c.get("board").refreshAll(force === "1")
	return c.json(summary)
}

async function handleReload(c: Context<Env>) {
	const summary = await c.get("board").reloadRegistry()
	return c.json({
		ok: summary.errors.length === 0,
		count: summary.discovered,
		signals: summary.signalIds,
		errors: summary.errors.map(serializeDiscoveryError),
	})
}

export function serializeDiscoveryError(error: DiscoveryError) {
	return {
		module: error.moduleName,
		reason: error.reason,
		signalId: error.signalId,
		message: error.message,
	}
}

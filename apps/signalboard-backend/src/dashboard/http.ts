import type { Context, Hono } from "hono"

import { createMiddleware } from "hono/factory"

import type { DashboardService } from "./service.ts"

import { serviceErrorResponse } from "../lib/http.ts"
import { renderHtml, renderJson, renderText } from "../views/render.ts"

type Env = { Variables: { dashboard: DashboardService } }

const TITLE = "SignalBoard"

export function registerDashboardHttpHandlers(app: Hono, { dashboard }: { dashboard: DashboardService }) {
	const inject = createMiddleware<Env>(async (c, next) => {
		c.set("dashboard", dashboard)
		await next()
	})

	app.get("/", inject, handleHome)
	app.get("/txt", inject, handleText)
	app.get("/api/signals", inject, handleSignals)
	app.get("/api/users/:username/dashboard", inject, handleUserDashboard)
	app.get("/users/:username", inject, handleUserPage)
	app.get("/users/:username/txt", inject, handleUserText)
}

function handleHome(c: Context<Env>) {
	return c.html(renderHtml({ heading: TITLE, views: c.get("dashboard").allSignals() }))
}

function handleText(c: Context<Env>) {
	return c.text(renderText(c.get("dashboard").allSignals()))
}

function handleSignals(c: Context<Env>) {
	return c.json(renderJson(c.get("dashboard").allSignals()))
}

function handleUserDashboard(c: Context<Env, "/api/users/:username/dashboard">) {
	const username = c.req.param("username")
	try {
		const views = c.get("dashboard").forUser(username)
		return c.json({ username, ...renderJson(views) })
	} catch (error) {
		return serviceErrorResponse(c, error)
	}
}

function handleUserPage(c: Context<Env, "/users/:username">) {
	const username = c.req.param("username")
	try {
		const views = c.get("dashboard").forUser(username)
		return c.html(renderHtml({ heading: `${TITLE}: ${username}`, views }))
	} catch (error) {
		return serviceErrorResponse(c, error)
	}
}

function handleUserText(c: Context<Env, "/users/:username/txt">) {
	const username = c.req.param("username")
	try {
		return c.text(renderText(c.get("dashboard").forUser(username)))
	} catch (error) {
		return serviceErrorResponse(c, error)
	}
}

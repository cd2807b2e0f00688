import type { Context } from "hono"

import { SignalNotFoundError } from "@signalboard/core"

import { InvalidInputError, UserNotFoundError } from "./error.ts"

/**
 * Maps a service error to a JSON error response. Anything unexpected is rethrown.
 */
export function serviceErrorResponse(c: Context, error: unknown): Response {
	if (error instanceof UserNotFoundError || error instanceof SignalNotFoundError) {
		return c.json({ error: error.message }, 404)
	}
	if (error instanceof InvalidInputError) {
		return c.json({ error: error.message }, 400)
	}
	throw error
}

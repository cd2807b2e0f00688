import { SignalNotFoundError } from "@signalboard/core"
import { TRPCError } from "@trpc/server"

import { InvalidInputError, UserNotFoundError } from "./error.ts"

/**
 * Rethrows a service error as the matching TRPCError. Anything unexpected is
 * rethrown unchanged.
 */
export function rethrowAsTRPCError(error: unknown): never {
	if (error instanceof UserNotFoundError || error instanceof SignalNotFoundError) {
		throw new TRPCError({ code: "NOT_FOUND", message: error.message, cause: error })
	}
	if (error instanceof InvalidInputError) {
		throw new TRPCError({ code: "BAD_REQUEST", message: error.message, cause: error })
	}
	throw error
}

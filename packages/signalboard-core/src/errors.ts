export const DiscoveryFailure = {
	LoadFailed: "load-failed",
	InvalidMeta: "invalid-meta",
	MissingFetch: "missing-fetch",
	DuplicateId: "duplicate-id",
} as const

export type DiscoveryFailure = (typeof DiscoveryFailure)[keyof typeof DiscoveryFailure]

/**
 * A candidate signal module failed to load or does not satisfy the signal contract.
 * Recorded per module; never aborts the discovery pass.
 */
export class DiscoveryError extends Error {
	readonly moduleName: string
	readonly reason: DiscoveryFailure
	readonly signalId: string | null

	constructor(moduleName: string, reason: DiscoveryFailure, message: string, signalId: string | null = null) {
		super(`Signal module "${moduleName}": ${message}`)
		this.name = "DiscoveryError"
		this.moduleName = moduleName
		this.reason = reason
		this.signalId = signalId
	}
}

/**
 * The cache could not be read from or written to disk.
 */
export class PersistenceError extends Error {
	readonly path: string

	constructor(path: string, message: string, options?: { cause?: unknown }) {
		super(`${message}: ${path}`, options)
		this.name = "PersistenceError"
		this.path = path
	}
}

export class SignalNotFoundError extends Error {
	readonly signalId: string

	constructor(signalId: string) {
		super(`Signal not found: ${signalId}`)
		this.name = "SignalNotFoundError"
		this.signalId = signalId
	}
}

export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value))
}

/**
 * `<Name>: <message>` summary used in result details and logs.
 */
export function describeError(value: unknown): string {
	const error = toError(value)
	return `${error.name}: ${error.message}`
}

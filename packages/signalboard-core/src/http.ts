const USER_AGENT = "signalboard/0.1"

/**
 * The server answered with a non-2xx status.
 */
export class HttpStatusError extends Error {
	readonly status: number
	readonly statusText: string
	readonly url: string

	constructor(url: string, status: number, statusText: string) {
		super(`HTTP ${status} ${statusText}`.trimEnd())
		this.name = "HttpStatusError"
		this.url = url
		this.status = status
		this.statusText = statusText
	}
}

/**
 * The request never produced a response (DNS, refused connection, reset).
 */
export class NetworkError extends Error {
	readonly url: string

	constructor(url: string, options?: { cause?: unknown }) {
		super(networkReason(options?.cause), options)
		this.name = "NetworkError"
		this.url = url
	}
}

/**
 * The response body is not the JSON shape the client expects.
 */
export class InvalidPayloadError extends Error {
	constructor(message: string) {
		super(message)
		this.name = "InvalidPayloadError"
	}
}

export interface RequestJsonOptions {
	method?: "GET" | "POST"
	headers?: Record<string, string>
	/** Serialized as JSON */
	body?: unknown
	abortSignal?: AbortSignal
}

/**
 * Performs a request and parses the JSON body.
 *
 * @throws {HttpStatusError} On a non-2xx response
 * @throws {NetworkError} If no response was received
 * @throws {InvalidPayloadError} If the body is not JSON
 */
export async function requestJson(url: string, options: RequestJsonOptions = {}): Promise<unknown> {
	const headers: Record<string, string> = {
		Accept: "application/json",
		"User-Agent": USER_AGENT,
		...options.headers,
	}
	if (options.body !== undefined) {
		headers["Content-Type"] = "application/json"
	}

	let response: Response
	try {
		response = await fetch(url, {
			method: options.method ?? "GET",
			headers,
			...(options.body !== undefined ? { body: JSON.stringify(options.body) } : {}),
			...(options.abortSignal ? { signal: options.abortSignal } : {}),
		})
	} catch (err) {
		if (options.abortSignal?.aborted) {
			throw err
		}
		throw new NetworkError(url, { cause: err })
	}

	if (!response.ok) {
		throw new HttpStatusError(url, response.status, response.statusText)
	}

	const text = await response.text()
	try {
		return JSON.parse(text)
	} catch {
		throw new InvalidPayloadError(`Response from ${url} is not JSON`)
	}
}

/**
 * Undici reports network failures as `TypeError("fetch failed")` with the
 * underlying socket error as `cause`.
 */
function networkReason(cause: unknown): string {
	if (cause instanceof Error) {
		if (cause.cause instanceof Error && cause.cause.message) {
			return cause.cause.message
		}
		return cause.message
	}
	return String(cause)
}

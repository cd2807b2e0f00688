import type { Signal, SignalFetchOptions, SignalMeta, SignalResult } from "@signalboard/core"

import { NetworkError, badResult, describeError, okResult, warnResult } from "@signalboard/core"

import type { HealthResponse, IHealthProbe } from "./health-probe.ts"

import { HttpHealthProbe } from "./health-probe.ts"

export interface HttpHealthSignalOptions {
	id: string
	title: string
	/** Service root, e.g. `http://localhost:8080`. Trailing slashes are ignored. */
	baseUrl: string
	/** Default: `/health` */
	path?: string
	/** Default: 60 */
	pollIntervalSeconds?: number
	/** Default: 1.5 */
	timeoutSeconds?: number
	probe?: IHealthProbe
}

/**
 * Reports whether a service's health endpoint answers with a 2xx.
 *
 * Server errors (5xx) and unreachable services are `bad`; any other non-2xx
 * status is `warn`.
 *
 * @example
 * ```ts
 * export default new HttpHealthSignal({
 *   id: "webhook-router",
 *   title: "Webhook Router",
 *   baseUrl: "http://localhost:8080",
 * })
 * ```
 */
export class HttpHealthSignal implements Signal {
	readonly meta: SignalMeta
	readonly url: string

	private readonly probe: IHealthProbe

	constructor(options: HttpHealthSignalOptions) {
		this.meta = {
			id: options.id,
			title: options.title,
			pollIntervalSeconds: options.pollIntervalSeconds ?? 60,
			timeoutSeconds: options.timeoutSeconds ?? 1.5,
		}
		this.url = `${options.baseUrl.replace(/\/+$/, "")}${options.path ?? "/health"}`
		this.probe = options.probe ?? new HttpHealthProbe()
	}

	async fetch(options?: SignalFetchOptions): Promise<SignalResult> {
		const link = this.url

		let response: HealthResponse
		try {
			response = await this.probe.check(this.url, options)
		} catch (err) {
			if (err instanceof NetworkError) {
				return badResult("service unreachable", { details: err.message, link })
			}
			return badResult("health check failed", { details: describeError(err), link })
		}

		const { status, statusText } = response
		if (status >= 200 && status < 300) {
			return okResult("healthy", { details: `GET ${this.url} -> ${status}`, link })
		}
		if (status >= 500) {
			return badResult(`health HTTP ${status}`, { details: statusText || "Server error", link })
		}
		if (status >= 400) {
			return warnResult(`health HTTP ${status}`, { details: statusText || "Client error", link })
		}
		return warnResult(`health HTTP ${status}`, { details: "Non-2xx health response", link })
	}
}

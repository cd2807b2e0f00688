import { NetworkError } from "@signalboard/core"

export interface HealthResponse {
	status: number
	statusText: string
}

export interface IHealthProbe {
	/**
	 * Issues a GET to `url`. Resolves with whatever status the server answered;
	 * rejects with a NetworkError if it did not answer.
	 */
	check(url: string, options?: { abortSignal?: AbortSignal }): Promise<HealthResponse>
}

export class HttpHealthProbe implements IHealthProbe {
	async check(url: string, options: { abortSignal?: AbortSignal } = {}): Promise<HealthResponse> {
		let response: Response
		try {
			response = await fetch(url, {
				headers: { "User-Agent": "signalboard/0.1" },
				...(options.abortSignal ? { signal: options.abortSignal } : {}),
			})
		} catch (err) {
			throw new NetworkError(url, { cause: err })
		}

		// Body is irrelevant; release the connection.
		await response.body?.cancel()
		return { status: response.status, statusText: response.statusText }
	}
}

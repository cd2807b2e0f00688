import { InvalidPayloadError, requestJson } from "@signalboard/core"
import { type } from "arktype"

export interface MedCheckStatus {
	taken: boolean
	resetsAt: Date
	takenAt: Date | null
	/** IANA zone the tracker runs in. Default: `UTC` */
	timeZone: string
}

export interface IMedCheckApi {
	readonly url: string
	fetchStatus(options?: { abortSignal?: AbortSignal }): Promise<MedCheckStatus>
}

/**
 * Client for the medication tracker's `GET /api/status` endpoint.
 */
export class MedCheckApi implements IMedCheckApi {
	readonly url: string

	constructor(baseUrl: string) {
		this.url = `${baseUrl.replace(/\/+$/, "")}/api/status`
	}

	async fetchStatus(options: { abortSignal?: AbortSignal } = {}): Promise<MedCheckStatus> {
		const data = await requestJson(this.url, options)

		const parsed = statusResponse(data)
		if (parsed instanceof type.errors) {
			throw new InvalidPayloadError(parsed.summary)
		}

		const resetsAt = parseInstant(parsed.resets_at)
		if (!resetsAt) {
			throw new InvalidPayloadError(`resets_at is not an ISO timestamp (was ${JSON.stringify(parsed.resets_at)})`)
		}

		let takenAt: Date | null = null
		if (parsed.taken_at) {
			takenAt = parseInstant(parsed.taken_at)
			if (!takenAt) {
				throw new InvalidPayloadError(`taken_at is not an ISO timestamp (was ${JSON.stringify(parsed.taken_at)})`)
			}
		}

		return {
			taken: parsed.taken,
			resetsAt,
			takenAt,
			timeZone: parsed.timezone ?? "UTC",
		}
	}
}

/**
 * ISO 8601 timestamp → instant. Timestamps without an offset are UTC.
 * Sub-millisecond digits are dropped.
 */
export function parseInstant(value: string): Date | null {
	let normalized = value.trim().replace(/(\.\d{3})\d+/, "$1")
	if (!/(?:Z|[+-]\d{2}:?\d{2})$/i.test(normalized)) {
		normalized += "Z"
	}
	const date = new Date(normalized)
	return Number.isNaN(date.getTime()) ? null : date
}

const statusResponse = type({
	taken: "boolean",
	resets_at: "string",
	"taken_at?": "string | null",
	"timezone?": "string",
	"reset_hour_local?": "number",
})

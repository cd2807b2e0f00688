import { InvalidPayloadError, requestJson } from "@signalboard/core"
import { type } from "arktype"

export interface DogWalk {
	/** `YYYY-MM-DD` */
	date: string
	/** `HH:MM` */
	start: string
	/** `HH:MM` */
	end: string
	/** Minutes */
	duration: number
	notes: string | null
}

export interface IDogWalkApi {
	readonly url: string
	fetchLatestWalk(options?: { abortSignal?: AbortSignal }): Promise<DogWalk>
}

/**
 * Client for the walk logger's `GET /api/latest` endpoint.
 */
export class DogWalkApi implements IDogWalkApi {
	readonly url: string

	constructor(baseUrl: string) {
		this.url = `${baseUrl.replace(/\/+$/, "")}/api/latest`
	}

	async fetchLatestWalk(options: { abortSignal?: AbortSignal } = {}): Promise<DogWalk> {
		const data = await requestJson(this.url, options)

		const parsed = latestWalkResponse(data)
		if (parsed instanceof type.errors) {
			throw new InvalidPayloadError(parsed.summary)
		}

		return {
			date: parsed.date,
			start: parsed.start,
			end: parsed.end,
			duration: parsed.duration,
			notes: parsed.notes?.trim() || null,
		}
	}
}

const latestWalkResponse = type({
	date: "string",
	start: "string",
	end: "string",
	duration: "number",
	"notes?": "string | null",
})

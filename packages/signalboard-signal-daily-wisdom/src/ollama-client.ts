import { InvalidPayloadError, requestJson } from "@signalboard/core"
import { type } from "arktype"

export interface GenerateRequest {
	model: string
	prompt: string
}

export interface IOllamaClient {
	/**
	 * Completes `prompt` and returns the raw model output.
	 */
	generate(request: GenerateRequest, options?: { abortSignal?: AbortSignal }): Promise<string>
}

/**
 * Minimal client for Ollama's `/api/generate`. Asks for a short, single
 * sentence continuation in raw mode.
 */
export class OllamaClient implements IOllamaClient {
	readonly url: string

	constructor(baseUrl: string) {
		this.url = `${baseUrl.replace(/\/+$/, "")}/api/generate`
	}

	async generate(request: GenerateRequest, options: { abortSignal?: AbortSignal } = {}): Promise<string> {
		const data = await requestJson(this.url, {
			method: "POST",
			body: {
				model: request.model,
				prompt: request.prompt,
				stream: false,
				raw: true,
				options: {
					temperature: 0.8,
					num_predict: 40,
					stop: [".", "!", "?", "\n"],
				},
			},
			...(options.abortSignal ? { abortSignal: options.abortSignal } : {}),
		})

		const parsed = generateResponse(data)
		if (parsed instanceof type.errors) {
			throw new InvalidPayloadError(`Invalid Ollama response: ${parsed.summary}`)
		}
		return parsed.response ?? ""
	}
}

const generateResponse = type({
	"response?": "string",
})

import type { Signal, SignalFetchOptions, SignalMeta, SignalResult } from "@signalboard/core"

import { describeError, okResult } from "@signalboard/core"

import type { IOllamaClient } from "./ollama-client.ts"

import { OllamaClient } from "./ollama-client.ts"

const DAY_MS = 86_400_000
const MAX_LENGTH = 100

export const DEFAULT_PROMPT = "A calm mind knows that"

export const FALLBACK_WISDOM: readonly string[] = [
	"Slow mornings make for steady afternoons",
	"A short walk settles most arguments with yourself",
	"Warm tea is a reasonable answer to many questions",
	"Rest counts as progress more often than you think",
	"Small kindnesses compound faster than interest",
	"Good friends make ordinary days worth remembering",
	"Let the unimportant things float downstream",
	"Sunlight and patience untangle a lot of knots",
	"Nothing urgent was ever improved by panic",
	"The quiet hour is where good ideas wait",
]

export interface DailyWisdomSignalOptions {
	/** Default: `daily-wisdom` */
	id?: string
	/** Default: `Daily Wisdom` */
	title?: string
	/** Default: `http://localhost:11434` */
	baseUrl?: string
	/** Default: `llama3` */
	model?: string
	/** Sentence opener the model completes. Default: {@link DEFAULT_PROMPT} */
	prompt?: string
	/** IANA zone that decides when a new day starts. Default: `UTC` */
	timeZone?: string
	/** Default: 3600 */
	pollIntervalSeconds?: number
	/** Default: 15 */
	timeoutSeconds?: number
	/** Default: true */
	background?: boolean
	client?: IOllamaClient
	now?: () => Date
}

/**
 * One sentence of wisdom per day, generated by a local Ollama model.
 *
 * The model is asked at most once per successful day: later fetches on the
 * same local date return the sentence already generated. Falls back to a
 * curated sentence, picked deterministically by date, when the model is
 * unreachable or produces nothing usable; the model is asked again on the
 * next fetch. Always `ok`.
 */
export class DailyWisdomSignal implements Signal {
	readonly meta: SignalMeta

	private readonly model: string
	private readonly prompt: string
	private readonly timeZone: string
	private readonly client: IOllamaClient
	private readonly now: () => Date
	private generated: SignalResult | null = null

	constructor(options: DailyWisdomSignalOptions = {}) {
		this.meta = {
			id: options.id ?? "daily-wisdom",
			title: options.title ?? "Daily Wisdom",
			pollIntervalSeconds: options.pollIntervalSeconds ?? 3600,
			timeoutSeconds: options.timeoutSeconds ?? 15,
			background: options.background ?? true,
		}
		this.model = options.model ?? "llama3"
		this.prompt = options.prompt ?? DEFAULT_PROMPT
		this.timeZone = options.timeZone ?? "UTC"
		this.client = options.client ?? new OllamaClient(options.baseUrl ?? "http://localhost:11434")
		this.now = options.now ?? (() => new Date())
	}

	async fetch(options?: SignalFetchOptions): Promise<SignalResult> {
		const day = localDay(this.now(), this.timeZone)
		if (this.generated && this.generated.ts.getTime() === day.getTime()) {
			return this.generated
		}

		let sentence: string | null = null
		let failure = "model returned no usable sentence"
		try {
			const raw = await this.client.generate({ model: this.model, prompt: this.prompt }, options)
			sentence = cleanWisdom(raw)
		} catch (err) {
			failure = describeError(err)
		}

		if (sentence) {
			const value = sentence.toLowerCase().startsWith(this.prompt.toLowerCase()) ? sentence : `${this.prompt} ${sentence}`
			this.generated = okResult(value, { ts: day, details: "Daily wisdom" })
			return this.generated
		}

		console.warn(`[signalboard.daily-wisdom] Falling back to curated wisdom: ${failure}`)
		return okResult(pickFallback(day), { ts: day, details: "Daily wisdom (fallback)" })
	}
}

/**
 * Reduces raw model output to one short sentence.
 *
 * Strips `<think>` blocks and surrounding quotes, keeps the first sentence,
 * and truncates to 100 characters. Returns null if nothing usable remains.
 */
export function cleanWisdom(raw: string): string | null {
	let text = raw.trim()
	if (!text || text.toLowerCase().startsWith("<think>")) {
		return null
	}

	const open = text.toLowerCase().indexOf("<think>")
	if (open >= 0) {
		text = text.slice(0, open).trim()
	}
	const close = text.toLowerCase().indexOf("</think>")
	if (close >= 0) {
		text = text.slice(close + "</think>".length).trim()
	}

	if (text.length >= 2 && text.startsWith('"') && text.endsWith('"')) {
		text = text.slice(1, -1)
	}

	for (const ender of [". ", "! ", "? "]) {
		const index = text.indexOf(ender)
		if (index >= 0) {
			text = text.slice(0, index + 1)
			break
		}
	}

	text = text.trim()
	if (text.length > MAX_LENGTH) {
		text = `${text.slice(0, MAX_LENGTH - 3)}...`
	}

	return text.length < 5 ? null : text
}

/**
 * Fallback sentence for `day`; the same day always yields the same sentence.
 */
export function pickFallback(day: Date): string {
	const dayNumber = Math.floor(day.getTime() / DAY_MS)
	return FALLBACK_WISDOM[dayNumber % FALLBACK_WISDOM.length] ?? ""
}

/**
 * Midnight UTC of the calendar date `now` falls on in `timeZone`.
 * Unknown zones fall back to UTC.
 */
export function localDay(now: Date, timeZone: string): Date {
	let parts: Intl.DateTimeFormatPart[]
	try {
		parts = new Intl.DateTimeFormat("en-US", {
			timeZone,
			year: "numeric",
			month: "2-digit",
			day: "2-digit",
		}).formatToParts(now)
	} catch (err) {
		if (!(err instanceof RangeError)) {
			throw err
		}
		return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()))
	}

	const part = (type: Intl.DateTimeFormatPartTypes) => Number(parts.find((p) => p.type === type)?.value)
	return new Date(Date.UTC(part("year"), part("month") - 1, part("day")))
}

export {
	DEFAULT_PROMPT,
	DailyWisdomSignal,
	FALLBACK_WISDOM,
	cleanWisdom,
	localDay,
	pickFallback,
} from "./daily-wisdom-signal.ts"
export type { DailyWisdomSignalOptions } from "./daily-wisdom-signal.ts"
export { OllamaClient } from "./ollama-client.ts"
export type { GenerateRequest, IOllamaClient } from "./ollama-client.ts"

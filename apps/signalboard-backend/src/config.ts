import { type } from "arktype"
import { fileURLToPath } from "node:url"

import { ConfigError } from "./lib/error.ts"

type Env = Record<string, string | undefined>

const flag = type("'0' | '1' | 'true' | 'false'")

const serverEnv = type({
	"PORT?": "string.integer.parse",
	"HOST?": "string > 0",
	"CACHE_PATH?": "string > 0",
	"DATABASE_PATH?": "string > 0",
	"SIGNALS_DIR?": "string > 0",
	"REFRESH_TICK_SECONDS?": "string.integer.parse",
	"PRUNE_ORPHANS?": flag,
})

const signalEnv = type({
	"WEBHOOK_ROUTER_BASE_URL?": "string.url",
	"GITHUB_OWNER?": "string",
	"GITHUB_REPO?": "string",
	"GITHUB_TOKEN?": "string",
	"GITHUB_WARN_DAYS?": "string.integer.parse",
	"GITHUB_BAD_DAYS?": "string.integer.parse",
	"DOGWALK_BASE_URL?": "string.url",
	"MEDCHECK_BASE_URL?": "string.url",
	"MEDCHECK_BAD_WITHIN_SECONDS?": "string.integer.parse",
	"OLLAMA_BASE_URL?": "string.url",
	"WISDOM_MODEL?": "string > 0",
	"WISDOM_TZ?": "string > 0",
})

export interface ServerConfig {
	port: number
	host: string
	cachePath: string
	databasePath: string
	signalsDir: string
	/** 0 disables the background refresh loop */
	refreshTickSeconds: number
	pruneOrphans: boolean
}

export interface SignalConfig {
	webhookRouterUrl: string
	github: {
		owner: string
		repo: string
		token: string | undefined
		warnDays: number
		badDays: number
	}
	dogWalkUrl: string
	medCheck: {
		baseUrl: string
		badWithinSeconds: number
	}
	wisdom: {
		ollamaUrl: string
		model: string
		timeZone: string
	}
}

const DEFAULT_SIGNALS_DIR = fileURLToPath(new URL("./signals", import.meta.url))

/**
 * Reads server settings from the environment.
 *
 * @throws {ConfigError} If a variable is set to an invalid value
 */
export function loadServerConfig(env: Env = process.env): ServerConfig {
	const parsed = serverEnv(env)
	if (parsed instanceof type.errors) {
		throw new ConfigError(parsed.summary)
	}

	const port = parsed.PORT ?? 3000
	if (port < 1 || port > 65535) {
		throw new ConfigError(`PORT must be between 1 and 65535 (was ${port})`)
	}
	const refreshTickSeconds = parsed.REFRESH_TICK_SECONDS ?? 30
	if (refreshTickSeconds < 0) {
		throw new ConfigError(`REFRESH_TICK_SECONDS must be >= 0 (was ${refreshTickSeconds})`)
	}

	return {
		port,
		host: parsed.HOST ?? "0.0.0.0",
		cachePath: parsed.CACHE_PATH ?? "data/cache.json",
		databasePath: parsed.DATABASE_PATH ?? "data/signalboard.db",
		signalsDir: parsed.SIGNALS_DIR ?? DEFAULT_SIGNALS_DIR,
		refreshTickSeconds,
		pruneOrphans: parsed.PRUNE_ORPHANS === "1" || parsed.PRUNE_ORPHANS === "true",
	}
}

/**
 * Reads the settings of the bundled signal plugins from the environment.
 *
 * @throws {ConfigError} If a variable is set to an invalid value
 */
export function loadSignalConfig(env: Env = process.env): SignalConfig {
	const parsed = signalEnv(env)
	if (parsed instanceof type.errors) {
		throw new ConfigError(parsed.summary)
	}

	return {
		webhookRouterUrl: parsed.WEBHOOK_ROUTER_BASE_URL ?? "http://localhost:8080",
		github: {
			owner: parsed.GITHUB_OWNER ?? "",
			repo: parsed.GITHUB_REPO ?? "",
			token: parsed.GITHUB_TOKEN?.trim() || undefined,
			warnDays: parsed.GITHUB_WARN_DAYS ?? 7,
			badDays: parsed.GITHUB_BAD_DAYS ?? 21,
		},
		dogWalkUrl: parsed.DOGWALK_BASE_URL ?? "http://localhost:5010",
		medCheck: {
			baseUrl: parsed.MEDCHECK_BASE_URL ?? "http://localhost:5055",
			badWithinSeconds: parsed.MEDCHECK_BAD_WITHIN_SECONDS ?? 2 * 3600,
		},
		wisdom: {
			ollamaUrl: parsed.OLLAMA_BASE_URL ?? "http://localhost:11434",
			model: parsed.WISDOM_MODEL ?? "llama3",
			timeZone: parsed.WISDOM_TZ ?? "UTC",
		},
	}
}

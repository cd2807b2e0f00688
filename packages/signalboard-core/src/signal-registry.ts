import { type } from "arktype"

import type { Signal, SignalMeta } from "./signal"
import type { SignalLoader } from "./signal-loader"

import { DiscoveryError, DiscoveryFailure, SignalNotFoundError, describeError } from "./errors"
import { signalMetaSchema } from "./signal"

export interface RegistryEntry {
	readonly meta: SignalMeta
	readonly signal: Signal
	readonly moduleName: string
}

/**
 * Immutable view of the registry. Replaced wholesale on reload, so holders of
 * an older snapshot keep a complete, consistent set of signals.
 */
export interface RegistrySnapshot {
	readonly entries: ReadonlyMap<string, RegistryEntry>
	/** Ordered by id */
	readonly metas: readonly SignalMeta[]
	readonly loadedAt: Date | null
}

export interface DiscoveryResult {
	snapshot: RegistrySnapshot
	errors: DiscoveryError[]
}

export interface ReloadSummary {
	discovered: number
	failed: number
	signalIds: string[]
	errors: DiscoveryError[]
}

const EMPTY_SNAPSHOT: RegistrySnapshot = {
	entries: new Map(),
	metas: [],
	loadedAt: null,
}

/**
 * Loads every candidate from `loader` and validates it against the signal contract.
 *
 * A signal module exports its signal as `default` or as `SIGNAL`; modules
 * exporting neither are helpers and are passed over. A module that fails to
 * load or does not conform is recorded as a DiscoveryError and skipped. When two modules declare the same id, the one
 * listed first wins.
 */
export async function discoverSignals(loader: SignalLoader): Promise<DiscoveryResult> {
	const candidates = await loader.candidates()
	const entries = new Map<string, RegistryEntry>()
	const errors: DiscoveryError[] = []

	for (const candidate of candidates) {
		let namespace: unknown
		try {
			namespace = await candidate.load()
		} catch (err) {
			errors.push(new DiscoveryError(candidate.name, DiscoveryFailure.LoadFailed, describeError(err)))
			continue
		}

		const conformed = conformSignal(candidate.name, namespace)
		if (conformed === null) {
			continue
		}
		if (conformed instanceof DiscoveryError) {
			errors.push(conformed)
			continue
		}

		const existing = entries.get(conformed.meta.id)
		if (existing) {
			errors.push(
				new DiscoveryError(
					candidate.name,
					DiscoveryFailure.DuplicateId,
					`id "${conformed.meta.id}" is already registered by "${existing.moduleName}"`,
					conformed.meta.id,
				),
			)
			continue
		}

		entries.set(conformed.meta.id, conformed)
	}

	const metas = Array.from(entries.values(), (entry) => entry.meta).sort((a, b) =>
		a.id < b.id ? -1 : a.id > b.id ? 1 : 0,
	)

	return {
		snapshot: { entries, metas, loadedAt: new Date() },
		errors,
	}
}

function conformSignal(moduleName: string, namespace: unknown): RegistryEntry | DiscoveryError | null {
	const exported = declaredSignal(namespace)
	if (exported === undefined) {
		return null
	}

	if (typeof exported !== "object" || exported === null || !("meta" in exported)) {
		return new DiscoveryError(moduleName, DiscoveryFailure.InvalidMeta, "exported signal has no meta")
	}

	const meta = signalMetaSchema(exported.meta)
	if (meta instanceof type.errors) {
		return new DiscoveryError(moduleName, DiscoveryFailure.InvalidMeta, `invalid meta: ${meta.summary}`)
	}

	if (!isSignal(exported)) {
		return new DiscoveryError(moduleName, DiscoveryFailure.MissingFetch, "exported signal has no fetch()", meta.id)
	}

	return {
		meta: Object.freeze({ ...meta }),
		signal: exported,
		moduleName,
	}
}

/**
 * The module's default export, or its named `SIGNAL` export.
 * Undefined for modules that declare neither.
 */
function declaredSignal(namespace: unknown): unknown {
	if (typeof namespace !== "object" || namespace === null) {
		return undefined
	}
	if ("default" in namespace) {
		return namespace.default
	}
	if ("SIGNAL" in namespace) {
		return namespace.SIGNAL
	}
	return undefined
}

function isSignal(value: object): value is Signal {
	return "meta" in value && "fetch" in value && typeof value.fetch === "function"
}

/**
 * Owns the id → signal mapping.
 *
 * @example
 * ```ts
 * const registry = new SignalRegistry(directoryLoader({ directory: "./signals" }))
 * const { discovered, errors } = await registry.reload()
 *
 * for (const meta of registry.list()) {
 *   console.log(meta.id, meta.title)
 * }
 * ```
 */
export class SignalRegistry {
	private current: RegistrySnapshot = EMPTY_SNAPSHOT
	private inFlight: Promise<ReloadSummary> | null = null

	constructor(private readonly loader: SignalLoader) {}

	get location(): string {
		return this.loader.location
	}

	/**
	 * Re-runs discovery and swaps in the new snapshot. Calls made while a reload
	 * is running share its result.
	 *
	 * If the source location itself cannot be scanned, the previous snapshot
	 * stays live and the failure is reported in the summary.
	 */
	reload(): Promise<ReloadSummary> {
		if (!this.inFlight) {
			this.inFlight = this.runReload().finally(() => {
				this.inFlight = null
			})
		}
		return this.inFlight
	}

	snapshot(): RegistrySnapshot {
		return this.current
	}

	list(): readonly SignalMeta[] {
		return this.current.metas
	}

	has(signalId: string): boolean {
		return this.current.entries.has(signalId)
	}

	/**
	 * @throws {SignalNotFoundError} If no signal is registered under `signalId`
	 */
	get(signalId: string): Signal {
		const entry = this.current.entries.get(signalId)
		if (!entry) {
			throw new SignalNotFoundError(signalId)
		}
		return entry.signal
	}

	private async runReload(): Promise<ReloadSummary> {
		let result: DiscoveryResult
		try {
			result = await discoverSignals(this.loader)
		} catch (err) {
			const error = new DiscoveryError(this.loader.location, DiscoveryFailure.LoadFailed, describeError(err))
			console.error("[signalboard.registry] Failed to scan signal location:", error.message)
			return { discovered: 0, failed: 1, signalIds: [], errors: [error] }
		}

		this.current = result.snapshot

		for (const error of result.errors) {
			console.warn(`[signalboard.registry] ${error.message}`)
		}

		return {
			discovered: result.snapshot.entries.size,
			failed: result.errors.length,
			signalIds: result.snapshot.metas.map((meta) => meta.id),
			errors: result.errors,
		}
	}
}

// Signal contract
export type { Signal, SignalFetchOptions, SignalMeta, SignalResult } from "./signal"
export {
	SIGNAL_STATUSES,
	SignalStatus,
	badResult,
	defineSignal,
	okResult,
	signalMetaSchema,
	signalResult,
	signalResultSchema,
	signalStatusSchema,
	unknownResult,
	warnResult,
} from "./signal"

// Errors
export {
	DiscoveryError,
	DiscoveryFailure,
	PersistenceError,
	SignalNotFoundError,
	describeError,
	toError,
} from "./errors"

// Discovery
export type { DirectoryLoaderOptions, ModuleImporter, SignalCandidate, SignalLoader, StaticModule } from "./signal-loader"
export { directoryLoader, staticLoader } from "./signal-loader"
export type { DiscoveryResult, RegistryEntry, RegistrySnapshot, ReloadSummary } from "./signal-registry"
export { SignalRegistry, discoverSignals } from "./signal-registry"

// Cache
export type { CacheEntry, CacheStoreOptions, LoadOutcome } from "./cache-store"
export { CacheStore, LoadStatus } from "./cache-store"

// Refresh
export type {
	EngineStatus,
	Invocation,
	RefreshCounts,
	RefreshEngineOptions,
	RefreshOptions,
	RefreshSummary,
	SignalOutcome,
} from "./refresh-engine"
export {
	BACKGROUND_ALREADY_RUNNING,
	BACKGROUND_PLACEHOLDER,
	FetchOutcome,
	RefreshEngine,
	invokeSignal,
} from "./refresh-engine"

// Facade
export type { SignalBoardOptions } from "./signal-board"
export { SignalBoard } from "./signal-board"

// HTTP helpers for signal clients
export type { RequestJsonOptions } from "./http"
export { HttpStatusError, InvalidPayloadError, NetworkError, requestJson } from "./http"

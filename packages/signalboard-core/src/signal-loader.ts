import { readdir, stat } from "node:fs/promises"
import { basename, extname, join, resolve } from "node:path"
import { pathToFileURL } from "node:url"

/**
 * A module that may declare a signal. `load()` resolves to the module
 * namespace; the signal is read from its default or `SIGNAL` export.
 */
export interface SignalCandidate {
	/** Module name, used in diagnostics and for deterministic ordering */
	readonly name: string
	load(): Promise<unknown>
}

/**
 * Enumerates candidate signal modules from a source location.
 */
export interface SignalLoader {
	/** Human-readable description of the source location */
	readonly location: string
	candidates(): Promise<SignalCandidate[]>
}

export type ModuleImporter = (specifier: string) => Promise<unknown>

export interface DirectoryLoaderOptions {
	directory: string
	/** File extensions treated as modules. Default: .ts, .js, .mjs */
	extensions?: readonly string[]
	/** Override for `import()`. */
	importModule?: ModuleImporter
}

const DEFAULT_EXTENSIONS = [".ts", ".js", ".mjs"] as const

const defaultImporter: ModuleImporter = (specifier) => import(/* @vite-ignore */ specifier)

/**
 * Scans a directory for signal modules.
 *
 * Skips files starting with `_`, declaration files, and tests. A file whose
 * modification time changed since the previous scan is imported under a new
 * generation query so the edit is re-evaluated; unchanged files keep their URL
 * and come from the module cache. Node never evicts modules, so every edited
 * version stays in memory for the life of the process.
 *
 * @example
 * ```ts
 * const registry = new SignalRegistry(directoryLoader({ directory: "./src/signals" }))
 * await registry.reload()
 * ```
 */
export function directoryLoader(options: DirectoryLoaderOptions): SignalLoader {
	const directory = resolve(options.directory)
	const extensions: readonly string[] = options.extensions ?? DEFAULT_EXTENSIONS
	const importModule = options.importModule ?? defaultImporter
	const seen = new Map<string, { mtimeMs: number; generation: number }>()
	let generations = 0

	return {
		location: directory,

		async candidates() {
			const dirents = await readdir(directory, { withFileTypes: true })
			const fileNames = dirents
				.filter((dirent) => dirent.isFile() && isModuleFile(dirent.name, extensions))
				.map((dirent) => dirent.name)
				.sort()

			const modified = await Promise.all(fileNames.map(async (fileName) => (await stat(join(directory, fileName))).mtimeMs))

			return fileNames.map((fileName, index) => {
				const mtimeMs = modified[index] ?? 0
				const previous = seen.get(fileName)
				let generation = previous?.generation ?? 0
				if (previous && previous.mtimeMs !== mtimeMs) {
					generation = ++generations
				}
				seen.set(fileName, { mtimeMs, generation })

				const url = pathToFileURL(join(directory, fileName))
				if (generation > 0) {
					url.searchParams.set("generation", String(generation))
				}
				return {
					name: basename(fileName, extname(fileName)),
					load: () => importModule(url.href),
				}
			})
		},
	}
}

function isModuleFile(fileName: string, extensions: readonly string[]): boolean {
	if (fileName.startsWith("_") || fileName.endsWith(".d.ts")) {
		return false
	}
	if (/\.(test|spec)\.[^.]+$/.test(fileName)) {
		return false
	}
	return extensions.includes(extname(fileName))
}

export type StaticModule = unknown | (() => unknown | Promise<unknown>)

/**
 * Compiled-in registration table: module name → module namespace (or a thunk
 * producing one, e.g. `() => import("./signals/github.ts")`).
 */
export function staticLoader(modules: Record<string, StaticModule>, location = "static"): SignalLoader {
	return {
		location,

		async candidates() {
			return Object.keys(modules)
				.sort()
				.map((name) => ({
					name,
					load: async () => {
						const entry = modules[name]
						return typeof entry === "function" ? await entry() : entry
					},
				}))
		},
	}
}

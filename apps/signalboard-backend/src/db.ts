import type { Database, SqlJsStatic, SqlValue } from "sql.js"

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs"
import { dirname } from "node:path"
import initSqlJs from "sql.js"

export const IN_MEMORY = ":memory:"

export type Row = Record<string, SqlValue>

let engine: Promise<SqlJsStatic> | null = null

/**
 * SQLite database run in process by sql.js.
 *
 * When opened on a file, every statement that changes rows writes the whole
 * database back to it through a temporary file and a rename.
 */
export class Db {
	constructor(
		private readonly database: Database,
		readonly path: string,
	) {}

	exec(sql: string): void {
		this.database.exec(sql)
		this.save()
	}

	/**
	 * @returns number of rows changed
	 */
	run(sql: string, params: SqlValue[] = []): number {
		this.database.run(sql, params)
		const changes = this.database.getRowsModified()
		if (changes > 0) {
			this.save()
		}
		return changes
	}

	all(sql: string, params: SqlValue[] = []): Row[] {
		const statement = this.database.prepare(sql, params)
		try {
			const rows: Row[] = []
			while (statement.step()) {
				rows.push(statement.getAsObject())
			}
			return rows
		} finally {
			statement.free()
		}
	}

	get(sql: string, params: SqlValue[] = []): Row | undefined {
		return this.all(sql, params)[0]
	}

	close(): void {
		this.database.close()
	}

	private save(): void {
		if (this.path === IN_MEMORY) return

		const data = this.database.export()
		// export() reopens the connection, which resets pragmas
		this.database.exec("PRAGMA foreign_keys = ON")

		const tempPath = `${this.path}.${process.pid}.tmp`
		writeFileSync(tempPath, data)
		renameSync(tempPath, this.path)
	}
}

/**
 * Opens the SQLite database at `path`, loading it if the file exists, with
 * foreign keys enforced. Pass {@link IN_MEMORY} for a throwaway database.
 */
export async function openDatabase(path: string): Promise<Db> {
	if (!engine) {
		engine = initSqlJs()
	}
	const SQL = await engine

	let data: Uint8Array | null = null
	if (path !== IN_MEMORY) {
		mkdirSync(dirname(path), { recursive: true })
		if (existsSync(path)) {
			data = readFileSync(path)
		}
	}

	const database = new SQL.Database(data)
	database.exec("PRAGMA foreign_keys = ON")
	return new Db(database, path)
}

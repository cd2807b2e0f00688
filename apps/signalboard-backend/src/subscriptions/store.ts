import type { Db } from "../db.ts"

import { type } from "arktype"

export interface UserRecord {
	username: string
	/** ISO 8601 */
	createdAt: string
}

const SCHEMA = `
CREATE TABLE IF NOT EXISTS users (
	username TEXT PRIMARY KEY,
	created_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS subscriptions (
	username TEXT NOT NULL,
	signal_id TEXT NOT NULL,
	created_at TEXT NOT NULL,
	PRIMARY KEY (username, signal_id),
	FOREIGN KEY (username) REFERENCES users(username) ON DELETE CASCADE
);
`

const userRows = type({ username: "string", created_at: "string" }).array()
const subscriptionRows = type({ signal_id: "string" }).array()

/**
 * Users and their signal subscriptions. Only dashboard preferences live here;
 * signal results stay in the JSON cache.
 */
export class SubscriptionStore {
	constructor(
		private readonly db: Db,
		private readonly now: () => Date = () => new Date(),
	) {}

	initSchema(): void {
		this.db.exec(SCHEMA)
	}

	/**
	 * @returns false if the user already exists
	 */
	createUser(username: string): boolean {
		return (
			this.db.run("INSERT OR IGNORE INTO users (username, created_at) VALUES (?, ?)", [
				username,
				this.now().toISOString(),
			]) > 0
		)
	}

	listUsers(): UserRecord[] {
		const rows = userRows.assert(
			this.db.all("SELECT username, created_at FROM users ORDER BY username COLLATE NOCASE"),
		)
		return rows.map((row) => ({ username: row.username, createdAt: row.created_at }))
	}

	userExists(username: string): boolean {
		return this.db.get("SELECT 1 AS found FROM users WHERE username = ?", [username]) !== undefined
	}

	deleteUser(username: string): boolean {
		return this.db.run("DELETE FROM users WHERE username = ?", [username]) > 0
	}

	listSubscriptions(username: string): string[] {
		const rows = subscriptionRows.assert(
			this.db.all("SELECT signal_id FROM subscriptions WHERE username = ? ORDER BY signal_id COLLATE NOCASE", [
				username,
			]),
		)
		return rows.map((row) => row.signal_id)
	}

	/**
	 * @returns false if the subscription already existed
	 */
	subscribe(username: string, signalId: string): boolean {
		return (
			this.db.run("INSERT OR IGNORE INTO subscriptions (username, signal_id, created_at) VALUES (?, ?, ?)", [
				username,
				signalId,
				this.now().toISOString(),
			]) > 0
		)
	}

	/**
	 * @returns false if there was no such subscription
	 */
	unsubscribe(username: string, signalId: string): boolean {
		return this.db.run("DELETE FROM subscriptions WHERE username = ? AND signal_id = ?", [username, signalId]) > 0
	}
}

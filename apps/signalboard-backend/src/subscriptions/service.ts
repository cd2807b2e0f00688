import { SignalNotFoundError } from "@signalboard/core"

import type { SubscriptionStore, UserRecord } from "./store.ts"

import { InvalidInputError, UserNotFoundError } from "../lib/error.ts"

const MAX_USERNAME_LENGTH = 64
const MAX_SIGNAL_ID_LENGTH = 128

export interface SignalLookup {
	has(signalId: string): boolean
}

export interface SubscriptionChange {
	username: string
	signalId: string
	/** Whether the call changed anything */
	changed: boolean
	/** Subscriptions after the change */
	signals: string[]
}

/**
 * User and subscription management on top of {@link SubscriptionStore}.
 * Subscribing checks the signal against the live registry.
 */
export class SubscriptionService {
	constructor(
		private readonly store: SubscriptionStore,
		private readonly registry: SignalLookup,
	) {}

	listUsers(): UserRecord[] {
		return this.store.listUsers()
	}

	/**
	 * @throws {InvalidInputError} If the username is empty, too long, or contains whitespace
	 */
	createUser(rawUsername: string): { username: string; created: boolean } {
		const username = normalizeUsername(rawUsername)
		return { username, created: this.store.createUser(username) }
	}

	/**
	 * Deletes the user together with their subscriptions.
	 *
	 * @throws {UserNotFoundError}
	 */
	deleteUser(username: string): void {
		if (!this.store.deleteUser(username)) {
			throw new UserNotFoundError(username)
		}
	}

	/**
	 * @throws {UserNotFoundError}
	 */
	requireUser(username: string): void {
		if (!this.store.userExists(username)) {
			throw new UserNotFoundError(username)
		}
	}

	/**
	 * @throws {UserNotFoundError}
	 */
	listSubscriptions(username: string): string[] {
		this.requireUser(username)
		return this.store.listSubscriptions(username)
	}

	/**
	 * @throws {UserNotFoundError}
	 * @throws {InvalidInputError} If the signal id is malformed
	 * @throws {SignalNotFoundError} If no such signal is registered
	 */
	subscribe(username: string, rawSignalId: string): SubscriptionChange {
		this.requireUser(username)
		const signalId = normalizeSignalId(rawSignalId)
		if (!this.registry.has(signalId)) {
			throw new SignalNotFoundError(signalId)
		}

		const changed = this.store.subscribe(username, signalId)
		return { username, signalId, changed, signals: this.store.listSubscriptions(username) }
	}

	/**
	 * Does not consult the registry: subscriptions to signals that are no
	 * longer registered can still be removed.
	 *
	 * @throws {UserNotFoundError}
	 */
	unsubscribe(username: string, signalId: string): SubscriptionChange {
		this.requireUser(username)
		const changed = this.store.unsubscribe(username, signalId)
		return { username, signalId, changed, signals: this.store.listSubscriptions(username) }
	}
}

export function normalizeUsername(raw: string): string {
	const username = raw.trim()
	if (!username) {
		throw new InvalidInputError("username", "must not be empty")
	}
	if (username.length > MAX_USERNAME_LENGTH) {
		throw new InvalidInputError("username", `must be at most ${MAX_USERNAME_LENGTH} characters`)
	}
	if (/\s/.test(username)) {
		throw new InvalidInputError("username", "must not contain whitespace")
	}
	return username
}

function normalizeSignalId(raw: string): string {
	const signalId = raw.trim()
	if (!signalId) {
		throw new InvalidInputError("signalId", "must not be empty")
	}
	if (signalId.length > MAX_SIGNAL_ID_LENGTH) {
		throw new InvalidInputError("signalId", `must be at most ${MAX_SIGNAL_ID_LENGTH} characters`)
	}
	return signalId
}

import type { CacheEntry, SignalMeta } from "@signalboard/core"

import type { SubscriptionService } from "../subscriptions/service.ts"
import type { SignalView } from "../views/view.ts"

import { buildViews } from "../views/view.ts"

/**
 * The read side of the board. Never triggers a fetch.
 */
export interface BoardReader {
	listSignalMetadata(): readonly SignalMeta[]
	getAllCached(): ReadonlyMap<string, CacheEntry>
	getCached(signalIds: Iterable<string>): ReadonlyMap<string, CacheEntry>
}

export interface DashboardServiceDeps {
	board: BoardReader
	subscriptions: SubscriptionService
	now?: () => Date
}

export class DashboardService {
	private readonly board: BoardReader
	private readonly subscriptions: SubscriptionService
	private readonly now: () => Date

	constructor({ board, subscriptions, now }: DashboardServiceDeps) {
		this.board = board
		this.subscriptions = subscriptions
		this.now = now ?? (() => new Date())
	}

	allSignals(): SignalView[] {
		return buildViews(this.board.listSignalMetadata(), this.board.getAllCached(), this.now())
	}

	/**
	 * Views of the signals `username` subscribes to that are currently registered.
	 *
	 * @throws {UserNotFoundError}
	 */
	forUser(username: string): SignalView[] {
		const subscribed = new Set(this.subscriptions.listSubscriptions(username))
		const metas = this.board.listSignalMetadata().filter((meta) => subscribed.has(meta.id))
		return buildViews(metas, this.board.getCached(subscribed), this.now())
	}
}

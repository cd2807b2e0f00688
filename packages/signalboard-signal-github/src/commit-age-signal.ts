import type { Signal, SignalFetchOptions, SignalMeta, SignalResult, SignalStatus } from "@signalboard/core"

import {
	HttpStatusError,
	NetworkError,
	badResult,
	describeError,
	signalResult,
	warnResult,
} from "@signalboard/core"

import type { GitHubCommit, IGitHubApi } from "./github-api.ts"

import { GitHubApi } from "./github-api.ts"

const DAY_MS = 86_400_000

export interface CommitAgeSignalOptions {
	/** Default: `github-last-commit` */
	id?: string
	/** Default: `GitHub: last commit age` */
	title?: string
	owner?: string
	repo?: string
	token?: string
	/** Age in days at which the signal turns `warn`. Default: 7 */
	warnDays?: number
	/** Age in days at which the signal turns `bad`. Default: 21 */
	badDays?: number
	/** Default: 300 */
	pollIntervalSeconds?: number
	/** Default: 2 */
	timeoutSeconds?: number
	client?: IGitHubApi
	now?: () => Date
}

/**
 * Days since the last commit on a repository's default branch.
 *
 * @example
 * ```ts
 * export default new CommitAgeSignal({
 *   owner: "octo-org",
 *   repo: "portfolio",
 *   token: process.env.GITHUB_TOKEN,
 * })
 * ```
 */
export class CommitAgeSignal implements Signal {
	readonly meta: SignalMeta

	private readonly owner: string
	private readonly repo: string
	private readonly warnDays: number
	private readonly badDays: number
	private readonly client: IGitHubApi
	private readonly now: () => Date

	constructor(options: CommitAgeSignalOptions = {}) {
		this.meta = {
			id: options.id ?? "github-last-commit",
			title: options.title ?? "GitHub: last commit age",
			pollIntervalSeconds: options.pollIntervalSeconds ?? 300,
			timeoutSeconds: options.timeoutSeconds ?? 2,
		}
		this.owner = options.owner?.trim() ?? ""
		this.repo = options.repo?.trim() ?? ""
		this.warnDays = options.warnDays ?? 7
		this.badDays = options.badDays ?? 21
		this.client = options.client ?? new GitHubApi(options.token)
		this.now = options.now ?? (() => new Date())
	}

	async fetch(options?: SignalFetchOptions): Promise<SignalResult> {
		const now = this.now()

		if (!this.owner || !this.repo) {
			return warnResult("GitHub repo not configured", {
				ts: now,
				details: "Set an owner and repo (and optionally a token).",
			})
		}

		const link = `https://github.com/${this.owner}/${this.repo}`

		let commit: GitHubCommit | null
		try {
			commit = await this.client.fetchLatestCommit(this.owner, this.repo, options)
		} catch (err) {
			if (err instanceof HttpStatusError) {
				return badResult(`GitHub HTTP ${err.status}`, {
					ts: now,
					details: `${err.statusText || "Request failed"}. If this is rate limiting, configure a token.`,
					link,
				})
			}
			if (err instanceof NetworkError) {
				return badResult("GitHub unreachable", { ts: now, details: err.message, link })
			}
			return badResult("GitHub fetch failed", { ts: now, details: describeError(err), link })
		}

		if (!commit) {
			return badResult("No commits returned", {
				ts: now,
				details: "GitHub API returned an empty commits list.",
				link,
			})
		}
		if (!commit.date) {
			return badResult("Commit timestamp missing", {
				ts: now,
				details: "Neither commit.committer.date nor commit.author.date is set.",
				link,
			})
		}

		const ageDays = Math.max(Math.floor((now.getTime() - commit.date.getTime()) / DAY_MS), 0)

		return signalResult(this.statusFor(ageDays), `${ageDays}d since last commit`, {
			ts: commit.date,
			details: `Last commit ${commit.sha.slice(0, 7)} at ${commit.date.toISOString()}. Thresholds: warn≥${this.warnDays}d, bad≥${this.badDays}d.`,
			link,
		})
	}

	private statusFor(ageDays: number): SignalStatus {
		if (ageDays >= this.badDays) return "bad"
		if (ageDays >= this.warnDays) return "warn"
		return "ok"
	}
}

import { InvalidPayloadError, requestJson } from "@signalboard/core"
import { type } from "arktype"

const GITHUB_API_BASE = "https://api.github.com"

export interface GitHubCommit {
	sha: string
	/** Committer date, falling back to author date. Null if the API returned neither. */
	date: Date | null
}

export interface IGitHubApi {
	/**
	 * Most recent commit on the default branch, or null for an empty repository.
	 */
	fetchLatestCommit(owner: string, repo: string, options?: { abortSignal?: AbortSignal }): Promise<GitHubCommit | null>
}

export class GitHubApi implements IGitHubApi {
	private readonly token: string | null

	constructor(token?: string) {
		this.token = token?.trim() || null
	}

	async fetchLatestCommit(
		owner: string,
		repo: string,
		options: { abortSignal?: AbortSignal } = {},
	): Promise<GitHubCommit | null> {
		const url = `${GITHUB_API_BASE}/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}/commits?per_page=1`
		const data = await requestJson(url, {
			headers: {
				Accept: "application/vnd.github+json",
				...(this.token ? { Authorization: `Bearer ${this.token}` } : {}),
			},
			...(options.abortSignal ? { abortSignal: options.abortSignal } : {}),
		})

		const parsed = commitsResponse(data)
		if (parsed instanceof type.errors) {
			throw new InvalidPayloadError(`Invalid GitHub API response: ${parsed.summary}`)
		}

		const latest = parsed[0]
		if (!latest) {
			return null
		}

		const rawDate = latest.commit.committer?.date ?? latest.commit.author?.date ?? null
		const date = rawDate ? new Date(rawDate) : null

		return {
			sha: latest.sha,
			date: date && !Number.isNaN(date.getTime()) ? date : null,
		}
	}
}

const commitPerson = type({
	"date?": "string | null",
}).or("null")

const commitResponse = type({
	sha: "string",
	commit: {
		"committer?": commitPerson,
		"author?": commitPerson,
	},
})

const commitsResponse = commitResponse.array()

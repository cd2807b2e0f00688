import { HttpStatusError, InvalidPayloadError, NetworkError } from "@signalboard/core"
import { afterEach, describe, expect, test, vi } from "vitest"

import type { GitHubCommit, IGitHubApi } from "./github-api.ts"

import { CommitAgeSignal } from "./commit-age-signal.ts"
import { GitHubApi } from "./github-api.ts"

const NOW = new Date("2026-03-20T12:00:00.000Z")

class StubGitHubApi implements IGitHubApi {
	readonly calls: Array<[string, string]> = []

	constructor(private readonly answer: () => Promise<GitHubCommit | null>) {}

	fetchLatestCommit(owner: string, repo: string): Promise<GitHubCommit | null> {
		this.calls.push([owner, repo])
		return this.answer()
	}
}

function commitAt(iso: string): GitHubCommit {
	return { sha: "0123456789abcdef", date: new Date(iso) }
}

function createSignal(answer: () => Promise<GitHubCommit | null>) {
	const client = new StubGitHubApi(answer)
	const signal = new CommitAgeSignal({ owner: "octo-org", repo: "portfolio", client, now: () => NOW })
	return { signal, client }
}

afterEach(() => {
	vi.restoreAllMocks()
})

describe("CommitAgeSignal", () => {
	test("recent commit is ok", async () => {
		const { signal, client } = createSignal(async () => commitAt("2026-03-18T09:30:00Z"))

		const result = await signal.fetch()

		expect(client.calls).toEqual([["octo-org", "portfolio"]])
		expect(result).toEqual({
			status: "ok",
			value: "2d since last commit",
			ts: new Date("2026-03-18T09:30:00Z"),
			details: "Last commit 0123456 at 2026-03-18T09:30:00.000Z. Thresholds: warn≥7d, bad≥21d.",
			link: "https://github.com/octo-org/portfolio",
		})
	})

	test("warns from seven days", async () => {
		const { signal } = createSignal(async () => commitAt("2026-03-13T12:00:00Z"))

		const result = await signal.fetch()

		expect(result.status).toBe("warn")
		expect(result.value).toBe("7d since last commit")
	})

	test("bad from twenty-one days", async () => {
		const { signal } = createSignal(async () => commitAt("2026-02-27T12:00:00Z"))

		const result = await signal.fetch()

		expect(result.status).toBe("bad")
		expect(result.value).toBe("21d since last commit")
	})

	test("future commit dates count as zero days", async () => {
		const { signal } = createSignal(async () => commitAt("2026-03-21T00:00:00Z"))

		const result = await signal.fetch()

		expect(result.value).toBe("0d since last commit")
	})

	test("custom thresholds", async () => {
		const client = new StubGitHubApi(async () => commitAt("2026-03-17T12:00:00Z"))
		const signal = new CommitAgeSignal({ owner: "o", repo: "r", warnDays: 1, badDays: 3, client, now: () => NOW })

		const result = await signal.fetch()

		expect(result.status).toBe("bad")
	})

	test("missing owner or repo is a warning and makes no request", async () => {
		const client = new StubGitHubApi(async () => null)
		const signal = new CommitAgeSignal({ owner: "octo-org", repo: "  ", client, now: () => NOW })

		const result = await signal.fetch()

		expect(result).toMatchObject({ status: "warn", value: "GitHub repo not configured", ts: NOW })
		expect(client.calls).toEqual([])
	})

	test("empty repository is bad", async () => {
		const { signal } = createSignal(async () => null)

		const result = await signal.fetch()

		expect(result).toMatchObject({ status: "bad", value: "No commits returned" })
	})

	test("commit without a date is bad", async () => {
		const { signal } = createSignal(async () => ({ sha: "abc", date: null }))

		const result = await signal.fetch()

		expect(result).toMatchObject({ status: "bad", value: "Commit timestamp missing" })
	})

	test("HTTP errors are bad with a rate limit hint", async () => {
		const { signal } = createSignal(async () => {
			throw new HttpStatusError("https://api.github.com/repos/octo-org/portfolio/commits", 403, "Forbidden")
		})

		const result = await signal.fetch()

		expect(result).toMatchObject({
			status: "bad",
			value: "GitHub HTTP 403",
			details: "Forbidden. If this is rate limiting, configure a token.",
		})
	})

	test("network errors are bad", async () => {
		const { signal } = createSignal(async () => {
			throw new NetworkError("https://api.github.com", { cause: new Error("ETIMEDOUT") })
		})

		const result = await signal.fetch()

		expect(result).toMatchObject({ status: "bad", value: "GitHub unreachable", details: "ETIMEDOUT" })
	})

	test("other failures are bad", async () => {
		const { signal } = createSignal(async () => {
			throw new InvalidPayloadError("Invalid GitHub API response: must be an array")
		})

		const result = await signal.fetch()

		expect(result).toMatchObject({
			status: "bad",
			value: "GitHub fetch failed",
			details: "InvalidPayloadError: Invalid GitHub API response: must be an array",
		})
	})
})

describe("GitHubApi", () => {
	test("reads the committer date and sends the token", async () => {
		const fetchSpy = vi.spyOn(globalThis, "fetch").mockResolvedValue(
			Response.json([
				{
					sha: "abc123",
					commit: {
						committer: { date: "2026-03-18T09:30:00Z" },
						author: { date: "2026-03-17T09:30:00Z" },
					},
				},
			]),
		)

		const commit = await new GitHubApi("test-token").fetchLatestCommit("octo-org", "portfolio")

		expect(commit).toEqual({ sha: "abc123", date: new Date("2026-03-18T09:30:00Z") })
		const call = fetchSpy.mock.calls[0]
		const url = call?.[0]
		const init = call?.[1]
		expect(url).toBe("https://api.github.com/repos/octo-org/portfolio/commits?per_page=1")
		expect(init?.headers).toMatchObject({
			Accept: "application/vnd.github+json",
			Authorization: "Bearer test-token",
		})
	})

	test("falls back to the author date", async () => {
		vi.spyOn(globalThis, "fetch").mockResolvedValue(
			Response.json([{ sha: "abc123", commit: { committer: null, author: { date: "2026-03-17T09:30:00Z" } } }]),
		)

		const commit = await new GitHubApi().fetchLatestCommit("o", "r")

		expect(commit?.date).toEqual(new Date("2026-03-17T09:30:00Z"))
	})

	test("empty list means no commit", async () => {
		vi.spyOn(globalThis, "fetch").mockResolvedValue(Response.json([]))

		expect(await new GitHubApi().fetchLatestCommit("o", "r")).toBeNull()
	})

	test("rejects an unexpected payload", async () => {
		vi.spyOn(globalThis, "fetch").mockResolvedValue(Response.json({ message: "Not Found" }))

		await expect(new GitHubApi().fetchLatestCommit("o", "r")).rejects.toBeInstanceOf(InvalidPayloadError)
	})
})

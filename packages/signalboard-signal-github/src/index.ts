export { CommitAgeSignal } from "./commit-age-signal.ts"
export type { CommitAgeSignalOptions } from "./commit-age-signal.ts"
export { GitHubApi } from "./github-api.ts"
export type { GitHubCommit, IGitHubApi } from "./github-api.ts"

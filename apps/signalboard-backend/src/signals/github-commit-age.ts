import { CommitAgeSignal } from "@signalboard/signal-github"

import { loadSignalConfig } from "../config.ts"

const { github } = loadSignalConfig()

export default new CommitAgeSignal({
	owner: github.owner,
	repo: github.repo,
	token: github.token,
	warnDays: github.warnDays,
	badDays: github.badDays,
})

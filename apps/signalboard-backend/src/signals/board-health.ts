import { defineSignal, okResult } from "@signalboard/core"

export default defineSignal({
	meta: {
		id: "board-health",
		title: "Board Health",
		pollIntervalSeconds: 60,
		timeoutSeconds: 1,
	},
	async fetch() {
		return okResult("board alive", { details: "Signal registry loaded successfully." })
	},
})

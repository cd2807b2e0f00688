import { DailyWisdomSignal } from "@signalboard/signal-daily-wisdom"

import { loadSignalConfig } from "../config.ts"

const { wisdom } = loadSignalConfig()

export default new DailyWisdomSignal({
	baseUrl: wisdom.ollamaUrl,
	model: wisdom.model,
	timeZone: wisdom.timeZone,
	background: true,
})

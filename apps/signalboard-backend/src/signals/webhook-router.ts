import { HttpHealthSignal } from "@signalboard/signal-http-health"

import { loadSignalConfig } from "../config.ts"

const config = loadSignalConfig()

export default new HttpHealthSignal({
	id: "webhook-router",
	title: "Webhook Router",
	baseUrl: config.webhookRouterUrl,
})

import { MedCheckSignal } from "@signalboard/signal-med-check"

import { loadSignalConfig } from "../config.ts"

const { medCheck } = loadSignalConfig()

export default new MedCheckSignal({
	baseUrl: medCheck.baseUrl,
	badWithinSeconds: medCheck.badWithinSeconds,
})

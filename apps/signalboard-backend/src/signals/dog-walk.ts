import { DogWalkSignal } from "@signalboard/signal-dog-walk"

import { loadSignalConfig } from "../config.ts"

export default new DogWalkSignal({ baseUrl: loadSignalConfig().dogWalkUrl })

export { MedCheckSignal, formatDuration, formatLocalTime } from "./med-check-signal.ts"
export type { MedCheckSignalOptions } from "./med-check-signal.ts"
export { MedCheckApi, parseInstant } from "./med-check-api.ts"
export type { IMedCheckApi, MedCheckStatus } from "./med-check-api.ts"

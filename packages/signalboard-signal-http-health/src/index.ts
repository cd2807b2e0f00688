export { HttpHealthSignal } from "./http-health-signal.ts"
export type { HttpHealthSignalOptions } from "./http-health-signal.ts"
export { HttpHealthProbe } from "./health-probe.ts"
export type { HealthResponse, IHealthProbe } from "./health-probe.ts"

export { DogWalkSignal, parseWalkTime } from "./dog-walk-signal.ts"
export type { DogWalkSignalOptions } from "./dog-walk-signal.ts"
export { DogWalkApi } from "./dog-walk-api.ts"
export type { DogWalk, IDogWalkApi } from "./dog-walk-api.ts"

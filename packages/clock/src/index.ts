export { FakeClock } from "./adapters/fake-clock"
export { SystemClock } from "./adapters/system-clock"
export type { TimeSource } from "./ports/time-source"
export type * from "./ports/time"

export { FakeClock } from "./adapters/fake-clock"
export { SystemClock } from "./adapters/system-clock"
export { type TimeoutOutcome, withTimeout } from "./core/with-timeout"
export type { Clock, Sleeper, TimeSource } from "./ports/clock"
export type * from "./ports/time"

import type { Milliseconds, UtcOffsetMinutes } from "./time"

export interface TimeSource {
  /** Current instant. */
  now(): Date

  /** Current instant as milliseconds since Unix epoch. */
  nowMs(): Milliseconds

  /**
   * Offset of the process's local time zone from UTC at the given instant.
   *
   * @remarks
   * Formatters render "local" time by shifting the instant with this offset,
   * so a fake source fully controls both the wall clock and the zone.
   */
  utcOffsetMinutes(at: Date): UtcOffsetMinutes
}

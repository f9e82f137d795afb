import type { TimeSource } from "../ports/time-source"
import type { Milliseconds, UtcOffsetMinutes } from "../ports/time"

export class FakeClock implements TimeSource {
  private time: Milliseconds
  private offset: UtcOffsetMinutes

  constructor(start: Milliseconds = 0, offsetMinutes: UtcOffsetMinutes = 0) {
    this.time = start
    this.offset = offsetMinutes
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): Milliseconds {
    return this.time
  }

  utcOffsetMinutes(_at: Date): UtcOffsetMinutes {
    return this.offset
  }

  advance(ms: Milliseconds): void {
    this.time = this.time + ms
  }

  set(ms: Milliseconds): void {
    this.time = ms
  }

  setOffset(offsetMinutes: UtcOffsetMinutes): void {
    this.offset = offsetMinutes
  }
}

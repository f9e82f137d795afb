import type { TimeSource } from "../ports/time-source"
import type { Milliseconds, UtcOffsetMinutes } from "../ports/time"

export class SystemClock implements TimeSource {
  now(): Date {
    return new Date()
  }

  nowMs(): Milliseconds {
    return Date.now()
  }

  utcOffsetMinutes(at: Date): UtcOffsetMinutes {
    // getTimezoneOffset() is UTC minus local; flip it so east is positive.
    const offset = -at.getTimezoneOffset()
    return offset === 0 ? 0 : offset
  }
}

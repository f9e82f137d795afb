import type { TimeSource, UtcOffsetMinutes } from "@logsmith/clock"
import type { TimeZoneStyle } from "../../ports/time-zone"

export type WallClock = {
  year: number
  month: number
  day: number
  hour: number
  minute: number
  second: number
  millisecond: number
}

const MS_PER_MINUTE = 60_000

/** Calendar fields of `at` as seen at `offsetMinutes` from UTC. */
export function wallClock(at: Date, offsetMinutes: UtcOffsetMinutes): WallClock {
  const shifted = new Date(at.getTime() + offsetMinutes * MS_PER_MINUTE)

  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
    hour: shifted.getUTCHours(),
    minute: shifted.getUTCMinutes(),
    second: shifted.getUTCSeconds(),
    millisecond: shifted.getUTCMilliseconds(),
  }
}

export function offsetFor(at: Date, style: TimeZoneStyle, clock: TimeSource): UtcOffsetMinutes {
  return style === "utc" ? 0 : clock.utcOffsetMinutes(at)
}

export function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, "0")
}

/** `YYYY-MM-DD HH:MM:SS` */
export function formatDateTime(wall: WallClock): string {
  const date = `${pad(wall.year, 4)}-${pad(wall.month)}-${pad(wall.day)}`
  const time = `${pad(wall.hour)}:${pad(wall.minute)}:${pad(wall.second)}`

  return `${date} ${time}`
}

export function formatMillis(wall: WallClock): string {
  return pad(wall.millisecond, 3)
}

/** `±HH:MM`, or `Z` when the offset is zero. */
export function formatUtcOffset(offsetMinutes: UtcOffsetMinutes): string {
  if (offsetMinutes === 0) return "Z"

  const sign = offsetMinutes > 0 ? "+" : "-"
  const abs = Math.abs(offsetMinutes)

  return `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`
}

export const timeZoneStyles = ["local", "utc"] as const

export type TimeZoneStyle = (typeof timeZoneStyles)[number]

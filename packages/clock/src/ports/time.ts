/** Milliseconds since the Unix epoch, or a duration in milliseconds. */
export type Milliseconds = number

/**
 * Signed distance of local wall time from UTC, in minutes.
 *
 * East of Greenwich is positive: CEST is `120`, EDT is `-240`.
 */
export type UtcOffsetMinutes = number

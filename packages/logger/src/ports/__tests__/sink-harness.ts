import type { CanonicalLevel } from "../log-level"
import type { Sink } from "../sink"

export type SinkHarness = {
  name: string
  make: (opts: { level: CanonicalLevel }) => Promise<{
    sink: Sink

    /** Everything the sink delivered so far, one entry per rendered line. */
    read: () => Promise<string[]>
    cleanup?: () => Promise<void>
  }>
}

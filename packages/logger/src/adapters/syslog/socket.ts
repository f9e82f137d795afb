export const syslogTransports = ["udp", "tcp"] as const

export type SyslogTransport = (typeof syslogTransports)[number]

export type SyslogEndpoint = {
  /** Already resolved IP address. */
  address: string
  port: number
  transport: SyslogTransport
}

/**
 * A connected (TCP) or connectionless (UDP) channel to the collector.
 * Send failures after opening go to the `onError` callback given at open time.
 */
export interface SyslogSocket {
  send(frame: Buffer): void
  close(): Promise<void>
}

export type SyslogSocketFactory = (
  endpoint: SyslogEndpoint,
  onError: (err: unknown) => void,
) => Promise<SyslogSocket>

import type { SyslogSocketFactory } from "./socket"
import { openTcpSocket } from "./tcp-socket"
import { openUdpSocket } from "./udp-socket"

export const createSyslogSocket: SyslogSocketFactory = (endpoint, onError) =>
  endpoint.transport === "tcp" ? openTcpSocket(endpoint, onError) : openUdpSocket(endpoint, onError)

import dgram from "node:dgram"
import net from "node:net"
import type { SyslogEndpoint, SyslogSocket } from "./socket"

/**
 * Fire-and-forget datagrams; nothing is acknowledged. The socket does not
 * keep the process alive.
 */
export async function openUdpSocket(
  endpoint: SyslogEndpoint,
  onError: (err: unknown) => void,
): Promise<SyslogSocket> {
  const socket = dgram.createSocket(net.isIPv6(endpoint.address) ? "udp6" : "udp4")
  socket.on("error", onError)
  socket.unref()

  let open = true

  return {
    send(frame) {
      if (!open) return

      socket.send(frame, endpoint.port, endpoint.address, (err) => {
        if (err) onError(err)
      })
    },
    close() {
      if (!open) return Promise.resolve()
      open = false

      return new Promise((resolve) => socket.close(() => resolve()))
    },
  }
}

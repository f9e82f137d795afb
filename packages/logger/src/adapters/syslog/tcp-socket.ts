import net from "node:net"
import type { SyslogEndpoint, SyslogSocket } from "./socket"

/** Resolves once connected; rejects when the connection is refused. */
export function openTcpSocket(
  endpoint: SyslogEndpoint,
  onError: (err: unknown) => void,
): Promise<SyslogSocket> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ host: endpoint.address, port: endpoint.port })

    socket.once("error", reject)
    socket.once("connect", () => {
      socket.off("error", reject)
      socket.on("error", onError)

      resolve({
        send(frame) {
          if (socket.writable) socket.write(frame)
        },
        close() {
          if (socket.destroyed) return Promise.resolve()
          return new Promise((done) => socket.end(() => done()))
        },
      })
    })
  })
}

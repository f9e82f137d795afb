import { createTransport } from "nodemailer"
import type { SmtpClient } from "../../adapters/smtp/smtp-transport"

/**
 * A nodemailer client that renders messages into memory instead of opening a socket.
 */
export function createSmtpTestClient(): SmtpClient {
  return createTransport({
    streamTransport: true,
    newline: "windows",
    buffer: true,
  })
}

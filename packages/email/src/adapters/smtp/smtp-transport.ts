import { createTransport } from "nodemailer"
import type Mail from "nodemailer/lib/mailer"
import { formatAddress, toRecipientList } from "../../core/recipients"
import { validateMessage } from "../../core/validation/validate-message"
import type { MailMessage } from "../../ports/message"
import type { MailTransport, SendResult } from "../../ports/transport"

/**
 * The slice of a nodemailer Transporter this adapter relies on.
 */
export type SmtpClient = {
  sendMail(options: Mail.Options): Promise<SmtpSendInfo>
  close(): void
}

export type SmtpSendInfo = {
  messageId?: string
  accepted?: unknown
  rejected?: unknown
}

export type SmtpTransportDeps = {
  client: SmtpClient
}

export type SmtpConnectionOptions = {
  host: string
  port: number
  username?: string
  password?: string

  /**
   * Upgrade the plain connection with STARTTLS and refuse to continue without it.
   * @default true
   */
  requireTls?: boolean

  /** Socket and greeting timeout in milliseconds. */
  timeoutMs?: number
}

export class SmtpTransport implements MailTransport {
  constructor(private readonly deps: SmtpTransportDeps) {}

  async send(message: MailMessage): Promise<SendResult> {
    validateMessage(message)

    const response = await this.deps.client.sendMail(this.toMailOptions(message))

    if (!response.messageId) {
      throw new Error("SMTP did not return a message ID")
    }

    const accepted = this.toStringArray(response.accepted)
    const rejected = this.toStringArray(response.rejected)

    return {
      provider: "smtp",
      messageId: response.messageId,
      ...(accepted && { accepted }),
      ...(rejected && { rejected }),
    }
  }

  close(): void {
    this.deps.client.close()
  }

  private toMailOptions(message: MailMessage): Mail.Options {
    return {
      from: formatAddress(message.from),
      to: toRecipientList(message.to).map((r) => formatAddress(r)),
      subject: message.subject,
      text: message.text,
      ...(message.headers && { headers: message.headers }),
    }
  }

  private toStringArray(addresses: unknown): string[] | undefined {
    if (!Array.isArray(addresses)) return undefined

    return addresses
      .map((a: unknown) => {
        if (typeof a === "string") return a
        if (typeof a === "object" && a && "address" in a && typeof a.address === "string") {
          return a.address
        }

        return null
      })
      .filter((a): a is string => a !== null)
  }
}

/**
 * Build a transport that opens one SMTP session per message:
 * connect, STARTTLS, authenticate, send, quit.
 */
export function createSmtpTransport(options: SmtpConnectionOptions): SmtpTransport {
  const client = createTransport({
    host: options.host,
    port: options.port,
    secure: false,
    requireTLS: options.requireTls ?? true,
    ...(options.username !== undefined &&
      options.username !== "" && {
        auth: { user: options.username, pass: options.password ?? "" },
      }),
    ...(options.timeoutMs !== undefined && {
      connectionTimeout: options.timeoutMs,
      greetingTimeout: options.timeoutMs,
      socketTimeout: options.timeoutMs,
    }),
  })

  return new SmtpTransport({ client })
}

import type { MailMessage } from "./message"

export type SendResult = {
  provider: string
  messageId: string

  accepted?: string[]
  rejected?: string[]
}

export interface MailTransport {
  /**
   * Deliver one message. Rejects when the server refuses the session or the message;
   * no retry is attempted.
   */
  send(message: MailMessage): Promise<SendResult>

  /** Release pooled connections, if the adapter keeps any. */
  close(): void
}

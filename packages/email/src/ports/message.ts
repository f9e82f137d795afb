import type { MailRecipient, MailRecipients } from "./address"

/**
 * A plain-text message. Log digests carry no HTML or attachments.
 */
export type MailMessage = {
  from: MailRecipient
  to: MailRecipients
  subject: string
  text: string
  headers?: Record<string, string>
}

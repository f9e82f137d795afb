import type { MailRecipient, MailRecipients } from "../ports/address"

/** A single recipient becomes a one-element list. */
export function toRecipientList(recipients: MailRecipients): MailRecipient[] {
  return Array.isArray(recipients) ? [...recipients] : [recipients]
}

export function formatAddress(recipient: MailRecipient): string {
  const address = typeof recipient === "string" ? { email: recipient } : recipient
  return address.name ? `${address.name} <${address.email}>` : address.email
}

import type { MailRecipient } from "../../ports/address"
import type { MailMessage } from "../../ports/message"
import { toRecipientList } from "../recipients"

export function validateMessage(message: MailMessage) {
  if (!addressOf(message.from)) {
    throw new Error("MailMessage requires a sender address")
  }

  const recipients = toRecipientList(message.to)

  if (recipients.length === 0) {
    throw new Error("MailMessage requires at least one recipient")
  }

  if (recipients.some((r) => !addressOf(r))) {
    throw new Error("MailMessage recipients must not be empty")
  }

  if (!message.text) {
    throw new Error("MailMessage requires a text body")
  }
}

function addressOf(recipient: MailRecipient): string {
  return (typeof recipient === "string" ? recipient : recipient.email).trim()
}

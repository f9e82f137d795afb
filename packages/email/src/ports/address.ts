export type MailAddress = {
  email: string
  name?: string
}

export type MailRecipient = string | MailAddress
export type MailRecipients = MailRecipient | MailRecipient[]

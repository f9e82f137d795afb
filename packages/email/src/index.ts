export {
  createSmtpTransport,
  type SmtpClient,
  type SmtpConnectionOptions,
  type SmtpSendInfo,
  SmtpTransport,
  type SmtpTransportDeps,
} from "./adapters/smtp/smtp-transport"
export { formatAddress, toRecipientList } from "./core/recipients"
export { validateMessage } from "./core/validation/validate-message"
export type { MailAddress, MailRecipient, MailRecipients } from "./ports/address"
export type { MailMessage } from "./ports/message"
export type { MailTransport, SendResult } from "./ports/transport"

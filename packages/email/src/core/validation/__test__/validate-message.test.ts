import { describe, expect, it } from "vitest"
import type { MailMessage } from "../../../ports/message"
import { validateMessage } from "../validate-message"

function validMessage(overrides: Partial<MailMessage> = {}): MailMessage {
  return {
    from: "logs@example.com",
    to: "ops@example.com",
    subject: "",
    text: "Hello",
    ...overrides,
  }
}

describe("validateMessage", () => {
  it("passes with a single recipient and an empty subject", () => {
    expect(() => validateMessage(validMessage())).not.toThrow()
  })

  it("passes with named addresses", () => {
    expect(() =>
      validateMessage(
        validMessage({
          from: { email: "logs@example.com", name: "Logs" },
          to: [{ email: "ops@example.com" }, "dev@example.com"],
        }),
      ),
    ).not.toThrow()
  })

  it("throws without a sender", () => {
    expect(() => validateMessage(validMessage({ from: "" }))).toThrow(/sender/)
    expect(() => validateMessage(validMessage({ from: { email: " " } }))).toThrow(/sender/)
  })

  it("throws without recipients", () => {
    expect(() => validateMessage(validMessage({ to: [] }))).toThrow(/at least one recipient/)
  })

  it("throws when one recipient is blank", () => {
    expect(() =>
      validateMessage(validMessage({ to: ["ops@example.com", ""] })),
    ).toThrow(/must not be empty/)
  })

  it("throws without a body", () => {
    expect(() => validateMessage(validMessage({ text: "" }))).toThrow(/text body/)
  })
})

/**
 * Unit Tests: SMTP delivery
 */

import { describe, it, expect } from "vitest";
import nodemailer from "nodemailer";
import type { Transport } from "nodemailer";
import type Mail from "nodemailer/lib/mailer";
import { SmtpMailer } from "../../src/mail/mailer";

const CONFIG = { host: "smtp.example.com", port: 465, address: "bot@example.com", password: "test-secret" };

function captureTransport(sent: Mail.Options[], failWith?: Error): Transport<{ messageId: string }> {
  return {
    name: "capture",
    version: "1.0.0",
    send(mail, callback) {
      if (failWith) {
        callback(failWith, { messageId: "" });
        return;
      }
      sent.push(mail.data);
      callback(null, { messageId: "<test@example.com>" });
    },
  };
}

describe("SmtpMailer", () => {
  it("sends one message with the given destination, subject and body", async () => {
    const sent: Mail.Options[] = [];
    const mailer = new SmtpMailer(CONFIG, nodemailer.createTransport(captureTransport(sent)));

    const ok = await mailer.send("user@example.com", "Extracted Persian Text", "سلام");

    expect(ok).toBe(true);
    expect(sent).toHaveLength(1);
    expect(sent[0]).toMatchObject({
      from: "bot@example.com",
      to: "user@example.com",
      subject: "Extracted Persian Text",
      text: "سلام",
    });
  });

  it("reports a transport failure as false", async () => {
    const sent: Mail.Options[] = [];
    const mailer = new SmtpMailer(CONFIG, nodemailer.createTransport(captureTransport(sent, new Error("Connection refused"))));

    expect(await mailer.send("user@example.com", "Extracted Persian Text", "سلام")).toBe(false);
    expect(sent).toHaveLength(0);
  });

  it("reports an authentication failure as false", async () => {
    const authError = Object.assign(new Error("Invalid login"), { code: "EAUTH" });
    const mailer = new SmtpMailer(CONFIG, nodemailer.createTransport(captureTransport([], authError)));

    expect(await mailer.send("user@example.com", "Extracted Persian Text", "body")).toBe(false);
  });
});

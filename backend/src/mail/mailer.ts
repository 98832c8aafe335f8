// Delivery Boundary: one synchronous SMTP send per call, no retry.

import nodemailer from "nodemailer";
import type { Transporter } from "nodemailer";
import { mailLog } from "../logger";

export interface DeliveryBoundary {
  /** Resolves false on any failure; never throws. */
  send(to: string, subject: string, body: string): Promise<boolean>;
}

export interface SmtpConfig {
  host: string;
  port: number;
  /** Sender address and SMTP login. */
  address: string;
  password: string;
}

export class SmtpMailer implements DeliveryBoundary {
  private readonly transporter: Transporter;

  constructor(
    private readonly config: SmtpConfig,
    transporter?: Transporter,
  ) {
    this.transporter =
      transporter ??
      nodemailer.createTransport({
        host: config.host,
        port: config.port,
        secure: true,
        auth: { user: config.address, pass: config.password },
      });
  }

  async send(to: string, subject: string, body: string): Promise<boolean> {
    try {
      await this.transporter.sendMail({
        from: this.config.address,
        to,
        subject,
        text: body,
      });
      mailLog.info({ to, bytes: Buffer.byteLength(body) }, "Email sent");
      return true;
    } catch (err) {
      if (isAuthError(err)) {
        mailLog.error({ to }, "SMTP authentication failed, check EMAIL_ADDRESS and EMAIL_PASSWORD");
      } else {
        mailLog.error({ to, err }, "Failed to send email");
      }
      return false;
    }
  }
}

function isAuthError(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "EAUTH";
}

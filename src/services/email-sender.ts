import nodemailer from "nodemailer";
import type { SmtpSettings } from "../config.js";
import type { NotificationChannel } from "./notifier.js";

export interface MailTransport {
  sendMail(mail: { from: string; to: string; subject: string; text: string }): Promise<unknown>;
}

export function createMailTransport(smtp: SmtpSettings): MailTransport {
  return nodemailer.createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: smtp.port === 465,
    auth: {
      user: smtp.user,
      pass: smtp.pass,
    },
  });
}

/** The subject is the first line of the message, e.g. "ALERT: SAP.DE". */
export class EmailChannel implements NotificationChannel {
  readonly name = "email";

  constructor(
    private readonly smtp: SmtpSettings,
    private readonly transport: MailTransport = createMailTransport(smtp),
  ) {}

  async send(text: string): Promise<void> {
    const subject = text.split("\n", 1)[0] || "Price dip monitor";
    await this.transport.sendMail({
      from: this.smtp.user,
      to: this.smtp.to,
      subject,
      text,
    });
  }
}

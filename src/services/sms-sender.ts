import twilio from "twilio";
import type { TwilioSettings } from "../config.js";
import type { NotificationChannel } from "./notifier.js";

/** Carrier limit for a concatenated SMS. */
export const SMS_MAX_LENGTH = 1600;

export interface SmsClient {
  messages: {
    create(message: { body: string; from: string; to: string }): Promise<unknown>;
  };
}

export class SmsChannel implements NotificationChannel {
  readonly name = "sms";

  constructor(
    private readonly settings: TwilioSettings,
    private readonly client: SmsClient = twilio(settings.accountSid, settings.authToken),
  ) {}

  async send(text: string): Promise<void> {
    const body = text.length > SMS_MAX_LENGTH ? `${text.slice(0, SMS_MAX_LENGTH - 3)}...` : text;
    await this.client.messages.create({
      body,
      from: this.settings.fromNumber,
      to: this.settings.to,
    });
  }
}

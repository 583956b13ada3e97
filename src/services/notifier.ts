import type { Config } from "../config.js";
import { errorMessage, TransientError } from "../errors.js";
import { createLogger } from "../logger.js";
import { EmailChannel } from "./email-sender.js";
import { SmsChannel } from "./sms-sender.js";
import { TelegramChannel } from "./telegram.js";
import type { TelegramApi } from "./telegram.js";

const log = createLogger("notifier");

export interface Notifier {
  send(text: string): Promise<void>;
}

/** One delivery route (Telegram, e-mail, SMS). */
export interface NotificationChannel {
  readonly name: string;
  send(text: string): Promise<void>;
}

/**
 * Delivers every message to all channels. Succeeds when at least one channel
 * accepted it, so a dead SMTP server does not block Telegram alerts.
 */
export class FanOutNotifier implements Notifier {
  constructor(private readonly channels: NotificationChannel[]) {
    if (channels.length === 0) {
      log.warn("No notification channels configured; alerts will only be logged");
    }
  }

  get channelNames(): string[] {
    return this.channels.map((c) => c.name);
  }

  async send(text: string): Promise<void> {
    if (this.channels.length === 0) {
      log.info(`Alert (no channel):\n${text}`);
      return;
    }

    const failures: string[] = [];
    for (const channel of this.channels) {
      try {
        await channel.send(text);
        log.debug(`${channel.name}: delivered`);
      } catch (e) {
        failures.push(`${channel.name}: ${errorMessage(e)}`);
        log.error(`${channel.name} failed: ${errorMessage(e)}`);
      }
    }

    if (failures.length === this.channels.length) {
      throw new TransientError(`All notification channels failed (${failures.join("; ")})`);
    }
  }
}

/** Every channel whose settings are complete. Telegram needs the bot's API client. */
export function buildChannels(config: Config, telegramApi?: TelegramApi): NotificationChannel[] {
  const channels: NotificationChannel[] = [];
  if (config.telegram && telegramApi) channels.push(new TelegramChannel(telegramApi, config.telegram.chatId));
  if (config.smtp) channels.push(new EmailChannel(config.smtp));
  if (config.twilio) channels.push(new SmsChannel(config.twilio));
  return channels;
}

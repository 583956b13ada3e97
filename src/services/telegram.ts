import { Bot } from "grammy";
import type { AsyncChannel } from "../channel.js";
import type { TelegramSettings } from "../config.js";
import { errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";
import type { InboundCommand } from "./commands.js";
import type { NotificationChannel } from "./notifier.js";

const log = createLogger("telegram");

export const TELEGRAM_MAX_LENGTH = 4096;

export interface TelegramApi {
  sendMessage(chatId: string | number, text: string): Promise<unknown>;
}

export class TelegramChannel implements NotificationChannel {
  readonly name = "telegram";

  constructor(
    private readonly api: TelegramApi,
    private readonly chatId: string,
  ) {}

  async send(text: string): Promise<void> {
    const body = text.length > TELEGRAM_MAX_LENGTH ? `${text.slice(0, TELEGRAM_MAX_LENGTH - 3)}...` : text;
    await this.api.sendMessage(this.chatId, body);
  }
}

/** Only the configured chat may issue commands; everything else is dropped silently. */
export function isAuthorizedChat(chatId: number | undefined, allowedChatId: string): boolean {
  return chatId !== undefined && String(chatId) === allowedChatId.trim();
}

export function createTelegramBot(settings: TelegramSettings): Bot {
  return new Bot(settings.botToken);
}

/**
 * Long-polls Telegram and forwards text messages from the configured chat into
 * `commands`. Stopping closes the channel, which ends the command loop.
 */
export class TelegramListener {
  private running = false;

  constructor(
    private readonly bot: Bot,
    private readonly chatId: string,
    private readonly commands: AsyncChannel<InboundCommand>,
  ) {
    bot.use(async (ctx, next) => {
      if (!isAuthorizedChat(ctx.chat?.id, this.chatId)) {
        log.warn(`Ignoring message from unauthorized chat ${ctx.chat?.id ?? "unknown"}`);
        return;
      }
      await next();
    });

    bot.on("message:text", (ctx) => {
      this.commands.send({
        text: ctx.message.text,
        reply: async (text) => {
          await ctx.reply(text);
        },
      });
    });

    bot.catch((e) => {
      log.error(`Update ${e.ctx.update.update_id} failed: ${errorMessage(e.error)}`);
    });
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    void this.bot
      .start({ onStart: (me) => log.info(`Listening for commands as @${me.username}`) })
      .catch((e: unknown) => {
        this.running = false;
        log.error(`Polling stopped: ${errorMessage(e)}`);
      });
  }

  async stop(): Promise<void> {
    this.commands.close();
    if (!this.running) return;
    this.running = false;
    await this.bot.stop();
  }
}

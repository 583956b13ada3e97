import "dotenv/config";
import cron from "node-cron";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { LogLevel } from "./logger.js";
import type { ClockTime, MarketSession } from "./types.js";
import { isValidTimeZone, parseClockTime } from "./services/session.js";

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const clockTime = z.string().transform((value, ctx): ClockTime => {
  const parsed = parseClockTime(value);
  if (!parsed) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected HH:MM, got "${value}"` });
    return z.NEVER;
  }
  return parsed;
});

const cronExpression = z.string().refine((expr) => cron.validate(expr), (expr) => ({
  message: `invalid cron expression "${expr}"`,
}));

const EnvSchema = z.object({
  DATABASE_URL: z.string({ required_error: "DATABASE_URL is required" }).min(1, "DATABASE_URL is required"),
  CHECK_INTERVAL_CRON: cronExpression.default("*/5 * * * *"),
  SYNC_INTERVAL_CRON: cronExpression.default("0 * * * *"),
  MARKET_TIMEZONE: z
    .string()
    .default("Europe/Berlin")
    .refine(isValidTimeZone, (tz) => ({ message: `unknown timezone "${tz}"` })),
  MARKET_OPEN: clockTime.default("09:00"),
  MARKET_CLOSE: clockTime.default("17:30"),
  RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  RETRY_BACKOFF_MS: z.coerce.number().int().min(0).default(5000),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  HISTORY_LOOKBACK_DAYS: z.coerce.number().int().min(1).default(150),
  DB_CONNECT_ATTEMPTS: z.coerce.number().int().min(1).default(5),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  PRICE_DIGEST: z
    .enum(["true", "false"], { errorMap: () => ({ message: 'expected "true" or "false"' }) })
    .default("true")
    .transform((v) => v === "true"),
  TELEGRAM_BOT_TOKEN: optionalString,
  TELEGRAM_CHAT_ID: optionalString,
  SMTP_HOST: optionalString,
  SMTP_PORT: z.coerce.number().int().positive().default(587),
  SMTP_USER: optionalString,
  SMTP_PASS: optionalString,
  NOTIFY_EMAIL: optionalString,
  TWILIO_ACCOUNT_SID: optionalString,
  TWILIO_AUTH_TOKEN: optionalString,
  TWILIO_FROM_NUMBER: optionalString,
  NOTIFY_SMS: optionalString,
});

export interface TelegramSettings {
  botToken: string;
  chatId: string;
}

export interface SmtpSettings {
  host: string;
  port: number;
  user: string;
  pass: string;
  to: string;
}

export interface TwilioSettings {
  accountSid: string;
  authToken: string;
  fromNumber: string;
  to: string;
}

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
  timeoutMs: number;
}

export interface Config {
  databaseUrl: string;
  checkIntervalCron: string;
  syncIntervalCron: string;
  market: MarketSession;
  retry: RetryPolicy;
  historyLookbackDays: number;
  dbConnectAttempts: number;
  port: number;
  logLevel: LogLevel;
  priceDigest: boolean;
  telegram?: TelegramSettings;
  smtp?: SmtpSettings;
  twilio?: TwilioSettings;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Invalid configuration:\n  ${issues.join("\n  ")}`);
  }
  const e = parsed.data;
  if (e.MARKET_CLOSE.hour * 60 + e.MARKET_CLOSE.minute <= e.MARKET_OPEN.hour * 60 + e.MARKET_OPEN.minute) {
    throw new ConfigError("Invalid configuration:\n  MARKET_CLOSE: must be later than MARKET_OPEN");
  }

  return {
    databaseUrl: e.DATABASE_URL,
    checkIntervalCron: e.CHECK_INTERVAL_CRON,
    syncIntervalCron: e.SYNC_INTERVAL_CRON,
    market: { timeZone: e.MARKET_TIMEZONE, open: e.MARKET_OPEN, close: e.MARKET_CLOSE },
    retry: { attempts: e.RETRY_ATTEMPTS, baseDelayMs: e.RETRY_BACKOFF_MS, timeoutMs: e.REQUEST_TIMEOUT_MS },
    historyLookbackDays: e.HISTORY_LOOKBACK_DAYS,
    dbConnectAttempts: e.DB_CONNECT_ATTEMPTS,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    priceDigest: e.PRICE_DIGEST,
    telegram:
      e.TELEGRAM_BOT_TOKEN && e.TELEGRAM_CHAT_ID
        ? { botToken: e.TELEGRAM_BOT_TOKEN, chatId: e.TELEGRAM_CHAT_ID }
        : undefined,
    smtp:
      e.SMTP_HOST && e.SMTP_USER && e.SMTP_PASS && e.NOTIFY_EMAIL
        ? { host: e.SMTP_HOST, port: e.SMTP_PORT, user: e.SMTP_USER, pass: e.SMTP_PASS, to: e.NOTIFY_EMAIL }
        : undefined,
    twilio:
      e.TWILIO_ACCOUNT_SID && e.TWILIO_AUTH_TOKEN && e.TWILIO_FROM_NUMBER && e.NOTIFY_SMS
        ? {
            accountSid: e.TWILIO_ACCOUNT_SID,
            authToken: e.TWILIO_AUTH_TOKEN,
            fromNumber: e.TWILIO_FROM_NUMBER,
            to: e.NOTIFY_SMS,
          }
        : undefined,
  };
}

export function isTelegramConfigured(config: Config): boolean {
  return config.telegram !== undefined;
}

export function isEmailConfigured(config: Config): boolean {
  return config.smtp !== undefined;
}

export function isSmsConfigured(config: Config): boolean {
  return config.twilio !== undefined;
}

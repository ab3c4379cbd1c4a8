/**
 * Configuration
 *
 * Tuning constants live here as plain values; deployment settings are read
 * from the environment once at start-up and validated.
 */

import { z } from "zod";

// Conversation context
export const DEFAULT_MAX_HISTORY = 5; // Turn pairs kept per user

// Reply delivery
export const MAX_REPLY_LENGTH = 4096; // Telegram message limit
export const TRUNCATION_MARKER = "\n\n[…]";
export const EMPTY_REPLY_PLACEHOLDER = "[No response - the model returned no text]";

// Reports
export const TOP_TERMS = 3;
export const MIN_TERM_LENGTH = 5; // Shorter tokens are treated as stop words
export const HIGHLIGHT_MAX_CHARS = 100;
export const HOURLY_HIGHLIGHTS = 2;
export const DAILY_HIGHLIGHTS = 10;

// Scheduling
export const DEFAULT_DAILY_CUTOFF_HOUR = 23;
export const DEFAULT_SCHEDULER_INTERVAL_SECONDS = 30;

export const DEFAULT_SYSTEM_PROMPT = `You are a friendly assistant answering people in a Telegram chat.
Reply in the language the user writes in. Be direct and concise.`;

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

const envSchema = z.object({
  TELEGRAM_BOT_TOKEN: z.string().min(1),
  TELEGRAM_WEBHOOK_SECRET: z.string().min(1),
  GEMINI_API_KEY: z.string().min(1),
  GEMINI_MODEL: z.string().min(1).default("gemini-2.5-flash"),
  ADMIN_CHAT_ID: z.string().min(1).optional(),
  PORT: z.coerce.number().int().positive().default(8080),
  DATA_DIR: z.string().min(1).default("./data"),
  STORAGE: z.enum(["file", "memory"]).default("file"),
  TIME_ZONE: z
    .string()
    .default(Intl.DateTimeFormat().resolvedOptions().timeZone)
    .refine(isValidTimeZone, { message: "Unknown IANA time zone" }),
  MAX_HISTORY: z.coerce.number().int().positive().default(DEFAULT_MAX_HISTORY),
  DAILY_CUTOFF_HOUR: z.coerce.number().int().min(0).max(23).default(DEFAULT_DAILY_CUTOFF_HOUR),
  SCHEDULER_INTERVAL_SECONDS: z.coerce
    .number()
    .int()
    .min(1)
    .max(30)
    .default(DEFAULT_SCHEDULER_INTERVAL_SECONDS),
  MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(1000),
  PERSIST_CONTEXT: booleanFlag.default("false"),
  SYSTEM_PROMPT: z.string().min(1).default(DEFAULT_SYSTEM_PROMPT),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export interface RelayConfig {
  telegram: {
    botToken: string;
    webhookSecret: string;
    adminChatId?: string;
  };
  model: {
    apiKey: string;
    name: string;
    maxOutputTokens: number;
    systemPrompt: string;
  };
  port: number;
  dataDir: string;
  storage: "file" | "memory";
  timeZone: string;
  maxHistory: number;
  dailyCutoffHour: number;
  schedulerIntervalMs: number;
  persistContext: boolean;
  logLevel: "debug" | "info" | "warn" | "error";
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

/**
 * Parse and validate configuration from environment variables
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): RelayConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  const parsed = result.data;
  return {
    telegram: {
      botToken: parsed.TELEGRAM_BOT_TOKEN,
      webhookSecret: parsed.TELEGRAM_WEBHOOK_SECRET,
      adminChatId: parsed.ADMIN_CHAT_ID,
    },
    model: {
      apiKey: parsed.GEMINI_API_KEY,
      name: parsed.GEMINI_MODEL,
      maxOutputTokens: parsed.MAX_OUTPUT_TOKENS,
      systemPrompt: parsed.SYSTEM_PROMPT,
    },
    port: parsed.PORT,
    dataDir: parsed.DATA_DIR,
    storage: parsed.STORAGE,
    timeZone: parsed.TIME_ZONE,
    maxHistory: parsed.MAX_HISTORY,
    dailyCutoffHour: parsed.DAILY_CUTOFF_HOUR,
    schedulerIntervalMs: parsed.SCHEDULER_INTERVAL_SECONDS * 1000,
    persistContext: parsed.PERSIST_CONTEXT,
    logLevel: parsed.LOG_LEVEL,
  };
}

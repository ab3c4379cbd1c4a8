// Telegram Bot API integration

import { createLogger } from "./relay/logger";

const TELEGRAM_API = "https://api.telegram.org/bot";

const log = createLogger("TELEGRAM");

export interface TelegramConfig {
  botToken: string;
  webhookSecret: string;
  adminChatId?: string;
}

// Telegram message types (subset we care about)
export interface TelegramUpdate {
  update_id: number;
  message?: TelegramMessage;
}

export interface TelegramMessage {
  message_id: number;
  from?: {
    id: number;
    username?: string;
    first_name: string;
  };
  chat: {
    id: number;
    type: "private" | "group" | "supergroup" | "channel";
  };
  date: number;
  text?: string;
}

// Send a message to a chat
export async function sendMessage(
  config: TelegramConfig,
  chatId: string | number,
  text: string,
  options?: {
    // null sends plain text; Markdown when omitted
    parseMode?: "Markdown" | null;
    replyToMessageId?: number;
  },
): Promise<boolean> {
  const doSend = async (parseMode?: string | null) => {
    const body: Record<string, unknown> = {
      chat_id: chatId,
      text,
      reply_to_message_id: options?.replyToMessageId,
    };
    if (parseMode) {
      body.parse_mode = parseMode;
    }

    return fetch(`${TELEGRAM_API}${config.botToken}/sendMessage`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
  };

  try {
    // Try with Markdown first
    let response = await doSend(options?.parseMode === undefined ? "Markdown" : options.parseMode);

    // If Markdown parsing fails, retry as plain text
    if (!response.ok) {
      const error = await response.text();
      if (error.includes("can't parse entities")) {
        log.warn("Markdown parse failed, retrying as plain text");
        response = await doSend(null);
      } else {
        log.error(`Failed to send message: ${error}`);
        return false;
      }
    }

    if (!response.ok) {
      const error = await response.text();
      log.error(`Failed to send message: ${error}`);
      return false;
    }

    return true;
  } catch (error) {
    log.error(`Error sending message: ${error}`);
    return false;
  }
}

// Send a message to the configured admin chat
export async function notifyAdmin(config: TelegramConfig, text: string): Promise<boolean> {
  if (!config.adminChatId) {
    log.warn("Admin chat ID not configured");
    return false;
  }

  return sendMessage(config, config.adminChatId, text, { parseMode: null });
}

// Verify webhook request is from Telegram (fail closed)
export function verifyWebhook(request: Request, config: TelegramConfig): boolean {
  if (!config.webhookSecret) {
    log.error("Webhook secret not configured - rejecting request");
    return false;
  }

  const secret = request.headers.get("X-Telegram-Bot-Api-Secret-Token");
  return secret === config.webhookSecret;
}

// Send typing indicator
export async function sendTypingIndicator(
  config: TelegramConfig,
  chatId: string | number,
): Promise<boolean> {
  try {
    const response = await fetch(`${TELEGRAM_API}${config.botToken}/sendChatAction`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        chat_id: chatId,
        action: "typing",
      }),
    });
    return response.ok;
  } catch (error) {
    log.debug(`Typing indicator failed: ${error}`);
    return false;
  }
}

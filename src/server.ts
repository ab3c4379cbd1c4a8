import { Hono } from "hono";
import {
  verifyWebhook,
  sendMessage,
  sendTypingIndicator,
  type TelegramConfig,
  type TelegramUpdate,
} from "./telegram";
import type { Relay } from "./relay";
import { parseCommand } from "./relay/commands";
import { createLogger } from "./relay/logger";

const log = createLogger("SERVER");

export function createApp(relay: Relay, telegram: TelegramConfig): Hono {
  const app = new Hono();

  // =============================================================================
  // Security Headers
  // =============================================================================

  app.use("*", async (c, next) => {
    await next();
    c.header("X-Content-Type-Options", "nosniff");
    c.header("X-Frame-Options", "DENY");
    c.header("Referrer-Policy", "strict-origin-when-cross-origin");
  });

  // =============================================================================
  // Keep-alive
  // =============================================================================

  app.get("/", (c) => c.text("Bot is alive!"));

  app.get("/ping", (c) => c.text("pong"));

  app.get("/health", (c) => {
    return c.json({
      name: "chat-relay",
      status: "ok",
      version: "0.1.0",
      activeContexts: relay.contextStore.size,
      scheduler: relay.scheduler.getState(),
    });
  });

  // =============================================================================
  // Telegram Webhook
  // =============================================================================

  app.post("/telegram", async (c) => {
    // Verify request is from Telegram
    if (!verifyWebhook(c.req.raw, telegram)) {
      log.warn("Webhook verification failed");
      return c.json({ ok: false }, 401);
    }

    try {
      const update = await c.req.json<TelegramUpdate>();

      // Only process text messages from users
      const message = update.message;
      if (!message?.text || !message.from) {
        log.debug("No text message to process");
        return c.json({ ok: true });
      }

      const { text, from } = message;
      const userId = String(from.id);
      const userName = from.first_name || from.username || userId;
      const chatId = message.chat.id;

      log.info(`Message from ${from.username ?? userId}: ${text.slice(0, 50)}`);

      const command = parseCommand(text);
      let reply: string;
      if (command) {
        reply = await relay.runCommand(command, userId);
      } else {
        await sendTypingIndicator(telegram, chatId);
        const result = await relay.chat(userId, userName, text);
        reply = result.reply;
      }

      await sendMessage(telegram, chatId, reply, {
        replyToMessageId: message.message_id,
      });

      return c.json({ ok: true });
    } catch (error) {
      log.error(`Error processing update: ${error}`);
      return c.json({ ok: true }); // Always return 200 to Telegram
    }
  });

  return app;
}

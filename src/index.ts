/**
 * Chat relay - entry point
 *
 * - /telegram - Webhook for Telegram messages
 * - /, /ping, /health - Keep-alive endpoints
 * - Background scheduler writing hourly and daily reports
 */

import { serve } from "@hono/node-server";
import { loadConfig, ConfigError } from "./relay/config";
import { createLogger } from "./relay/logger";
import { Relay } from "./relay";
import { createApp } from "./server";

const log = createLogger("MAIN");

async function main(): Promise<void> {
  const config = loadConfig();
  const relay = new Relay(config);
  await relay.start();

  const app = createApp(relay, config.telegram);
  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    log.info(`Listening on port ${info.port}`);
  });

  const shutdown = (signal: string) => {
    log.info(`${signal} received, shutting down`);
    relay.stop();
    server.close(() => process.exit(0));
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    log.error(error.message);
  } else {
    log.error("Fatal error during start-up", error);
  }
  process.exit(1);
});

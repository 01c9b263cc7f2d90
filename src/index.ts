import { serve } from "@hono/node-server";
import { createApp } from "./app.js";
import { env } from "./config/env.js";
import { TwitterContentSource } from "./services/content-source.js";
import { ConversationService } from "./services/conversation.js";
import { SubscriptionService } from "./services/subscription-service.js";
import { TelegramBotClient } from "./services/telegram-client.js";
import { errorMessage, logger } from "./utils/logger.js";

for (const name of ["TELEGRAM_BOT_TOKEN", "RAPIDAPI_KEY", "WEBHOOK_URL"] as const) {
  if (!env[name]) {
    logger.error("config_missing", { name });
  }
}

const telegram = new TelegramBotClient();
const subscriptionService = new SubscriptionService({
  contentSource: new TwitterContentSource(),
  sink: telegram,
});
const conversation = new ConversationService({ subscriptions: subscriptionService, sink: telegram });

const app = createApp({ subscriptionService, conversation });

const server = serve(
  {
    fetch: app.fetch,
    port: env.PORT,
  },
  () => {
    logger.info("server_started", {
      port: env.PORT,
      env: env.NODE_ENV,
      pollIntervalMs: env.POLL_INTERVAL_MS,
    });
    if (env.WEBHOOK_URL) {
      const webhookUrl = `${env.WEBHOOK_URL.replace(/\/+$/, "")}/webhook`;
      telegram.setWebhook(webhookUrl).catch((error: unknown) => {
        logger.error("webhook_register_failed", { url: webhookUrl, error: errorMessage(error) });
      });
    }
  },
);

server.on("error", (error) => {
  logger.error("server_start_failed", {
    port: env.PORT,
    env: env.NODE_ENV,
    error: errorMessage(error),
  });
});

let shuttingDown = false;

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info("shutdown_requested", { signal });
  await subscriptionService.shutdown();
  server.close();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.error("shutdown_failed", { error: errorMessage(error) });
      process.exitCode = 1;
    });
  });
}

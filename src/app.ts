import { Hono } from "hono";
import { cors } from "hono/cors";
import { env } from "./config/env.js";
import { formatErrorResponse } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { createSubscriptionRouter } from "./routes/subscriptions.js";
import { createWebhookRouter } from "./routes/webhook.js";
import type { ConversationService } from "./services/conversation.js";
import type { SubscriptionService } from "./services/subscription-service.js";
import { logger } from "./utils/logger.js";

interface CreateAppOptions {
  subscriptionService: SubscriptionService;
  conversation: ConversationService;
  nowFn?: () => number;
}

export function createApp(options: CreateAppOptions): Hono {
  const app = new Hono();
  const nowFn = options.nowFn ?? (() => Date.now());
  const bootedAt = nowFn();

  app.use("*", requestIdMiddleware);
  app.use("*", async (c, next) => {
    const start = Date.now();
    await next();
    const requestId = c.res.headers.get("x-request-id") ?? c.req.header("x-request-id");
    logger.info("request", {
      requestId,
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
    });
  });
  app.use(
    "/api/*",
    cors({
      origin: env.CORS_ORIGIN,
      allowMethods: ["GET", "POST", "DELETE", "OPTIONS"],
      allowHeaders: ["Content-Type", "X-Request-Id"],
    }),
  );

  app.get("/healthz", (c) => {
    return c.json({
      code: 200,
      message: "ok",
      data: {
        status: "ok",
        subscriptions: options.subscriptionService.count(),
        uptimeSeconds: Math.floor((nowFn() - bootedAt) / 1000),
      },
    });
  });

  app.route("/webhook", createWebhookRouter(options.conversation));
  app.route("/api/v1/subscriptions", createSubscriptionRouter(options.subscriptionService));

  app.notFound((c) => {
    return c.json(
      {
        code: 404,
        message: "Not Found",
      },
      404,
    );
  });

  app.onError((error, c) => formatErrorResponse(error, c));

  return app;
}

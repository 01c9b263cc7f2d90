import { Hono } from "hono";
import { z } from "zod";
import { AppError } from "../middleware/error-handler.js";
import type { SubscriptionService } from "../services/subscription-service.js";

const createSubscriptionSchema = z.object({
  endpoint: z.union([z.string().trim().min(1), z.number().int()]).transform(String),
  source: z.string().trim().min(1),
  keywords: z.array(z.string()).default([]),
});

export function createSubscriptionRouter(service: SubscriptionService): Hono {
  const app = new Hono();

  app.get("/", (c) => {
    const endpoint = c.req.query("endpoint")?.trim() || undefined;
    const items = service.list(endpoint);
    return c.json({ code: 200, message: "ok", data: { total: items.length, items } }, 200);
  });

  app.post("/", async (c) => {
    let raw: unknown;
    try {
      raw = await c.req.json();
    } catch {
      throw new AppError("Request body must be JSON", 400);
    }

    const body = createSubscriptionSchema.parse(raw);
    const result = service.start(body);

    switch (result.status) {
      case "started":
        return c.json({ code: 201, message: "started", data: result.subscription }, 201);
      case "conflict":
        throw new AppError(`Already monitoring ${body.source} for ${body.endpoint}`, 409);
      case "limit_reached":
        throw new AppError(`Endpoint already has ${result.limit} active subscriptions`, 429);
      case "invalid":
        throw new AppError(result.message, 400);
    }
  });

  app.delete("/:endpoint/:source", (c) => {
    const result = service.stop({ endpoint: c.req.param("endpoint"), source: c.req.param("source") });
    if (result.stoppedCount === 0) {
      throw new AppError("Subscription Not Found", 404);
    }
    return c.json({ code: 200, message: "stopped", data: result }, 200);
  });

  return app;
}

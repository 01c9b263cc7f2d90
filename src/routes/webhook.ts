import { Hono } from "hono";
import { z } from "zod";
import { AppError } from "../middleware/error-handler.js";
import type { ConversationService } from "../services/conversation.js";
import { logger } from "../utils/logger.js";

const telegramUpdateSchema = z.object({
  update_id: z.number().int(),
  message: z
    .object({
      chat: z.object({ id: z.union([z.number().int(), z.string()]) }),
      text: z.string().optional(),
    })
    .optional(),
});

export type TelegramUpdate = z.infer<typeof telegramUpdateSchema>;

export function createWebhookRouter(conversation: ConversationService): Hono {
  const app = new Hono();

  app.post("/", async (c) => {
    let raw: unknown;
    try {
      raw = await c.req.json();
    } catch {
      throw new AppError("Request body must be JSON", 400);
    }

    const update = telegramUpdateSchema.parse(raw);
    const message = update.message;
    if (!message?.text) {
      logger.debug("webhook_update_ignored", { updateId: update.update_id });
      return c.text("OK", 200);
    }

    const endpoint = String(message.chat.id);
    logger.info("webhook_update", { updateId: update.update_id, endpoint });
    await conversation.handle(endpoint, message.text);
    return c.text("OK", 200);
  });

  return app;
}

import { env } from "../config/env.js";
import type { DeliveryResult, EndpointId } from "../types/subscription.js";
import { errorMessage, logger } from "../utils/logger.js";

export interface NotificationSink {
  /** Best-effort send. Resolves with a failed result instead of rejecting. */
  deliver(message: string, endpoint: EndpointId): Promise<DeliveryResult>;
}

export class TelegramBotClient implements NotificationSink {
  private readonly baseUrl: string;

  private readonly token: string;

  private readonly timeoutMs: number;

  constructor(options?: { baseUrl?: string; token?: string; timeoutMs?: number }) {
    this.baseUrl = options?.baseUrl ?? env.TELEGRAM_API_BASE_URL;
    this.token = options?.token ?? env.TELEGRAM_BOT_TOKEN;
    this.timeoutMs = options?.timeoutMs ?? env.REQUEST_TIMEOUT_MS;
  }

  private methodUrl(method: string): string {
    return new URL(`/bot${this.token}/${method}`, this.baseUrl).toString();
  }

  private async call(method: string, body: Record<string, unknown>): Promise<DeliveryResult> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(this.methodUrl(method), {
        method: "POST",
        headers: {
          "content-type": "application/json",
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });

      if (response.status !== 200) {
        const text = await response.text().catch(() => "");
        return { ok: false, status: response.status, error: text || `Telegram returned ${response.status}` };
      }
      return { ok: true, status: response.status };
    } catch (error) {
      return { ok: false, error: errorMessage(error) };
    } finally {
      clearTimeout(timeout);
    }
  }

  async deliver(message: string, endpoint: EndpointId): Promise<DeliveryResult> {
    const result = await this.call("sendMessage", { chat_id: endpoint, text: message });
    if (!result.ok) {
      logger.warn("delivery_failed", {
        endpoint,
        status: result.status,
        error: result.error,
      });
    }
    return result;
  }

  async setWebhook(url: string): Promise<DeliveryResult> {
    const result = await this.call("setWebhook", { url });
    if (result.ok) {
      logger.info("webhook_registered", { url });
    } else {
      logger.error("webhook_register_failed", { url, status: result.status, error: result.error });
    }
    return result;
  }
}

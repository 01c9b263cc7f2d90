import { env } from "../config/env.js";
import type {
  EndpointId,
  StartResult,
  StopResult,
  SubscriptionInfo,
  SubscriptionKey,
  SubscriptionRequest,
} from "../types/subscription.js";
import type { TimestampStyle } from "../utils/format.js";
import { logger } from "../utils/logger.js";
import type { ContentSourceClient } from "./content-source.js";
import { PollingWorker } from "./polling-worker.js";
import { SubscriptionRegistry } from "./subscription-registry.js";
import type { NotificationSink } from "./telegram-client.js";

export const STOP_ALL = "all";

interface SubscriptionServiceOptions {
  contentSource: ContentSourceClient;
  sink: NotificationSink;
  registry?: SubscriptionRegistry;
  intervalMs?: number;
  maxPerEndpoint?: number;
  timestamp?: TimestampStyle;
}

export function normalizeKeywords(keywords: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of keywords) {
    const keyword = raw.trim();
    if (!keyword) continue;
    const folded = keyword.toLowerCase();
    if (seen.has(folded)) continue;
    seen.add(folded);
    result.push(keyword);
  }
  return result;
}

export class SubscriptionService {
  private readonly contentSource: ContentSourceClient;

  private readonly sink: NotificationSink;

  private readonly registry: SubscriptionRegistry;

  private readonly intervalMs: number;

  private readonly maxPerEndpoint: number;

  private readonly timestamp?: TimestampStyle;

  constructor(options: SubscriptionServiceOptions) {
    this.contentSource = options.contentSource;
    this.sink = options.sink;
    this.registry = options.registry ?? new SubscriptionRegistry();
    this.intervalMs = options.intervalMs ?? env.POLL_INTERVAL_MS;
    this.maxPerEndpoint = options.maxPerEndpoint ?? env.MAX_SUBSCRIPTIONS_PER_ENDPOINT;
    this.timestamp = options.timestamp;
  }

  start(request: SubscriptionRequest): StartResult {
    const endpoint = request.endpoint.trim();
    const source = request.source.trim();
    if (!endpoint) return { status: "invalid", message: "endpoint is required" };
    if (!source) return { status: "invalid", message: "source is required" };
    if (source.toLowerCase() === STOP_ALL) {
      return { status: "invalid", message: `"${STOP_ALL}" is reserved and cannot be monitored` };
    }

    const active = this.registry.list((key) => key.endpoint === endpoint).length;
    if (active >= this.maxPerEndpoint) {
      logger.warn("subscription_limit_reached", { endpoint, source, limit: this.maxPerEndpoint });
      return { status: "limit_reached", limit: this.maxPerEndpoint };
    }

    const subscription: SubscriptionRequest = { endpoint, source, keywords: normalizeKeywords(request.keywords) };
    const result = this.registry.start(subscription, (signal) =>
      new PollingWorker({
        subscription,
        contentSource: this.contentSource,
        sink: this.sink,
        signal,
        intervalMs: this.intervalMs,
        timestamp: this.timestamp,
      }).run(),
    );

    if (result.status === "conflict") {
      logger.warn("subscription_conflict", { endpoint, source });
      return { status: "conflict" };
    }

    logger.info("subscription_started", { endpoint, source, keywords: subscription.keywords });
    return { status: "started", subscription: result.subscription };
  }

  /** `source` may be {@link STOP_ALL} to stop every subscription of the endpoint. */
  stop(key: SubscriptionKey): StopResult {
    const endpoint = key.endpoint.trim();
    const source = key.source.trim();

    const stoppedCount =
      source.toLowerCase() === STOP_ALL
        ? this.registry.stopAll((candidate) => candidate.endpoint === endpoint)
        : Number(this.registry.stop({ endpoint, source }));

    logger.info("subscription_stopped", { endpoint, source, stoppedCount });
    return { stoppedCount };
  }

  list(endpoint?: EndpointId): SubscriptionInfo[] {
    return this.registry
      .list((key) => endpoint === undefined || key.endpoint === endpoint)
      .sort((a, b) => a.startedAt.localeCompare(b.startedAt));
  }

  count(): number {
    return this.registry.size;
  }

  async shutdown(): Promise<void> {
    const stopped = await this.registry.shutdown();
    logger.info("subscriptions_shutdown", { stopped });
  }
}

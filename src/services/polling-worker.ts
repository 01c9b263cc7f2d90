import { env } from "../config/env.js";
import type { SubscriptionRequest } from "../types/subscription.js";
import {
  formatFetchFailure,
  formatItemMessage,
  formatWorkerFault,
  type TimestampStyle,
} from "../utils/format.js";
import { errorMessage, logger, type Logger } from "../utils/logger.js";
import { sleep } from "../utils/sleep.js";
import type { ContentSourceClient } from "./content-source.js";
import { evaluate } from "./evaluator.js";
import type { NotificationSink } from "./telegram-client.js";

export type WorkerState = "running" | "stopped";

export type PollOutcome = "notified" | "skipped" | "fetch_failed" | "faulted" | "cancelled";

export interface PollingWorkerOptions {
  subscription: SubscriptionRequest;
  contentSource: ContentSourceClient;
  sink: NotificationSink;
  signal: AbortSignal;
  intervalMs?: number;
  timestamp?: TimestampStyle;
}

/**
 * Owns one subscription's poll loop. `lastSeenId` is private to the worker and
 * only advances when an item is actually relayed.
 */
export class PollingWorker {
  private readonly subscription: SubscriptionRequest;

  private readonly contentSource: ContentSourceClient;

  private readonly sink: NotificationSink;

  private readonly signal: AbortSignal;

  private readonly intervalMs: number;

  private readonly timestamp: TimestampStyle;

  private readonly log: Logger;

  private lastSeenId: string | undefined;

  private currentState: WorkerState = "running";

  constructor(options: PollingWorkerOptions) {
    this.subscription = options.subscription;
    this.contentSource = options.contentSource;
    this.sink = options.sink;
    this.signal = options.signal;
    this.intervalMs = options.intervalMs ?? env.POLL_INTERVAL_MS;
    this.timestamp = options.timestamp ?? { timeZone: env.DISPLAY_TIMEZONE, label: env.DISPLAY_TIMEZONE_LABEL };
    this.log = logger.child({
      endpoint: options.subscription.endpoint,
      source: options.subscription.source,
    });
  }

  get state(): WorkerState {
    return this.currentState;
  }

  get lastSeen(): string | undefined {
    return this.lastSeenId;
  }

  async run(): Promise<void> {
    this.log.info("worker_started", { keywords: this.subscription.keywords, intervalMs: this.intervalMs });
    while (!this.signal.aborted) {
      await this.pollOnce();
      await sleep(this.intervalMs, this.signal);
    }
    this.currentState = "stopped";
    this.log.info("worker_stopped", { lastSeenId: this.lastSeenId });
  }

  async pollOnce(): Promise<PollOutcome> {
    const { endpoint, source, keywords } = this.subscription;

    try {
      const outcome = await this.contentSource.fetchLatest(source, { signal: this.signal });
      if (this.signal.aborted) return "cancelled";

      if (!outcome.ok) {
        this.log.warn("poll_fetch_failed", {
          kind: outcome.error.kind,
          status: outcome.error.status,
          error: outcome.error.message,
        });
        await this.report(formatFetchFailure(source, outcome.error.message));
        return "fetch_failed";
      }

      const decision = evaluate(outcome.item, this.lastSeenId, keywords);
      if (decision.action === "skip") {
        if (decision.reason === "filtered") {
          this.log.info("item_filtered", { itemId: outcome.item?.id });
        }
        return "skipped";
      }

      this.lastSeenId = decision.item.id;
      const delivery = await this.sink.deliver(formatItemMessage(source, decision.item, this.timestamp), endpoint);
      this.log.info("item_notified", { itemId: decision.item.id, delivered: delivery.ok });
      return "notified";
    } catch (error) {
      if (this.signal.aborted) {
        this.log.debug("poll_fault_after_cancel", { error: errorMessage(error) });
        return "cancelled";
      }
      this.log.error("poll_fault", { error: errorMessage(error) });
      await this.report(formatWorkerFault(source, errorMessage(error)));
      return "faulted";
    }
  }

  private async report(message: string): Promise<void> {
    try {
      const result = await this.sink.deliver(message, this.subscription.endpoint);
      if (!result.ok) {
        this.log.warn("diagnostic_not_delivered", { status: result.status, error: result.error });
      }
    } catch (error) {
      this.log.error("diagnostic_delivery_threw", { error: errorMessage(error) });
    }
  }
}

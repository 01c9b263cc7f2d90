import type { SubscriptionInfo, SubscriptionKey, SubscriptionRequest } from "../types/subscription.js";
import { errorMessage, logger } from "../utils/logger.js";

export type WorkerFactory = (signal: AbortSignal) => Promise<void>;

export type RegistryStartResult =
  | { status: "started"; subscription: SubscriptionInfo; signal: AbortSignal }
  | { status: "conflict" };

interface RegistryEntry {
  subscription: SubscriptionInfo;
  controller: AbortController;
  done: Promise<void>;
}

function compoundKey(key: SubscriptionKey): string {
  return JSON.stringify([key.endpoint, key.source]);
}

/**
 * Map of active subscriptions to the cancellation handle of their worker.
 *
 * Every mutation runs synchronously between awaits, so a start and a stop for
 * the same key can never interleave: an entry is present exactly while its
 * worker has not been asked to stop.
 */
export class SubscriptionRegistry {
  private readonly entries = new Map<string, RegistryEntry>();

  private readonly exiting = new Map<AbortController, Promise<void>>();

  private readonly nowFn: () => number;

  constructor(options: { nowFn?: () => number } = {}) {
    this.nowFn = options.nowFn ?? (() => Date.now());
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: SubscriptionKey): boolean {
    return this.entries.has(compoundKey(key));
  }

  list(predicate: (key: SubscriptionKey) => boolean = () => true): SubscriptionInfo[] {
    return Array.from(this.entries.values())
      .map((entry) => entry.subscription)
      .filter((subscription) => predicate(subscription));
  }

  start(request: SubscriptionRequest, spawn: WorkerFactory): RegistryStartResult {
    const id = compoundKey(request);
    if (this.entries.has(id)) return { status: "conflict" };

    const subscription: SubscriptionInfo = {
      endpoint: request.endpoint,
      source: request.source,
      keywords: [...request.keywords],
      startedAt: new Date(this.nowFn()).toISOString(),
    };
    const controller = new AbortController();
    const done = this.supervise(id, controller, spawn);
    this.entries.set(id, { subscription, controller, done });

    return { status: "started", subscription, signal: controller.signal };
  }

  stop(key: SubscriptionKey): boolean {
    const id = compoundKey(key);
    const entry = this.entries.get(id);
    if (!entry) return false;
    this.release(id, entry);
    return true;
  }

  stopAll(predicate: (key: SubscriptionKey) => boolean): number {
    let count = 0;
    for (const [id, entry] of Array.from(this.entries)) {
      if (!predicate(entry.subscription)) continue;
      this.release(id, entry);
      count += 1;
    }
    return count;
  }

  /** Resolves once every worker that has been asked to stop has exited. */
  async idle(): Promise<void> {
    await Promise.all(Array.from(this.exiting.values()));
  }

  async shutdown(): Promise<number> {
    const count = this.stopAll(() => true);
    await this.idle();
    return count;
  }

  private release(id: string, entry: RegistryEntry): void {
    this.entries.delete(id);
    this.exiting.set(entry.controller, entry.done);
    entry.controller.abort();
  }

  private async supervise(id: string, controller: AbortController, spawn: WorkerFactory): Promise<void> {
    try {
      // start() registers the entry before the worker body runs
      await Promise.resolve();
      await spawn(controller.signal);
    } catch (error) {
      logger.error("worker_crashed", { key: id, error: errorMessage(error) });
    } finally {
      this.exiting.delete(controller);
      if (this.entries.get(id)?.controller === controller) {
        this.entries.delete(id);
      }
    }
  }
}

import { z } from "zod";
import { env } from "../config/env.js";
import type { FetchedItem, SourceIdentity } from "../types/subscription.js";
import { errorMessage } from "../utils/logger.js";
import { extractTags, isRetransmission } from "./evaluator.js";

export type FetchErrorKind = "transport" | "status" | "timeout" | "invalid_body";

export class FetchError extends Error {
  readonly kind: FetchErrorKind;

  readonly status?: number;

  constructor(kind: FetchErrorKind, message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "FetchError";
    this.kind = kind;
    this.status = options?.status;
  }
}

export type FetchOutcome = { ok: true; item: FetchedItem | null } | { ok: false; error: FetchError };

export interface FetchOptions {
  /** Aborts the in-flight request when the owning subscription is cancelled. */
  signal?: AbortSignal;
}

export interface ContentSourceClient {
  fetchLatest(source: SourceIdentity, options?: FetchOptions): Promise<FetchOutcome>;
}

const legacyTweetSchema = z.object({
  id_str: z.string().min(1),
  full_text: z.string(),
});

const timelineSchema = z.object({
  result: z.object({
    timeline: z.object({
      instructions: z.array(z.unknown()),
    }),
  }),
});

const entriesInstructionSchema = z.object({
  entries: z.array(z.unknown()).min(1),
});

// cursor and module entries that follow the newest tweet are left unchecked
const tweetEntrySchema = z.object({
  content: z.object({
    itemContent: z.object({
      tweet_results: z.object({
        result: z.object({
          legacy: legacyTweetSchema,
        }),
      }),
    }),
  }),
});

/**
 * Picks the most recent tweet out of a user-tweets payload, or null when the
 * payload does not have the expected shape (no tweets, pinned-only timelines,
 * provider format drift).
 */
export function extractLatestTweet(payload: unknown): { id: string; text: string } | null {
  const timeline = timelineSchema.safeParse(payload);
  if (!timeline.success) return null;

  // instructions[0] clears the cache, the timeline entries live in the second one
  const instruction = entriesInstructionSchema.safeParse(timeline.data.result.timeline.instructions[1]);
  if (!instruction.success) return null;

  const entry = tweetEntrySchema.safeParse(instruction.data.entries[0]);
  if (!entry.success) return null;

  const legacy = entry.data.content.itemContent.tweet_results.result.legacy;
  return { id: legacy.id_str, text: legacy.full_text };
}

export class TwitterContentSource implements ContentSourceClient {
  private readonly host: string;

  private readonly apiKey: string;

  private readonly pageSize: number;

  private readonly timeoutMs: number;

  private readonly nowFn: () => Date;

  constructor(options?: {
    host?: string;
    apiKey?: string;
    pageSize?: number;
    timeoutMs?: number;
    nowFn?: () => Date;
  }) {
    this.host = options?.host ?? env.RAPIDAPI_HOST;
    this.apiKey = options?.apiKey ?? env.RAPIDAPI_KEY;
    this.pageSize = options?.pageSize ?? env.FEED_PAGE_SIZE;
    this.timeoutMs = options?.timeoutMs ?? env.REQUEST_TIMEOUT_MS;
    this.nowFn = options?.nowFn ?? (() => new Date());
  }

  buildUrl(source: SourceIdentity): string {
    const url = new URL("/user-tweets", `https://${this.host}`);
    url.searchParams.set("user", source);
    url.searchParams.set("count", String(this.pageSize));
    return url.toString();
  }

  async fetchLatest(source: SourceIdentity, options: FetchOptions = {}): Promise<FetchOutcome> {
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onCancel = () => controller.abort();
    options.signal?.addEventListener("abort", onCancel, { once: true });

    try {
      const response = await fetch(this.buildUrl(source), {
        method: "GET",
        headers: {
          accept: "application/json",
          "x-rapidapi-host": this.host,
          "x-rapidapi-key": this.apiKey,
        },
        signal: controller.signal,
      });

      if (!response.ok) {
        return {
          ok: false,
          error: new FetchError("status", `Upstream returned ${response.status}`, { status: response.status }),
        };
      }

      let payload: unknown;
      try {
        payload = await response.json();
      } catch (error) {
        return {
          ok: false,
          error: new FetchError("invalid_body", "Upstream returned a non-JSON body", { cause: error }),
        };
      }

      const latest = extractLatestTweet(payload);
      if (!latest) return { ok: true, item: null };

      return {
        ok: true,
        item: {
          id: latest.id,
          text: latest.text,
          isRetransmission: isRetransmission(latest.text),
          tags: extractTags(latest.text),
          observedAt: this.nowFn(),
        },
      };
    } catch (error) {
      if (timedOut) {
        return {
          ok: false,
          error: new FetchError("timeout", `Upstream timed out after ${this.timeoutMs}ms`, { cause: error }),
        };
      }
      return { ok: false, error: new FetchError("transport", errorMessage(error), { cause: error }) };
    } finally {
      clearTimeout(timeout);
      options.signal?.removeEventListener("abort", onCancel);
    }
  }
}

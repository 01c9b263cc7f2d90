import { describe, expect, test, vi } from "vitest";
import { FetchError, type ContentSourceClient, type FetchOutcome } from "../src/services/content-source.js";
import { PollingWorker } from "../src/services/polling-worker.js";
import type { NotificationSink } from "../src/services/telegram-client.js";
import { makeItem, RecordingSink, ScriptedContentSource } from "./helpers/fakes.js";

const IST = { timeZone: "Asia/Kolkata", label: "IST" };

function makeWorker(options: {
  contentSource: ContentSourceClient;
  sink?: NotificationSink;
  keywords?: string[];
  signal?: AbortSignal;
  intervalMs?: number;
}): PollingWorker {
  return new PollingWorker({
    subscription: { endpoint: "chat-1", source: "nasa", keywords: options.keywords ?? [] },
    contentSource: options.contentSource,
    sink: options.sink ?? new RecordingSink(),
    signal: options.signal ?? new AbortController().signal,
    intervalMs: options.intervalMs ?? 60_000,
    timestamp: IST,
  });
}

describe("PollingWorker.pollOnce", () => {
  test("notifies each distinct id exactly once", async () => {
    const sink = new RecordingSink();
    const worker = makeWorker({
      sink,
      contentSource: new ScriptedContentSource([
        { ok: true, item: makeItem("1", "first") },
        { ok: true, item: makeItem("2", "second") },
        { ok: true, item: makeItem("2", "second") },
        { ok: true, item: makeItem("3", "third") },
      ]),
    });

    const outcomes: string[] = [];
    for (let i = 0; i < 4; i += 1) outcomes.push(await worker.pollOnce());

    expect(outcomes).toEqual(["notified", "notified", "skipped", "notified"]);
    expect(worker.lastSeen).toBe("3");
    expect(sink.sent.map((entry) => entry.message.split("\n")[2])).toEqual([
      "Tweet ID: 1",
      "Tweet ID: 2",
      "Tweet ID: 3",
    ]);
    expect(sink.sent.every((entry) => entry.endpoint === "chat-1")).toBe(true);
  });

  test("a filtered item does not advance the marker", async () => {
    const sink = new RecordingSink();
    const worker = makeWorker({
      sink,
      keywords: ["launch"],
      contentSource: new ScriptedContentSource([
        { ok: true, item: makeItem("10", "Nothing interesting") },
        { ok: true, item: makeItem("10", "Nothing interesting") },
        { ok: true, item: makeItem("11", "Big Launch Today") },
      ]),
    });

    expect(await worker.pollOnce()).toBe("skipped");
    expect(worker.lastSeen).toBeUndefined();
    expect(await worker.pollOnce()).toBe("skipped");
    expect(await worker.pollOnce()).toBe("notified");
    expect(worker.lastSeen).toBe("11");
    expect(sink.sent).toHaveLength(1);
    expect(sink.sent[0]?.message.split("\n")[0]).toBe("[2026-01-15 12:00:05 IST] New tweet detected!");
  });

  test("an empty result is nothing new", async () => {
    const sink = new RecordingSink();
    const worker = makeWorker({ sink, contentSource: new ScriptedContentSource([{ ok: true, item: null }]) });

    expect(await worker.pollOnce()).toBe("skipped");
    expect(sink.sent).toEqual([]);
  });

  test("fetch errors are reported to the endpoint and polling carries on", async () => {
    const sink = new RecordingSink();
    const worker = makeWorker({
      sink,
      contentSource: new ScriptedContentSource([
        { ok: false, error: new FetchError("status", "Upstream returned 503", { status: 503 }) },
        { ok: true, item: makeItem("1", "back online") },
      ]),
    });

    expect(await worker.pollOnce()).toBe("fetch_failed");
    expect(await worker.pollOnce()).toBe("notified");
    expect(sink.sent[0]).toEqual({ endpoint: "chat-1", message: "Failed to fetch tweets for nasa: Upstream returned 503" });
    expect(sink.sent).toHaveLength(2);
  });

  test("unexpected faults are reported and do not stop the worker", async () => {
    const sink = new RecordingSink();
    const worker = makeWorker({
      sink,
      contentSource: new ScriptedContentSource([new Error("boom"), { ok: true, item: makeItem("1", "fine") }]),
    });

    expect(await worker.pollOnce()).toBe("faulted");
    expect(sink.messagesFor("chat-1")).toEqual(["An error occurred in tweet monitor for nasa: boom"]);
    expect(await worker.pollOnce()).toBe("notified");
  });

  test("delivery failures do not roll back the marker", async () => {
    const sink = new RecordingSink({ ok: false, status: 403, error: "Forbidden" });
    const worker = makeWorker({
      sink,
      contentSource: new ScriptedContentSource([{ ok: true, item: makeItem("9", "hello") }]),
    });

    expect(await worker.pollOnce()).toBe("notified");
    expect(await worker.pollOnce()).toBe("skipped");
    expect(worker.lastSeen).toBe("9");
    expect(sink.sent).toHaveLength(1);
  });

  test("a result that arrives after cancellation is dropped", async () => {
    const controller = new AbortController();
    const sink = new RecordingSink();
    let release: (outcome: FetchOutcome) => void = () => undefined;
    const contentSource: ContentSourceClient = {
      fetchLatest: () =>
        new Promise<FetchOutcome>((resolve) => {
          release = resolve;
        }),
    };
    const worker = makeWorker({ sink, contentSource, signal: controller.signal });

    const pending = worker.pollOnce();
    controller.abort();
    release({ ok: true, item: makeItem("1", "late") });

    expect(await pending).toBe("cancelled");
    expect(worker.lastSeen).toBeUndefined();
    expect(sink.sent).toEqual([]);
  });
});

describe("PollingWorker cancellation during a failing fetch", () => {
  test("a fault raised after cancellation is not reported", async () => {
    const controller = new AbortController();
    const sink = new RecordingSink();
    let fail: (error: Error) => void = () => undefined;
    const contentSource: ContentSourceClient = {
      fetchLatest: () =>
        new Promise<FetchOutcome>((_resolve, reject) => {
          fail = reject;
        }),
    };
    const worker = makeWorker({ sink, contentSource, signal: controller.signal });

    const pending = worker.pollOnce();
    controller.abort();
    fail(new Error("socket closed"));

    expect(await pending).toBe("cancelled");
    expect(sink.sent).toEqual([]);
  });
});

describe("PollingWorker.run", () => {
  test("keeps polling on the interval until cancelled", async () => {
    const controller = new AbortController();
    const contentSource = new ScriptedContentSource([{ ok: true, item: null }]);
    const worker = makeWorker({ contentSource, signal: controller.signal, intervalMs: 5 });

    const running = worker.run();
    await vi.waitFor(() => expect(contentSource.calls).toBeGreaterThanOrEqual(3));
    expect(worker.state).toBe("running");

    controller.abort();
    await running;

    expect(worker.state).toBe("stopped");
  });

  test("cancellation interrupts the inter-poll sleep", async () => {
    const controller = new AbortController();
    const contentSource = new ScriptedContentSource([{ ok: true, item: null }]);
    const worker = makeWorker({ contentSource, signal: controller.signal, intervalMs: 60_000 });

    const startedAt = Date.now();
    const running = worker.run();
    await vi.waitFor(() => expect(contentSource.calls).toBe(1));
    controller.abort();
    await running;

    expect(worker.state).toBe("stopped");
    expect(contentSource.calls).toBe(1);
    expect(Date.now() - startedAt).toBeLessThan(5_000);
  });

  test("a worker spawned with an aborted signal never polls", async () => {
    const controller = new AbortController();
    controller.abort();
    const contentSource = new ScriptedContentSource();
    const worker = makeWorker({ contentSource, signal: controller.signal });

    await worker.run();

    expect(contentSource.calls).toBe(0);
    expect(worker.state).toBe("stopped");
  });
});

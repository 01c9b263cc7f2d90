import { afterEach, describe, expect, test, vi } from "vitest";
import { TelegramBotClient } from "../src/services/telegram-client.js";

function makeClient(): TelegramBotClient {
  return new TelegramBotClient({
    baseUrl: "https://bot.example.test",
    token: "test-token",
    timeoutMs: 1000,
  });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("TelegramBotClient", () => {
  test("posts the message to sendMessage", async () => {
    const fetchMock = vi.fn(
      async (_input: string | URL | Request, _init?: RequestInit) => new Response('{"ok":true}', { status: 200 }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const result = await makeClient().deliver("hello", "12345");

    expect(result).toEqual({ ok: true, status: 200 });
    expect(fetchMock.mock.calls[0]?.[0]).toBe("https://bot.example.test/bottest-token/sendMessage");
    expect(fetchMock.mock.calls[0]?.[1]?.method).toBe("POST");
    expect(fetchMock.mock.calls[0]?.[1]?.body).toBe(JSON.stringify({ chat_id: "12345", text: "hello" }));
  });

  test("reports a non-200 status without throwing", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("Forbidden: bot was blocked by the user", { status: 403 })),
    );

    const result = await makeClient().deliver("hello", "12345");

    expect(result).toEqual({ ok: false, status: 403, error: "Forbidden: bot was blocked by the user" });
  });

  test("reports transport errors without throwing", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new Error("socket hang up");
      }),
    );

    await expect(makeClient().deliver("hello", "12345")).resolves.toEqual({ ok: false, error: "socket hang up" });
  });

  test("registers the webhook url", async () => {
    const fetchMock = vi.fn(
      async (_input: string | URL | Request, _init?: RequestInit) => new Response('{"ok":true}', { status: 200 }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const result = await makeClient().setWebhook("https://relay.example.test/webhook");

    expect(result.ok).toBe(true);
    expect(fetchMock.mock.calls[0]?.[0]).toBe("https://bot.example.test/bottest-token/setWebhook");
    expect(fetchMock.mock.calls[0]?.[1]?.body).toBe(JSON.stringify({ url: "https://relay.example.test/webhook" }));
  });
});

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SummaryClient } from "../src/summary/client.js";

const originalFetch = globalThis.fetch;

interface FetchCall {
  url: string;
  init?: RequestInit;
}

let calls: FetchCall[];
let warnings: string[];
const logger = { warn: (message: string) => warnings.push(message) };

function stubFetch(respond: () => Promise<Response>) {
  globalThis.fetch = async (input, init) => {
    calls.push({ url: String(input), init });
    return respond();
  };
}

describe("SummaryClient", () => {
  beforeEach(() => {
    calls = [];
    warnings = [];
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it("returns the response body unchanged", async () => {
    stubFetch(async () => new Response('{"answer":"ok","references":[]}', { status: 200 }));
    const client = new SummaryClient({ token: "test-token", logger });

    expect(await client.fetchSummary("hello")).toEqual({ answer: "ok", references: [] });
    expect(warnings).toEqual([]);
  });

  it("sends the summary request contract", async () => {
    stubFetch(async () => new Response("{}", { status: 200 }));
    const client = new SummaryClient({ token: " test-token ", baseUrl: "https://example.test/", logger });

    const outcome = await client.summarize("hello");

    expect(outcome).toEqual({ ok: true, status: 200, result: {} });
    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe("https://example.test/summary");
    expect(calls[0].init?.method).toBe("POST");
    expect(calls[0].init?.headers).toEqual({
      Authorization: "Bearer test-token",
      "Content-Type": "application/json",
      "X-sr-auth-user": "Securian",
      "session-id": "123456",
    });
    expect(JSON.parse(String(calls[0].init?.body))).toEqual({
      product_type: ["life1"],
      summary: "hello",
      contentType: "info",
      language: "en-eu",
      ratingType: "adult",
    });
    expect(calls[0].init?.signal).toBeUndefined();
  });

  it("uses the configured session id and timeout", async () => {
    stubFetch(async () => new Response("{}", { status: 200 }));
    const client = new SummaryClient({ token: "test-token", sessionId: "session-42", timeoutMs: 5_000, logger });

    await client.summarize("hello");

    expect(calls[0].init?.headers).toMatchObject({ "session-id": "session-42" });
    expect(calls[0].init?.signal).toBeInstanceOf(AbortSignal);
  });

  it("returns an empty result on a 500", async () => {
    stubFetch(async () => new Response("boom", { status: 500 }));
    const client = new SummaryClient({ token: "test-token", logger });

    await expect(client.fetchSummary("hello")).resolves.toEqual({});
    expect(warnings).toEqual(["[warn] Summary API error 500: boom"]);
  });

  it("reports the http failure reason", async () => {
    stubFetch(async () => new Response("", { status: 503 }));
    const client = new SummaryClient({ token: "test-token", logger });

    expect(await client.summarize("hello")).toEqual({
      ok: false,
      reason: "http",
      status: 503,
      message: "Summary API error 503",
    });
  });

  it("absorbs transport errors", async () => {
    stubFetch(async () => {
      throw new Error("network down");
    });
    const client = new SummaryClient({ token: "test-token", logger });

    expect(await client.summarize("hello")).toEqual({
      ok: false,
      reason: "transport",
      message: "Summary request failed: network down",
    });
    expect(warnings).toEqual(["[warn] Summary request failed: network down"]);
  });

  it("absorbs a body that is not JSON", async () => {
    stubFetch(async () => new Response("<html>", { status: 200 }));
    const client = new SummaryClient({ token: "test-token", logger });

    const outcome = await client.summarize("hello");
    expect(outcome.ok).toBe(false);
    expect(outcome.ok ? undefined : outcome.reason).toBe("invalid-json");
    expect(await client.fetchSummary("hello")).toEqual({});
  });

  it("rejects JSON that is not an object", async () => {
    stubFetch(async () => new Response("[1,2]", { status: 200 }));
    const client = new SummaryClient({ token: "test-token", logger });

    const outcome = await client.summarize("hello");
    expect(outcome.ok ? undefined : outcome.reason).toBe("unexpected-body");
  });

  it("requires a token", () => {
    expect(() => new SummaryClient({ token: "  " })).toThrow(/token is required/);
  });
});

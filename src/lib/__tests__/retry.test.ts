import { describe, expect, it } from "vitest";
import { retryDelayMs, withRetry } from "../retry";
import { fakeFetch, jsonResponse } from "./fakeFetch";

describe("retryDelayMs", () => {
  it("uses Retry-After seconds", () => {
    expect(retryDelayMs(jsonResponse(429, null, { "Retry-After": "3" }))).toBe(3000);
  });

  it("defaults to 4 seconds without a usable header", () => {
    expect(retryDelayMs(jsonResponse(429, null))).toBe(4000);
    expect(retryDelayMs(jsonResponse(429, null, { "Retry-After": "soon" }))).toBe(4000);
  });
});

describe("withRetry", () => {
  it("re-issues a request after 429", async () => {
    const { fetchFn, calls } = fakeFetch([
      jsonResponse(429, null, { "Retry-After": "0" }),
      jsonResponse(200, { ok: true }),
    ]);
    const response = await withRetry(() => fetchFn("https://example.test/a"));
    expect(response.status).toBe(200);
    expect(calls).toHaveLength(2);
  });

  it("returns other failures without retrying", async () => {
    const { fetchFn, calls } = fakeFetch([jsonResponse(500, null)]);
    const response = await withRetry(() => fetchFn("https://example.test/a"));
    expect(response.status).toBe(500);
    expect(calls).toHaveLength(1);
  });

  it("gives up after maxRetries", async () => {
    const limited = () => jsonResponse(429, null, { "Retry-After": "0" });
    const { fetchFn, calls } = fakeFetch([limited(), limited(), limited()]);
    const response = await withRetry(() => fetchFn("https://example.test/a"), {
      maxRetries: 2,
    });
    expect(response.status).toBe(429);
    expect(calls).toHaveLength(3);
  });
});

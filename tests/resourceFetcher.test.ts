import { beforeEach, describe, expect, it } from "vitest";
import type { FetchEngineConfig } from "../src/config/env";
import { ResourceFetcher } from "../src/fetch/resourceFetcher";
import { silentLogger } from "../src/logging/logger";
import { FakeHttpClient, response } from "./helpers/fakeHttp";
import { MemoryFetchStateStore } from "./helpers/memoryStores";

const URL_A = "https://api.example.org/locations.ndjson";
const T0 = new Date("2026-03-01T12:00:00Z");

function at(offsetSec: number): Date {
  return new Date(T0.getTime() + offsetSec * 1000);
}

const config: FetchEngineConfig = {
  userAgent: "test-agent",
  timeoutMs: 1000,
  rateLimitWindowSec: 90,
  defaultExpirationSec: 120
};

describe("ResourceFetcher", () => {
  let store: MemoryFetchStateStore;
  let http: FakeHttpClient;
  let fetcher: ResourceFetcher;

  beforeEach(() => {
    store = new MemoryFetchStateStore();
    http = new FakeHttpClient();
    fetcher = new ResourceFetcher({ store, http, config, logger: silentLogger });
  });

  it("downloads on first use and caches with the default expiration", async () => {
    http.on(URL_A, response(200, "body-1"));

    const result = await fetcher.fetch(URL_A, T0);

    expect(result).toEqual({
      status: "ok",
      source: "network",
      url: URL_A,
      statusCode: 200,
      body: "body-1",
      fetchAt: T0,
      expiresAt: at(120),
      pollingHintSec: null
    });
    expect(http.requests).toHaveLength(1);
    expect(http.requests[0].headers).toEqual({ "User-Agent": "test-agent" });
    expect(http.requests[0].timeoutMs).toBe(1000);
    expect(store.cache.get(URL_A)).toEqual({
      url: URL_A,
      fetchAt: T0,
      expiresAt: at(120),
      etag: null,
      body: "body-1"
    });
    expect(store.attempts).toEqual([{ url: URL_A, fetchAt: T0, statusCode: 200 }]);
  });

  it("serves a fresh entry from cache without touching the network", async () => {
    http.on(URL_A, response(200, "body-1"));
    await fetcher.fetch(URL_A, T0);

    const result = await fetcher.fetch(URL_A, at(30));

    expect(result.status).toBe("ok");
    if (result.status !== "ok") return;
    expect(result.source).toBe("cache");
    expect(result.body).toBe("body-1");
    expect(result.pollingHintSec).toBe(90);
    expect(http.requests).toHaveLength(1);
    expect(store.attempts).toHaveLength(1);
  });

  it("lets max-age override Expires and the default", async () => {
    http.on(
      URL_A,
      response(200, "body-1", {
        "Cache-Control": "public, max-age=60",
        Expires: at(3600).toUTCString()
      })
    );

    const result = await fetcher.fetch(URL_A, T0);

    expect(result.status === "ok" && result.expiresAt).toEqual(at(60));
    expect(result.status === "ok" && result.pollingHintSec).toBe(60);
    expect(store.cache.get(URL_A)?.expiresAt).toEqual(at(60));
  });

  it("lets Expires override the default", async () => {
    http.on(URL_A, response(200, "body-1", { Expires: at(600).toUTCString() }));

    await fetcher.fetch(URL_A, T0);

    expect(store.cache.get(URL_A)?.expiresAt).toEqual(at(600));
  });

  it("revalidates with both validators and refreshes the entry on 304", async () => {
    http.on(
      URL_A,
      response(200, "old", { ETag: '"v1"', "Cache-Control": "max-age=30" }),
      response(304, "", { "Cache-Control": "max-age=45" })
    );
    await fetcher.fetch(URL_A, T0);

    const result = await fetcher.fetch(URL_A, at(100));

    expect(result).toEqual({
      status: "ok",
      source: "revalidated",
      url: URL_A,
      statusCode: 304,
      body: "old",
      fetchAt: at(100),
      expiresAt: at(145),
      pollingHintSec: 45
    });
    expect(http.requests[1].headers).toEqual({
      "User-Agent": "test-agent",
      "If-None-Match": '"v1"',
      "If-Modified-Since": T0.toUTCString()
    });
    expect(store.cache.get(URL_A)).toEqual({
      url: URL_A,
      fetchAt: at(100),
      expiresAt: at(145),
      etag: '"v1"',
      body: "old"
    });
    expect(store.attempts.map((attempt) => attempt.statusCode)).toEqual([200, 304]);
  });

  it("rate limits a stale URL inside the window", async () => {
    http.on(URL_A, response(200, "body-1", { "Cache-Control": "max-age=30" }));
    await fetcher.fetch(URL_A, T0);

    const result = await fetcher.fetch(URL_A, at(60));

    expect(result).toEqual({
      status: "rate_limited",
      url: URL_A,
      lastAttemptAt: T0,
      retryAfterSec: 30
    });
    expect(http.requests).toHaveLength(1);
    expect(store.attempts).toHaveLength(1);
  });

  it("counts failed attempts toward the rate limit", async () => {
    http.on(URL_A, response(503, "busy"));
    await fetcher.fetch(URL_A, T0);

    const result = await fetcher.fetch(URL_A, at(89));

    expect(result.status).toBe("rate_limited");
    expect(http.requests).toHaveLength(1);
  });

  it("keeps the full window when the attempt fell mid-second", async () => {
    store.attempts.push({ url: URL_A, fetchAt: new Date("2026-03-01T12:00:00.900Z"), statusCode: 200 });

    const result = await fetcher.fetch(URL_A, new Date("2026-03-01T12:01:30.100Z"));

    expect(result).toEqual({
      status: "rate_limited",
      url: URL_A,
      lastAttemptAt: new Date("2026-03-01T12:00:00.900Z"),
      retryAfterSec: 1
    });
    expect(http.requests).toHaveLength(0);
  });

  it("keeps the attempt when the cache write fails", async () => {
    http.on(URL_A, response(200, "body-1"));
    store.failCacheWrites = true;

    await expect(fetcher.fetch(URL_A, T0)).rejects.toThrow("resource_cache write failed");

    expect(store.attempts).toEqual([{ url: URL_A, fetchAt: T0, statusCode: 200 }]);
    expect(store.cache.size).toBe(0);

    store.failCacheWrites = false;
    const next = await fetcher.fetch(URL_A, at(10));
    expect(next.status).toBe("rate_limited");
    expect(http.requests).toHaveLength(1);
  });

  it("fetches inside the window when rate limiting is ignored", async () => {
    http.on(URL_A, response(200, "body-1", { "Cache-Control": "max-age=30" }), response(200, "body-2"));
    await fetcher.fetch(URL_A, T0);

    const result = await fetcher.fetch(URL_A, at(60), { ignoreRateLimiting: true });

    expect(result.status === "ok" && result.body).toBe("body-2");
    expect(http.requests).toHaveLength(2);
  });

  it("omits If-None-Match when suppressed", async () => {
    http.on(URL_A, response(200, "old", { ETag: '"v1"', "Cache-Control": "max-age=30" }), response(304));
    await fetcher.fetch(URL_A, T0);

    await fetcher.fetch(URL_A, at(100), { suppressIfNoneMatch: true });

    expect(http.requests[1].headers).toEqual({
      "User-Agent": "test-agent",
      "If-Modified-Since": T0.toUTCString()
    });
  });

  it("omits If-Modified-Since when suppressed", async () => {
    http.on(URL_A, response(200, "old", { ETag: '"v1"', "Cache-Control": "max-age=30" }), response(304));
    await fetcher.fetch(URL_A, T0);

    await fetcher.fetch(URL_A, at(100), { suppressIfModifiedSince: true });

    expect(http.requests[1].headers).toEqual({
      "User-Agent": "test-agent",
      "If-None-Match": '"v1"'
    });
  });

  it("bypasses a fresh entry and sends no validators with skipCache", async () => {
    http.on(
      URL_A,
      response(200, "old", { ETag: '"v1"', "Cache-Control": "max-age=3600" }),
      response(200, "new", { ETag: '"v2"' })
    );
    await fetcher.fetch(URL_A, T0);

    const result = await fetcher.fetch(URL_A, at(100), { skipCache: true });

    expect(result.status === "ok" && result.source).toBe("network");
    expect(http.requests[1].headers).toEqual({ "User-Agent": "test-agent" });
    expect(store.cache.get(URL_A)).toEqual({
      url: URL_A,
      fetchAt: at(100),
      expiresAt: at(220),
      etag: '"v2"',
      body: "new"
    });
  });

  it("leaves the cache untouched with suppressCacheWrite", async () => {
    http.on(URL_A, response(200, "body-1"));

    const result = await fetcher.fetch(URL_A, T0, { suppressCacheWrite: true });

    expect(result.status === "ok" && result.body).toBe("body-1");
    expect(store.cache.size).toBe(0);
    expect(store.attempts).toHaveLength(1);
  });

  it("records status 0 for a transport error and keeps the cache", async () => {
    http.on(URL_A, new Error("connect ECONNREFUSED"));

    const result = await fetcher.fetch(URL_A, T0);

    expect(result).toEqual({
      status: "failed",
      url: URL_A,
      statusCode: 0,
      error: "connect ECONNREFUSED"
    });
    expect(store.attempts).toEqual([{ url: URL_A, fetchAt: T0, statusCode: 0 }]);
    expect(store.cache.size).toBe(0);
  });

  it("fails a 304 that arrives without a cached entry", async () => {
    http.on(URL_A, response(304));

    const result = await fetcher.fetch(URL_A, T0);

    expect(result).toEqual({
      status: "failed",
      url: URL_A,
      statusCode: 304,
      error: "304 Not Modified without a cached entry"
    });
    expect(store.cache.size).toBe(0);
  });

  it("fails other statuses without mutating the cached entry", async () => {
    http.on(URL_A, response(200, "v1", { "Cache-Control": "max-age=30" }), response(500, "boom"));
    await fetcher.fetch(URL_A, T0);

    const result = await fetcher.fetch(URL_A, at(100));

    expect(result).toEqual({ status: "failed", url: URL_A, statusCode: 500, error: "HTTP 500" });
    expect(store.cache.get(URL_A)).toEqual({
      url: URL_A,
      fetchAt: T0,
      expiresAt: at(30),
      etag: null,
      body: "v1"
    });
    expect(store.attempts.map((attempt) => attempt.statusCode)).toEqual([200, 500]);
  });

  it("serialises concurrent fetches of one URL into a single download", async () => {
    http.on(URL_A, response(200, "body-1"));

    const [first, second] = await Promise.all([fetcher.fetch(URL_A, T0), fetcher.fetch(URL_A, T0)]);

    expect(first.status === "ok" && first.source).toBe("network");
    expect(second.status === "ok" && second.source).toBe("cache");
    expect(http.requests).toHaveLength(1);
  });
});

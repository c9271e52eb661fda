import type { FetchEngineConfig } from "../config/env";
import { errorMessage } from "../errors";
import type { Logger } from "../logging/logger";
import type { FetchStateStore, FetchStateTx } from "../store/ports";
import type { ResourceCacheEntry } from "../types/records";
import {
  computeExpiresAt,
  pollingHintFromHeaders,
  remainingFreshnessSec
} from "./cachePolicy";
import type { HttpClient, HttpResponse } from "./httpClient";
import { toEpochSeconds, toEpochSecondsCeil } from "../utils/time";

export interface FetchResourceOptions {
  /** Ignore any cached entry, fresh or not; no validators are sent. */
  skipCache?: boolean;
  ignoreRateLimiting?: boolean;
  suppressIfNoneMatch?: boolean;
  suppressIfModifiedSince?: boolean;
  /** Leave the cache untouched after a 200 or 304. */
  suppressCacheWrite?: boolean;
}

export type FetchSource = "cache" | "network" | "revalidated";

export interface FetchResourceOk {
  status: "ok";
  source: FetchSource;
  url: string;
  statusCode: number;
  body: string;
  fetchAt: Date;
  expiresAt: Date;
  pollingHintSec: number | null;
}

export interface FetchResourceRateLimited {
  status: "rate_limited";
  url: string;
  lastAttemptAt: Date;
  retryAfterSec: number;
}

export interface FetchResourceFailed {
  status: "failed";
  url: string;
  // 0 when no response arrived.
  statusCode: number;
  error: string;
}

export type FetchResourceResult = FetchResourceOk | FetchResourceRateLimited | FetchResourceFailed;

export interface ResourceFetcherDeps {
  store: FetchStateStore;
  http: HttpClient;
  config: FetchEngineConfig;
  logger: Logger;
}

type NetworkOutcome =
  | { kind: "response"; response: HttpResponse }
  | { kind: "transport_error"; error: string };

/**
 * Cache-aware, rate-limited GET. Every decision is re-derived from the store
 * under the URL's lock, so independent processes sharing a database never
 * double-fetch inside the rate-limit window.
 */
export class ResourceFetcher {
  constructor(private readonly deps: ResourceFetcherDeps) {}

  async fetch(url: string, now: Date, options: FetchResourceOptions = {}): Promise<FetchResourceResult> {
    return this.deps.store.withUrlLock(url, (tx) => this.fetchLocked(tx, url, now, options));
  }

  private async fetchLocked(
    tx: FetchStateTx,
    url: string,
    now: Date,
    options: FetchResourceOptions
  ): Promise<FetchResourceResult> {
    const { config, logger } = this.deps;
    const cached = await tx.getCacheEntry(url);

    if (!options.skipCache && cached && now.getTime() < cached.expiresAt.getTime()) {
      logger.debug("fetch.cache.hit", { url, expiresAt: cached.expiresAt.toISOString() });
      return {
        status: "ok",
        source: "cache",
        url,
        statusCode: 200,
        body: cached.body,
        fetchAt: cached.fetchAt,
        expiresAt: cached.expiresAt,
        pollingHintSec: remainingFreshnessSec(now, cached.expiresAt)
      };
    }

    if (!options.ignoreRateLimiting) {
      const last = await tx.lastAttempt(url);
      if (last) {
        // Whole seconds, matching the stored attempt times.
        const elapsedSec = toEpochSeconds(now) - toEpochSecondsCeil(last.fetchAt);
        if (elapsedSec < config.rateLimitWindowSec) {
          const retryAfterSec = config.rateLimitWindowSec - elapsedSec;
          logger.debug("fetch.rate_limited", { url, retryAfterSec });
          return { status: "rate_limited", url, lastAttemptAt: last.fetchAt, retryAfterSec };
        }
      }
    }

    const validators = options.skipCache ? null : cached;
    const headers = this.requestHeaders(validators, options);
    const outcome = await this.get(url, headers);

    await tx.recordAttempt({
      url,
      fetchAt: now,
      statusCode: outcome.kind === "response" ? outcome.response.statusCode : 0
    });

    if (outcome.kind === "transport_error") {
      logger.warn("fetch.transport_error", { url, error: outcome.error });
      return { status: "failed", url, statusCode: 0, error: outcome.error };
    }

    const { response } = outcome;
    if (response.statusCode === 304) {
      return this.handleNotModified(tx, url, now, response, validators, options);
    }
    if (response.statusCode === 200) {
      return this.handleOk(tx, url, now, response, options);
    }

    logger.warn("fetch.unexpected_status", { url, statusCode: response.statusCode });
    return {
      status: "failed",
      url,
      statusCode: response.statusCode,
      error: `HTTP ${response.statusCode}`
    };
  }

  private requestHeaders(
    cached: ResourceCacheEntry | null,
    options: FetchResourceOptions
  ): Record<string, string> {
    const headers: Record<string, string> = { "User-Agent": this.deps.config.userAgent };
    if (!cached) return headers;

    if (!options.suppressIfNoneMatch && cached.etag) {
      headers["If-None-Match"] = cached.etag;
    }
    if (!options.suppressIfModifiedSince) {
      headers["If-Modified-Since"] = cached.fetchAt.toUTCString();
    }
    return headers;
  }

  private async get(url: string, headers: Record<string, string>): Promise<NetworkOutcome> {
    try {
      const response = await this.deps.http.get({ url, headers, timeoutMs: this.deps.config.timeoutMs });
      return { kind: "response", response };
    } catch (error) {
      return { kind: "transport_error", error: errorMessage(error) };
    }
  }

  private async handleNotModified(
    tx: FetchStateTx,
    url: string,
    now: Date,
    response: HttpResponse,
    cached: ResourceCacheEntry | null,
    options: FetchResourceOptions
  ): Promise<FetchResourceResult> {
    if (!cached) {
      this.deps.logger.warn("fetch.unexpected_not_modified", { url });
      return { status: "failed", url, statusCode: 304, error: "304 Not Modified without a cached entry" };
    }

    const expiresAt = computeExpiresAt(now, response.header, this.deps.config.defaultExpirationSec);
    if (!options.suppressCacheWrite) {
      await tx.refreshCacheEntry(url, now, expiresAt);
    }

    this.deps.logger.debug("fetch.revalidated", { url, expiresAt: expiresAt.toISOString() });
    return {
      status: "ok",
      source: "revalidated",
      url,
      statusCode: 304,
      body: cached.body,
      fetchAt: now,
      expiresAt,
      pollingHintSec: pollingHintFromHeaders(response.header)
    };
  }

  private async handleOk(
    tx: FetchStateTx,
    url: string,
    now: Date,
    response: HttpResponse,
    options: FetchResourceOptions
  ): Promise<FetchResourceResult> {
    const expiresAt = computeExpiresAt(now, response.header, this.deps.config.defaultExpirationSec);
    if (!options.suppressCacheWrite) {
      await tx.putCacheEntry({
        url,
        fetchAt: now,
        expiresAt,
        etag: response.header("etag"),
        body: response.body
      });
    }

    this.deps.logger.debug("fetch.downloaded", { url, bytes: response.body.length });
    return {
      status: "ok",
      source: "network",
      url,
      statusCode: 200,
      body: response.body,
      fetchAt: now,
      expiresAt,
      pollingHintSec: pollingHintFromHeaders(response.header)
    };
  }
}

import type { CrawlConfig } from "../config/env";
import { errorMessage, isCrawlerError } from "../errors";
import type { FetchResourceOptions, FetchResourceResult } from "../fetch/resourceFetcher";
import type { Logger } from "../logging/logger";
import type { CrawlLedger } from "../store/ports";
import type { KnownManifest, ManifestFetch } from "../types/records";
import { mapWithConcurrency } from "../utils/concurrency";
import { resolveJurisdictions } from "./jurisdictions";
import { classifyOutput, LeafDescriptor, parseManifestFile, resolveOutputUrl } from "./manifestFile";
import { CrawlStats } from "./stats";

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = { now: () => new Date() };

export interface ResourceFetchPort {
  fetch(url: string, now: Date, options?: FetchResourceOptions): Promise<FetchResourceResult>;
}

export interface CrawlDeps {
  fetcher: ResourceFetchPort;
  ledger: CrawlLedger;
  clock: Clock;
  logger: Logger;
  config: CrawlConfig;
  /** Applied to every manifest and leaf fetch of the run. */
  fetchOptions?: FetchResourceOptions;
}

export type LeafStatus = "fetched" | "fetch_failed" | "rate_limited" | "skipped" | "error";

export interface LeafOutcome {
  kind: LeafDescriptor["kind"];
  url: string;
  status: LeafStatus;
  leafFetchId: number | null;
  statusCode: number | null;
  stateIds: number[];
  unknownStates: string[];
  error: string | null;
}

export type ManifestStatus =
  | "fetched"
  | "not_due"
  | "rate_limited"
  | "fetch_failed"
  | "parse_failed"
  | "error";

export interface ManifestOutcome {
  knownManifestId: number;
  url: string;
  status: ManifestStatus;
  manifestFetchId: number | null;
  statusCode: number | null;
  error: string | null;
  leaves: LeafOutcome[];
}

export interface CrawlRunResult {
  startedAt: Date;
  endedAt: Date;
  stats: CrawlStats;
  manifests: ManifestOutcome[];
}

const DEFAULT_MANIFEST_POLL_SEC = 180;

/** When the manifest may next be fetched; null when it has never been fetched. */
export function nextManifestFetchAt(
  lastFetch: ManifestFetch | null,
  defaultPollSec: number = DEFAULT_MANIFEST_POLL_SEC
): Date | null {
  if (!lastFetch) return null;
  const intervalSec = lastFetch.pollingHintSec ?? defaultPollSec;
  return new Date(lastFetch.readAt.getTime() + intervalSec * 1000);
}

export function shouldFetchManifest(
  lastFetch: ManifestFetch | null,
  now: Date,
  defaultPollSec: number = DEFAULT_MANIFEST_POLL_SEC
): boolean {
  const next = nextManifestFetchAt(lastFetch, defaultPollSec);
  return next === null || next.getTime() <= now.getTime();
}

function manifestOutcome(
  manifest: KnownManifest,
  status: ManifestStatus,
  extra: Partial<Omit<ManifestOutcome, "knownManifestId" | "url" | "status">> = {}
): ManifestOutcome {
  return {
    knownManifestId: manifest.id,
    url: manifest.url,
    status,
    manifestFetchId: null,
    statusCode: null,
    error: null,
    leaves: [],
    ...extra
  };
}

async function fetchLeaf(
  descriptor: LeafDescriptor,
  manifestFetch: ManifestFetch,
  deps: CrawlDeps,
  stats: CrawlStats
): Promise<LeafOutcome> {
  const { logger } = deps;
  const base = {
    leafFetchId: null,
    statusCode: null,
    stateIds: [],
    unknownStates: [],
    error: null
  };

  if (descriptor.kind === "unsupported") {
    logger.warn("crawl.leaf.unsupported_type", {
      manifestUrl: manifestFetch.url,
      fileType: descriptor.fileType,
      url: descriptor.url
    });
    return {
      ...base,
      url: descriptor.url,
      kind: "unsupported",
      status: "skipped",
      error: `unsupported type ${descriptor.fileType}`
    };
  }

  if (descriptor.kind === "invalid") {
    logger.warn("crawl.leaf.invalid_entry", {
      manifestUrl: manifestFetch.url,
      url: descriptor.url,
      reason: descriptor.reason
    });
    return { ...base, url: descriptor.url ?? "", kind: "invalid", status: "skipped", error: descriptor.reason };
  }

  const url = resolveOutputUrl(descriptor.url, manifestFetch.url);
  if (!url) {
    logger.warn("crawl.leaf.invalid_url", { manifestUrl: manifestFetch.url, url: descriptor.url });
    return { ...base, url: descriptor.url, kind: descriptor.kind, status: "skipped", error: "invalid url" };
  }

  stats.record(url, descriptor.kind);
  const readAt = deps.clock.now();
  const result = await deps.fetcher.fetch(url, readAt, deps.fetchOptions);

  if (result.status === "rate_limited") {
    logger.info("crawl.leaf.rate_limited", { url, kind: descriptor.kind, retryAfterSec: result.retryAfterSec });
    return { ...base, url, kind: descriptor.kind, status: "rate_limited" };
  }

  const { stateIds, unknownCodes } = resolveJurisdictions(descriptor.states);
  for (const code of unknownCodes) {
    logger.warn("crawl.leaf.unknown_state", { url, state: code });
  }

  const ok = result.status === "ok";
  const leafFetch = await deps.ledger.recordLeafFetch(
    {
      kind: descriptor.kind,
      url,
      manifestFetchId: manifestFetch.id,
      readAt,
      statusCode: result.statusCode,
      pollingHintSec: ok ? result.pollingHintSec : null,
      contents: ok ? result.body : null
    },
    stateIds
  );

  if (!ok) {
    logger.error("crawl.leaf.fetch_failed", {
      url,
      kind: descriptor.kind,
      statusCode: result.statusCode,
      error: result.error
    });
  }

  return {
    kind: descriptor.kind,
    url,
    status: ok ? "fetched" : "fetch_failed",
    leafFetchId: leafFetch.id,
    statusCode: result.statusCode,
    stateIds,
    unknownStates: unknownCodes,
    error: ok ? null : result.error
  };
}

/** A ledger failure on one leaf is reported on that leaf; its siblings still run. */
async function crawlLeaf(
  descriptor: LeafDescriptor,
  manifestFetch: ManifestFetch,
  deps: CrawlDeps,
  stats: CrawlStats
): Promise<LeafOutcome> {
  try {
    return await fetchLeaf(descriptor, manifestFetch, deps, stats);
  } catch (error) {
    deps.logger.error("crawl.leaf.error", {
      manifestUrl: manifestFetch.url,
      url: descriptor.url,
      code: isCrawlerError(error) ? error.code : undefined,
      error: errorMessage(error)
    });
    return {
      kind: descriptor.kind,
      url: descriptor.url ?? "",
      status: "error",
      leafFetchId: null,
      statusCode: null,
      stateIds: [],
      unknownStates: [],
      error: errorMessage(error)
    };
  }
}

/**
 * Fetches one known manifest and every leaf it names. Fetch and parse
 * failures end this manifest only; a failure writing the manifest row
 * propagates.
 */
export async function crawlManifest(
  manifest: KnownManifest,
  deps: CrawlDeps,
  stats: CrawlStats
): Promise<ManifestOutcome> {
  const { ledger, logger } = deps;
  logger.info("crawl.manifest.start", { url: manifest.url });
  stats.record(manifest.url, "manifest");

  const readAt = deps.clock.now();
  const result = await deps.fetcher.fetch(manifest.url, readAt, deps.fetchOptions);

  if (result.status === "rate_limited") {
    logger.info("crawl.manifest.rate_limited", { url: manifest.url, retryAfterSec: result.retryAfterSec });
    return manifestOutcome(manifest, "rate_limited");
  }

  if (result.status === "failed") {
    const failed = await ledger.recordManifestFetch({
      url: manifest.url,
      knownManifestId: manifest.id,
      readAt,
      statusCode: result.statusCode,
      pollingHintSec: null,
      contents: null
    });
    logger.error("crawl.manifest.fetch_failed", {
      url: manifest.url,
      statusCode: result.statusCode,
      error: result.error
    });
    return manifestOutcome(manifest, "fetch_failed", {
      manifestFetchId: failed.id,
      statusCode: result.statusCode,
      error: result.error
    });
  }

  const manifestFetch = await ledger.recordManifestFetch({
    url: manifest.url,
    knownManifestId: manifest.id,
    readAt,
    statusCode: result.statusCode,
    pollingHintSec: result.pollingHintSec,
    contents: result.body
  });

  let descriptors: LeafDescriptor[];
  try {
    descriptors = parseManifestFile(result.body).output.map(classifyOutput);
  } catch (error) {
    if (!isCrawlerError(error) || error.code !== "PARSE_FAILED") throw error;
    logger.error("crawl.manifest.parse_failed", { url: manifest.url, error: error.message });
    return manifestOutcome(manifest, "parse_failed", {
      manifestFetchId: manifestFetch.id,
      statusCode: result.statusCode,
      error: error.message
    });
  }

  const leaves = await mapWithConcurrency(descriptors, deps.config.leafConcurrency, (descriptor) =>
    crawlLeaf(descriptor, manifestFetch, deps, stats)
  );

  logger.info("crawl.manifest.done", {
    url: manifest.url,
    manifestFetchId: manifestFetch.id,
    leaves: leaves.length,
    failed: leaves.filter((leaf) => leaf.status === "fetch_failed").length,
    errors: leaves.filter((leaf) => leaf.status === "error").length
  });

  return manifestOutcome(manifest, "fetched", {
    manifestFetchId: manifestFetch.id,
    statusCode: result.statusCode,
    leaves
  });
}

async function crawlKnownManifest(
  manifest: KnownManifest,
  deps: CrawlDeps,
  stats: CrawlStats
): Promise<ManifestOutcome> {
  try {
    const lastFetch = await deps.ledger.lastManifestFetch(manifest.id);
    if (!shouldFetchManifest(lastFetch, deps.clock.now(), deps.config.manifestPollDefaultSec)) {
      deps.logger.info("crawl.manifest.not_due", {
        url: manifest.url,
        nextFetchAt: nextManifestFetchAt(lastFetch, deps.config.manifestPollDefaultSec)?.toISOString()
      });
      return manifestOutcome(manifest, "not_due");
    }
    return await crawlManifest(manifest, deps, stats);
  } catch (error) {
    deps.logger.error("crawl.manifest.error", {
      url: manifest.url,
      code: isCrawlerError(error) ? error.code : undefined,
      error: errorMessage(error)
    });
    return manifestOutcome(manifest, "error", { error: errorMessage(error) });
  }
}

/** One pass over every known manifest. Repetition over time is left to the caller. */
export async function runCrawl(deps: CrawlDeps): Promise<CrawlRunResult> {
  const stats = new CrawlStats();
  const startedAt = deps.clock.now();
  stats.markStart(startedAt);

  const known = await deps.ledger.listKnownManifests();
  deps.logger.info("crawl.run.start", { manifests: known.length });

  const manifests = await mapWithConcurrency(known, deps.config.manifestConcurrency, (manifest) =>
    crawlKnownManifest(manifest, deps, stats)
  );

  const endedAt = deps.clock.now();
  stats.markEnd(endedAt);
  deps.logger.info("crawl.run.done", { ...stats.toJSON() });

  return { startedAt, endedAt, stats, manifests };
}

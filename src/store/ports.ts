// Storage ports for the fetch engine and the crawl ledger. The Postgres
// implementations live in src/db; tests run against in-process stores.
import type {
  FetchAttempt,
  KnownManifest,
  LeafFetch,
  ManifestFetch,
  NewLeafFetch,
  NewManifestFetch,
  ResourceCacheEntry
} from "../types/records";

/** Reads and writes scoped to a single URL while its lock is held. */
export interface FetchStateTx {
  getCacheEntry(url: string): Promise<ResourceCacheEntry | null>;
  /** Insert or overwrite the single current entry for the URL. */
  putCacheEntry(entry: ResourceCacheEntry): Promise<void>;
  refreshCacheEntry(url: string, fetchAt: Date, expiresAt: Date): Promise<void>;
  lastAttempt(url: string): Promise<FetchAttempt | null>;
  recordAttempt(attempt: FetchAttempt): Promise<void>;
}

export interface FetchStateStore {
  /**
   * Runs `work` with exclusive access to `url`. Two calls for the same URL,
   * from this process or another, never overlap.
   */
  withUrlLock<T>(url: string, work: (tx: FetchStateTx) => Promise<T>): Promise<T>;
}

export interface CrawlLedger {
  listKnownManifests(): Promise<KnownManifest[]>;
  /** Returns the existing row when the URL is already known. */
  addKnownManifest(url: string): Promise<KnownManifest>;
  /** The most recent fetch, successful or not. */
  lastManifestFetch(knownManifestId: number): Promise<ManifestFetch | null>;
  recordManifestFetch(row: NewManifestFetch): Promise<ManifestFetch>;
  /** Writes the leaf row and its jurisdiction tags together. */
  recordLeafFetch(row: NewLeafFetch, stateIds: number[]): Promise<LeafFetch>;
}

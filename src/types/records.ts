export type LeafKind = "location" | "schedule" | "slot";

export interface KnownManifest {
  id: number;
  url: string;
}

export interface FetchAttempt {
  url: string;
  fetchAt: Date;
  // 0 when the request never produced a response (transport error or timeout).
  statusCode: number;
}

export interface ResourceCacheEntry {
  url: string;
  fetchAt: Date;
  expiresAt: Date;
  etag: string | null;
  body: string;
}

export interface ManifestFetch {
  id: number;
  url: string;
  knownManifestId: number;
  readAt: Date;
  statusCode: number;
  pollingHintSec: number | null;
  contents: string | null;
}

export type NewManifestFetch = Omit<ManifestFetch, "id">;

export interface LeafFetch {
  id: number;
  kind: LeafKind;
  url: string;
  manifestFetchId: number;
  readAt: Date;
  statusCode: number;
  pollingHintSec: number | null;
  contents: string | null;
}

export type NewLeafFetch = Omit<LeafFetch, "id">;

export interface JurisdictionTag {
  kind: LeafKind;
  leafFetchId: number;
  stateId: number;
}

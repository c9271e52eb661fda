import type { LeafStatus, ManifestStatus } from "../crawl/orchestrator";
import type { CrawlStatsSnapshot } from "../crawl/stats";

export interface CrawlReportLeaf {
  kind: string;
  url: string;
  status: LeafStatus;
  leaf_fetch_id: number | null;
  status_code: number | null;
  state_ids: number[];
  unknown_states: string[];
  error: string | null;
}

export interface CrawlReportManifest {
  known_manifest_id: number;
  url: string;
  status: ManifestStatus;
  manifest_fetch_id: number | null;
  status_code: number | null;
  error: string | null;
  leaves: CrawlReportLeaf[];
}

export interface CrawlReport {
  schema_version: "1.0";
  run_id: string;
  out_dir: string;
  run_dir: string;
  started_at: string;
  ended_at: string;
  stats: CrawlStatsSnapshot;
  manifests: CrawlReportManifest[];
}

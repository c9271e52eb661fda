import { crawlReportPath, runDir } from "./paths";
import { writeJson } from "../utils/fs";
import { toUtcIsoSeconds } from "../utils/time";
import type { CrawlRunResult, LeafOutcome, ManifestOutcome } from "../crawl/orchestrator";
import { CrawlReport, CrawlReportLeaf, CrawlReportManifest } from "../types/crawlReport";

export interface CrawlReportParams {
  runId: string;
  outDir: string;
  result: CrawlRunResult;
}

function toReportLeaf(leaf: LeafOutcome): CrawlReportLeaf {
  return {
    kind: leaf.kind,
    url: leaf.url,
    status: leaf.status,
    leaf_fetch_id: leaf.leafFetchId,
    status_code: leaf.statusCode,
    state_ids: leaf.stateIds,
    unknown_states: leaf.unknownStates,
    error: leaf.error
  };
}

function toReportManifest(manifest: ManifestOutcome): CrawlReportManifest {
  return {
    known_manifest_id: manifest.knownManifestId,
    url: manifest.url,
    status: manifest.status,
    manifest_fetch_id: manifest.manifestFetchId,
    status_code: manifest.statusCode,
    error: manifest.error,
    leaves: manifest.leaves.map(toReportLeaf)
  };
}

export function buildCrawlReport(params: CrawlReportParams): CrawlReport {
  return {
    schema_version: "1.0",
    run_id: params.runId,
    out_dir: params.outDir,
    run_dir: runDir(params.outDir, params.runId),
    started_at: toUtcIsoSeconds(params.result.startedAt),
    ended_at: toUtcIsoSeconds(params.result.endedAt),
    stats: params.result.stats.toJSON(),
    manifests: params.result.manifests.map(toReportManifest)
  };
}

export async function writeCrawlReport(report: CrawlReport): Promise<string> {
  const filePath = crawlReportPath(report.out_dir, report.run_id);
  await writeJson(filePath, report);
  return filePath;
}

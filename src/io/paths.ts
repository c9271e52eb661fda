import path from "path";

export function runDir(outDir: string, runId: string): string {
  return path.join(outDir, runId);
}

export function crawlReportPath(outDir: string, runId: string): string {
  return path.join(runDir(outDir, runId), "crawl_report.json");
}

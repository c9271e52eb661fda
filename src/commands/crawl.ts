import path from "path";
import { runCrawl, systemClock } from "../crawl/orchestrator";
import { buildCrawlReport, writeCrawlReport } from "../io/crawlReport";
import { toUtcIsoFileSafe } from "../utils/time";
import { withCommandContext } from "./context";

export interface CrawlCommandOptions {
  outDir?: string;
  runId?: string;
  ignoreRateLimiting: boolean;
  skipCache: boolean;
}

export async function runCrawlCommand(options: CrawlCommandOptions): Promise<void> {
  await withCommandContext(async ({ config, logger, ledger, fetcher }) => {
    const result = await runCrawl({
      fetcher,
      ledger,
      clock: systemClock,
      logger,
      config: config.crawl,
      fetchOptions: {
        ignoreRateLimiting: options.ignoreRateLimiting,
        skipCache: options.skipCache
      }
    });

    console.log(result.stats.format());

    if (options.outDir) {
      const report = buildCrawlReport({
        runId: options.runId ?? toUtcIsoFileSafe(result.startedAt),
        outDir: path.resolve(options.outDir),
        result
      });
      const reportPath = await writeCrawlReport(report);
      console.log(`Crawl report written to ${reportPath}`);
    }

    const errored = result.manifests.some(
      (manifest) => manifest.status === "error" || manifest.leaves.some((leaf) => leaf.status === "error")
    );
    if (errored) {
      process.exitCode = 1;
    }
  });
}

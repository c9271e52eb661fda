import { loadManifestList, validateManifestUrl } from "../config/manifestList";
import { nextManifestFetchAt } from "../crawl/orchestrator";
import type { CrawlLedger } from "../store/ports";
import type { KnownManifest } from "../types/records";
import { withCommandContext } from "./context";

async function addAll(ledger: CrawlLedger, urls: string[]): Promise<KnownManifest[]> {
  const added: KnownManifest[] = [];
  for (const url of urls) {
    added.push(await ledger.addKnownManifest(url));
  }
  return added;
}

export async function runManifestsAdd(urls: string[]): Promise<void> {
  const valid = urls.map((url) => validateManifestUrl(url));
  await withCommandContext(async ({ ledger }) => {
    for (const manifest of await addAll(ledger, valid)) {
      console.log(`${manifest.id}\t${manifest.url}`);
    }
  });
}

export async function runManifestsImport(filePath: string): Promise<void> {
  const list = await loadManifestList(filePath);
  await withCommandContext(async ({ ledger, logger }) => {
    for (const issue of list.issues) {
      logger.warn("manifests.import.invalid_line", { file: filePath, ...issue });
    }
    const added = await addAll(ledger, list.urls.map((entry) => entry.url));
    console.log(`Imported ${added.length} manifest URL(s); ${list.issues.length} line(s) rejected.`);
    if (list.issues.length > 0) {
      process.exitCode = 1;
    }
  });
}

export async function runManifestsList(): Promise<void> {
  await withCommandContext(async ({ config, ledger }) => {
    const now = new Date();
    const known = await ledger.listKnownManifests();
    if (known.length === 0) {
      console.log("No known manifests.");
      return;
    }
    for (const manifest of known) {
      const last = await ledger.lastManifestFetch(manifest.id);
      const next = nextManifestFetchAt(last, config.crawl.manifestPollDefaultSec);
      const due = next === null || next.getTime() <= now.getTime() ? "due" : `next ${next.toISOString()}`;
      const lastText = last ? `${last.statusCode} at ${last.readAt.toISOString()}` : "never fetched";
      console.log(`${manifest.id}\t${manifest.url}\t${lastText}\t${due}`);
    }
  });
}

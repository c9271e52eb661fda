import { FetchResourceOptions, FetchResourceResult } from "../fetch/resourceFetcher";
import { withCommandContext } from "./context";

export interface FetchCommandOptions extends FetchResourceOptions {
  url: string;
  printBody: boolean;
}

export function describeFetchResult(result: FetchResourceResult): Record<string, unknown> {
  switch (result.status) {
    case "ok":
      return {
        status: result.status,
        source: result.source,
        url: result.url,
        status_code: result.statusCode,
        fetch_at: result.fetchAt.toISOString(),
        expires_at: result.expiresAt.toISOString(),
        polling_hint_sec: result.pollingHintSec,
        bytes: result.body.length
      };
    case "rate_limited":
      return {
        status: result.status,
        url: result.url,
        last_attempt_at: result.lastAttemptAt.toISOString(),
        retry_after_sec: result.retryAfterSec
      };
    case "failed":
      return {
        status: result.status,
        url: result.url,
        status_code: result.statusCode,
        error: result.error
      };
  }
}

export async function runFetchCommand(options: FetchCommandOptions): Promise<void> {
  const { url, printBody, ...fetchOptions } = options;
  await withCommandContext(async ({ fetcher }) => {
    const result = await fetcher.fetch(url, new Date(), fetchOptions);
    console.log(JSON.stringify(describeFetchResult(result), null, 2));
    if (printBody && result.status === "ok") {
      console.log(result.body);
    }
    if (result.status === "failed") {
      process.exitCode = 1;
    }
  });
}

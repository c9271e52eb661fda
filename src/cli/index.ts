#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command } from "commander";
import pkg from "../../package.json";
import { runCrawlCommand } from "../commands/crawl";
import { runFetchCommand } from "../commands/fetch";
import { runManifestsAdd, runManifestsImport, runManifestsList } from "../commands/manifests";
import { runMigrateCommand } from "../commands/migrate";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.CRAWLER_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

const defaultEnvPath = path.resolve(process.cwd(), ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

const program = new Command();

program
  .name("availability-crawler")
  .description("Polls slot-availability manifests and records every location, schedule and slot fetch")
  .version(pkg.version);

program.option(
  "--env-file <path>",
  "Path to .env file (overrides CRAWLER_ENV_FILE/DOTENV_CONFIG_PATH)",
  envPath
);

program
  .command("migrate")
  .description("Create the ledger tables and seed the state table")
  .option("--schema <path>", "Path to schema.sql (defaults to the bundled sql/schema.sql)")
  .action(async (opts: { schema?: string }) => {
    await runMigrateCommand({ schemaPath: opts.schema });
  });

const manifests = program.command("manifests").description("Manage the known manifest list");

manifests
  .command("add")
  .argument("<url...>", "Manifest URLs")
  .action(async (urls: string[]) => {
    await runManifestsAdd(urls);
  });

manifests
  .command("import")
  .requiredOption("--file <path>", "Text file with one manifest URL per line")
  .action(async (opts: { file: string }) => {
    await runManifestsImport(opts.file);
  });

manifests
  .command("list")
  .description("List known manifests with their last fetch and due status")
  .action(async () => {
    await runManifestsList();
  });

program
  .command("crawl")
  .description("Run one pass over every known manifest")
  .option("--out <dir>", "Write <out>/<run-id>/crawl_report.json")
  .option("--run-id <id>", "Run ID for the report directory (default: start time, e.g. 2026-01-05T10-00-00Z)")
  .option("--skip-cache", "Ignore cached entries", false)
  .option("--ignore-rate-limit", "Fetch even inside the rate-limit window", false)
  .action(
    async (opts: { out?: string; runId?: string; skipCache: boolean; ignoreRateLimit: boolean }) => {
      await runCrawlCommand({
        outDir: opts.out,
        runId: opts.runId,
        skipCache: opts.skipCache,
        ignoreRateLimiting: opts.ignoreRateLimit
      });
    }
  );

program
  .command("fetch")
  .description("Fetch one URL through the cache and rate limiter")
  .argument("<url>", "Resource URL")
  .option("--skip-cache", "Ignore any cached entry and send no validators", false)
  .option("--ignore-rate-limit", "Fetch even inside the rate-limit window", false)
  .option("--no-if-none-match", "Do not send If-None-Match")
  .option("--no-if-modified-since", "Do not send If-Modified-Since")
  .option("--no-cache-write", "Leave the cache untouched")
  .option("--body", "Print the response body", false)
  .action(
    async (
      url: string,
      opts: {
        skipCache: boolean;
        ignoreRateLimit: boolean;
        ifNoneMatch: boolean;
        ifModifiedSince: boolean;
        cacheWrite: boolean;
        body: boolean;
      }
    ) => {
      await runFetchCommand({
        url,
        printBody: opts.body,
        skipCache: opts.skipCache,
        ignoreRateLimiting: opts.ignoreRateLimit,
        suppressIfNoneMatch: !opts.ifNoneMatch,
        suppressIfModifiedSince: !opts.ifModifiedSince,
        suppressCacheWrite: !opts.cacheWrite
      });
    }
  );

program.parseAsync().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});

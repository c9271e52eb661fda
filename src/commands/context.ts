import { CrawlerConfig, loadConfig, requireDatabaseUrl } from "../config/env";
import { openDb, DbHandle, PgCrawlLedger, PgFetchStateStore } from "../db";
import { errorMessage } from "../errors";
import { FetchHttpClient } from "../fetch/httpClient";
import { ResourceFetcher } from "../fetch/resourceFetcher";
import { ConsoleLogger, Logger } from "../logging/logger";

export interface CommandContext {
  config: CrawlerConfig;
  logger: Logger;
  db: DbHandle;
  ledger: PgCrawlLedger;
  fetcher: ResourceFetcher;
}

/** Opens the database for the duration of `work` and always closes it. */
export async function withCommandContext<T>(work: (ctx: CommandContext) => Promise<T>): Promise<T> {
  const config = loadConfig();
  const logger = new ConsoleLogger(config.logLevel);
  const db = openDb({
    connectionString: requireDatabaseUrl(config),
    ssl: config.databaseSsl,
    max: config.dbPoolMax
  });

  const fetcher = new ResourceFetcher({
    store: new PgFetchStateStore(db.db),
    http: new FetchHttpClient(),
    config: config.fetch,
    logger
  });

  try {
    return await work({ config, logger, db, ledger: new PgCrawlLedger(db.db), fetcher });
  } finally {
    await db.close().catch((error: unknown) => {
      logger.warn("db.close_failed", { error: errorMessage(error) });
    });
  }
}

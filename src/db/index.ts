export { openDb } from "./client";
export type { DbHandle, DbOptions, DbExecutor } from "./client";
export { PgCrawlLedger } from "./crawlLedger";
export { PgFetchStateStore } from "./fetchStateStore";
export { migrate } from "./migrate";

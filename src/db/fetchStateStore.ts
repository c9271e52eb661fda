import { desc, eq, sql } from "drizzle-orm";
import { NodePgDatabase } from "drizzle-orm/node-postgres";
import type { FetchStateStore, FetchStateTx } from "../store/ports";
import type { FetchAttempt, ResourceCacheEntry } from "../types/records";
import { DbExecutor } from "./client";
import { fetchAttempts, resourceCache } from "./schema";
import { withStorageErrors } from "./storageErrors";
import { fromEpochSeconds, toEpochSeconds, toEpochSecondsCeil } from "../utils/time";

// First key of the two-key advisory lock, so URL locks cannot collide with
// other users of pg_advisory_xact_lock on the same database.
const URL_LOCK_NAMESPACE = 4201;

class PgFetchStateTx implements FetchStateTx {
  /**
   * `tx` is the URL's locked transaction. Attempts go through `db` as their
   * own statement, so a later failure rolling back `tx` still leaves the
   * attempt recorded.
   */
  constructor(
    private readonly tx: DbExecutor,
    private readonly db: DbExecutor
  ) {}

  getCacheEntry(url: string): Promise<ResourceCacheEntry | null> {
    return withStorageErrors("read resource_cache", { url }, async () => {
      const rows = await this.tx
        .select()
        .from(resourceCache)
        .where(eq(resourceCache.url, url))
        .limit(1);
      const row = rows[0];
      if (!row) return null;
      return {
        url: row.url,
        fetchAt: fromEpochSeconds(row.fetchSec),
        expiresAt: fromEpochSeconds(row.expiresAtSec),
        etag: row.etag,
        body: row.data
      };
    });
  }

  putCacheEntry(entry: ResourceCacheEntry): Promise<void> {
    return withStorageErrors("write resource_cache", { url: entry.url }, async () => {
      const values = {
        fetchSec: toEpochSeconds(entry.fetchAt),
        expiresAtSec: toEpochSeconds(entry.expiresAt),
        etag: entry.etag,
        data: entry.body
      };
      await this.tx
        .insert(resourceCache)
        .values({ url: entry.url, ...values })
        .onConflictDoUpdate({ target: resourceCache.url, set: values });
    });
  }

  refreshCacheEntry(url: string, fetchAt: Date, expiresAt: Date): Promise<void> {
    return withStorageErrors("refresh resource_cache", { url }, async () => {
      await this.tx
        .update(resourceCache)
        .set({ fetchSec: toEpochSeconds(fetchAt), expiresAtSec: toEpochSeconds(expiresAt) })
        .where(eq(resourceCache.url, url));
    });
  }

  lastAttempt(url: string): Promise<FetchAttempt | null> {
    return withStorageErrors("read fetch_attempts", { url }, async () => {
      const rows = await this.tx
        .select()
        .from(fetchAttempts)
        .where(eq(fetchAttempts.url, url))
        .orderBy(desc(fetchAttempts.fetchSec), desc(fetchAttempts.id))
        .limit(1);
      const row = rows[0];
      if (!row) return null;
      return { url: row.url, fetchAt: fromEpochSeconds(row.fetchSec), statusCode: row.statusCode };
    });
  }

  recordAttempt(attempt: FetchAttempt): Promise<void> {
    return withStorageErrors("write fetch_attempts", { url: attempt.url }, async () => {
      await this.db.insert(fetchAttempts).values({
        url: attempt.url,
        // Rounded up so the rate-limit window never shrinks below its length.
        fetchSec: toEpochSecondsCeil(attempt.fetchAt),
        statusCode: attempt.statusCode
      });
    });
  }
}

/**
 * Each URL's read-decide-write sequence runs in its own transaction holding a
 * transaction-scoped advisory lock on the URL, which serializes crawlers in
 * separate processes. The lock and its connection are held across the HTTP
 * request, and attempts are written on a second connection, so the pool must
 * be larger than the crawl's fetch concurrency (checked by loadConfig).
 */
export class PgFetchStateStore implements FetchStateStore {
  constructor(private readonly db: NodePgDatabase) {}

  withUrlLock<T>(url: string, work: (tx: FetchStateTx) => Promise<T>): Promise<T> {
    return withStorageErrors("fetch state transaction", { url }, () =>
      this.db.transaction(async (tx) => {
        await tx.execute(sql`select pg_advisory_xact_lock(${URL_LOCK_NAMESPACE}, hashtext(${url}))`);
        return work(new PgFetchStateTx(tx, this.db));
      })
    );
  }
}

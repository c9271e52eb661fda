import { asc, desc, eq } from "drizzle-orm";
import { NodePgDatabase } from "drizzle-orm/node-postgres";
import type { CrawlLedger } from "../store/ports";
import type {
  KnownManifest,
  LeafFetch,
  LeafKind,
  ManifestFetch,
  NewLeafFetch,
  NewManifestFetch
} from "../types/records";
import {
  knownManifests,
  locationFetches,
  locationStates,
  manifestFetches,
  scheduleFetches,
  scheduleStates,
  slotFetches,
  slotStates
} from "./schema";
import { withStorageErrors } from "./storageErrors";
import { fromEpochSeconds, toEpochSeconds } from "../utils/time";

const LEAF_TABLES = {
  location: { fetches: locationFetches, states: locationStates },
  schedule: { fetches: scheduleFetches, states: scheduleStates },
  slot: { fetches: slotFetches, states: slotStates }
} satisfies Record<LeafKind, { fetches: typeof locationFetches; states: typeof locationStates }>;

function toManifestFetch(row: typeof manifestFetches.$inferSelect): ManifestFetch {
  return {
    id: row.id,
    url: row.url,
    knownManifestId: row.knownManifestId,
    readAt: fromEpochSeconds(row.readSec),
    statusCode: row.fetchStatusCode,
    pollingHintSec: row.pollingHintSec,
    contents: row.contents
  };
}

/** Append-only ledger handed to the downstream parser. */
export class PgCrawlLedger implements CrawlLedger {
  constructor(private readonly db: NodePgDatabase) {}

  listKnownManifests(): Promise<KnownManifest[]> {
    return withStorageErrors("list known_manifests", {}, () =>
      this.db
        .select({ id: knownManifests.id, url: knownManifests.url })
        .from(knownManifests)
        .orderBy(asc(knownManifests.id))
    );
  }

  addKnownManifest(url: string): Promise<KnownManifest> {
    return withStorageErrors("add known_manifest", { url }, async () => {
      const inserted = await this.db
        .insert(knownManifests)
        .values({ url })
        .onConflictDoNothing({ target: knownManifests.url })
        .returning({ id: knownManifests.id, url: knownManifests.url });
      if (inserted[0]) return inserted[0];

      const existing = await this.db
        .select({ id: knownManifests.id, url: knownManifests.url })
        .from(knownManifests)
        .where(eq(knownManifests.url, url))
        .limit(1);
      if (!existing[0]) {
        throw new Error(`known manifest ${url} vanished after conflicting insert`);
      }
      return existing[0];
    });
  }

  lastManifestFetch(knownManifestId: number): Promise<ManifestFetch | null> {
    return withStorageErrors("read manifest_fetches", { knownManifestId }, async () => {
      const rows = await this.db
        .select()
        .from(manifestFetches)
        .where(eq(manifestFetches.knownManifestId, knownManifestId))
        .orderBy(desc(manifestFetches.readSec), desc(manifestFetches.id))
        .limit(1);
      return rows[0] ? toManifestFetch(rows[0]) : null;
    });
  }

  recordManifestFetch(row: NewManifestFetch): Promise<ManifestFetch> {
    return withStorageErrors("write manifest_fetches", { url: row.url }, async () => {
      const inserted = await this.db
        .insert(manifestFetches)
        .values({
          url: row.url,
          knownManifestId: row.knownManifestId,
          readSec: toEpochSeconds(row.readAt),
          fetchStatusCode: row.statusCode,
          pollingHintSec: row.pollingHintSec,
          contents: row.contents
        })
        .returning();
      return toManifestFetch(inserted[0]);
    });
  }

  recordLeafFetch(row: NewLeafFetch, stateIds: number[]): Promise<LeafFetch> {
    const tables = LEAF_TABLES[row.kind];
    return withStorageErrors("write leaf fetch", { kind: row.kind, url: row.url }, () =>
      this.db.transaction(async (tx) => {
        const inserted = await tx
          .insert(tables.fetches)
          .values({
            url: row.url,
            manifestFetchId: row.manifestFetchId,
            readSec: toEpochSeconds(row.readAt),
            fetchStatusCode: row.statusCode,
            pollingHintSec: row.pollingHintSec,
            contents: row.contents
          })
          .returning({ id: tables.fetches.id });
        const id = inserted[0].id;

        if (stateIds.length > 0) {
          await tx.insert(tables.states).values(stateIds.map((stateId) => ({ leafFetchId: id, stateId })));
        }

        return { ...row, id };
      })
    );
  }
}

import {
  pgTable,
  text,
  bigint,
  integer,
  serial,
  index,
  uniqueIndex,
  primaryKey
} from "drizzle-orm/pg-core";

// Times are stored as whole seconds since the Unix epoch.
const epochSeconds = (name: string) => bigint(name, { mode: "number" });

export const knownManifests = pgTable(
  "known_manifests",
  {
    id: serial("known_manifest_id").primaryKey(),
    url: text("url").notNull()
  },
  (table) => ({
    knownManifestsUrlUnique: uniqueIndex("known_manifests_by_url").on(table.url)
  })
);

export const fetchAttempts = pgTable(
  "fetch_attempts",
  {
    id: serial("fetch_attempt_id").primaryKey(),
    url: text("url").notNull(),
    fetchSec: epochSeconds("fetch_sec").notNull(),
    statusCode: integer("status_code").notNull()
  },
  (table) => ({
    fetchAttemptsByUrl: index("fetch_attempts_by_url").on(table.url, table.fetchSec)
  })
);

export const resourceCache = pgTable(
  "resource_cache",
  {
    id: serial("resource_cache_id").primaryKey(),
    url: text("url").notNull(),
    fetchSec: epochSeconds("fetch_sec").notNull(),
    expiresAtSec: epochSeconds("expires_at_sec").notNull(),
    etag: text("etag"),
    data: text("data").notNull()
  },
  (table) => ({
    resourceCacheUrlUnique: uniqueIndex("resource_cache_by_url").on(table.url)
  })
);

export const manifestFetches = pgTable(
  "manifest_fetches",
  {
    id: serial("manifest_fetch_id").primaryKey(),
    url: text("url").notNull(),
    knownManifestId: integer("known_manifest_id")
      .notNull()
      .references(() => knownManifests.id, { onDelete: "cascade" }),
    readSec: epochSeconds("read_sec").notNull(),
    fetchStatusCode: integer("fetch_status_code").notNull(),
    pollingHintSec: integer("polling_hint_sec"),
    contents: text("contents")
  },
  (table) => ({
    manifestFetchesByKnown: index("manifest_fetches_by_known").on(table.knownManifestId, table.readSec)
  })
);

// Location, schedule and slot fetches share one shape.
function leafFetchTable(tableName: string, idColumn: string) {
  return pgTable(
    tableName,
    {
      id: serial(idColumn).primaryKey(),
      url: text("url").notNull(),
      manifestFetchId: integer("manifest_fetch_id")
        .notNull()
        .references(() => manifestFetches.id, { onDelete: "cascade" }),
      readSec: epochSeconds("read_sec").notNull(),
      fetchStatusCode: integer("fetch_status_code").notNull(),
      pollingHintSec: integer("polling_hint_sec"),
      contents: text("contents")
    },
    (table) => ({
      byManifestFetch: index(`${tableName}_by_manifest_fetch`).on(table.manifestFetchId)
    })
  );
}

export const locationFetches = leafFetchTable("location_fetches", "location_fetch_id");
export const scheduleFetches = leafFetchTable("schedule_fetches", "schedule_fetch_id");
export const slotFetches = leafFetchTable("slot_fetches", "slot_fetch_id");

export const states = pgTable("states", {
  id: integer("state_id").primaryKey(),
  name: text("name").notNull()
});

function leafStateTable(tableName: string, leafTable: typeof locationFetches) {
  return pgTable(
    tableName,
    {
      leafFetchId: integer("leaf_fetch_id")
        .notNull()
        .references(() => leafTable.id, { onDelete: "cascade" }),
      stateId: integer("state_id")
        .notNull()
        .references(() => states.id, { onDelete: "cascade" })
    },
    (table) => ({
      pk: primaryKey({ columns: [table.leafFetchId, table.stateId] })
    })
  );
}

export const locationStates = leafStateTable("location_states", locationFetches);
export const scheduleStates = leafStateTable("schedule_states", scheduleFetches);
export const slotStates = leafStateTable("slot_states", slotFetches);

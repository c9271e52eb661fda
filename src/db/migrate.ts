import { sql } from "drizzle-orm";
import { STATES } from "../crawl/jurisdictions";
import { CrawlerError } from "../errors";
import { findUpward, readText } from "../utils/fs";
import { DbHandle } from "./client";
import { states } from "./schema";
import { withStorageErrors } from "./storageErrors";

export async function locateSchemaSql(): Promise<string> {
  const found = await findUpward(__dirname, "sql/schema.sql");
  if (!found) {
    throw new CrawlerError("CONFIG_ERROR", `sql/schema.sql not found above ${__dirname}`);
  }
  return found;
}

/** Applies the idempotent schema and upserts the fixed state table. */
export async function migrate(handle: DbHandle, schemaPath?: string): Promise<{ states: number }> {
  const ddl = await readText(schemaPath ?? (await locateSchemaSql()));

  await withStorageErrors("apply schema", {}, async () => {
    // Multi-statement text goes through the simple query protocol.
    await handle.pool.query(ddl);
  });

  await withStorageErrors("seed states", {}, async () => {
    await handle.db
      .insert(states)
      .values(STATES.map((row) => ({ id: row.id, name: row.code })))
      .onConflictDoUpdate({ target: states.id, set: { name: sql`excluded.name` } });
  });

  return { states: STATES.length };
}

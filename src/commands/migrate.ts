import { migrate } from "../db";
import { withCommandContext } from "./context";

export interface MigrateCommandOptions {
  schemaPath?: string;
}

export async function runMigrateCommand(options: MigrateCommandOptions): Promise<void> {
  await withCommandContext(async ({ db, logger }) => {
    const result = await migrate(db, options.schemaPath);
    logger.info("db.migrated", { states: result.states });
    console.log(`Schema applied; ${result.states} states seeded.`);
  });
}

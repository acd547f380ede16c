/**
 * Info command - show database location, schema version and record count
 */

import { getSchemaVersion } from "@pixvault/store-sql";
import { type CliConfig, CliError } from "../config.js";
import { bold, withVault } from "../shared.js";

export async function runInfo(args: string[], config: CliConfig): Promise<void> {
  if (args.length > 0) {
    throw new CliError(`info takes no arguments, got: ${args.join(" ")}`);
  }

  await withVault(config, async ({ db, store }) => {
    console.log(`${bold("Database:")} ${config.dbPath}`);
    console.log(`${bold("Schema version:")} ${await getSchemaVersion(db)}`);
    console.log(`${bold("Records:")} ${await store.count()}`);
  });
}

/**
 * Schema migration entry point: `npm run migrate` after `npm run build`.
 */

import { createLogger } from "@shortlane/logger";
import { createPgClient } from "./client.js";
import { migrate } from "./schema.js";

const log = createLogger("migrate");

async function main(): Promise<void> {
  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error("Missing required environment variable: DATABASE_URL");
  }

  const client = createPgClient({ connectionString, max: 1 });
  try {
    await migrate(client);
    log.info("Schema is up to date");
  } finally {
    await client.end();
  }
}

main().catch((err: unknown) => {
  log.error({ err }, "Migration failed");
  process.exit(1);
});

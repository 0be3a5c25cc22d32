/**
 * @shortlane/db - Database Package
 *
 * Storage contracts, their PostgreSQL and in-memory implementations, and
 * the storage error types.
 *
 * Usage:
 * ```ts
 * import { createPgClient, PgLinkStore, RetryingLinkStore } from "@shortlane/db";
 *
 * const client = createPgClient({ connectionString: "postgres://localhost/shortlane" });
 * const links = new RetryingLinkStore(new PgLinkStore(client));
 * const link = await links.findByCode("aB3xY9");
 * ```
 */

export * from "./client.js";

export * from "./errors.js";

export * from "./retry.js";

export * from "./schema.js";

export * from "./types.js";

export * from "./stores/types.js";
export * from "./stores/pg-link-store.js";
export * from "./stores/pg-user-store.js";
export * from "./stores/memory.js";
export * from "./stores/retrying-stores.js";

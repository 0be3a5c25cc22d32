/**
 * PostgreSQL schema
 *
 * links.short_code carries the unique constraint that decides code
 * uniqueness; the API treats a violation of links_short_code_key as a
 * collision.
 */

import type { Queryable } from "./client.js";

export const LINKS_CODE_CONSTRAINT = "links_short_code_key";
export const USERS_EMAIL_CONSTRAINT = "users_email_key";

export const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS users (
    id UUID PRIMARY KEY,
    email VARCHAR(255) NOT NULL,
    hashed_password TEXT NOT NULL,
    active BOOLEAN NOT NULL DEFAULT TRUE,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    CONSTRAINT ${USERS_EMAIL_CONSTRAINT} UNIQUE (email)
  )`,
  `CREATE TABLE IF NOT EXISTS links (
    id BIGSERIAL PRIMARY KEY,
    short_code VARCHAR(50) NOT NULL,
    destination VARCHAR(2048) NOT NULL,
    title VARCHAR(255),
    enabled BOOLEAN NOT NULL DEFAULT TRUE,
    click_count BIGINT NOT NULL DEFAULT 0 CHECK (click_count >= 0),
    last_clicked_at TIMESTAMPTZ,
    owner_id UUID NOT NULL REFERENCES users (id) ON DELETE CASCADE,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    CONSTRAINT ${LINKS_CODE_CONSTRAINT} UNIQUE (short_code)
  )`,
  `CREATE INDEX IF NOT EXISTS links_owner_created_idx ON links (owner_id, created_at DESC, id DESC)`,
];

/**
 * Apply the schema. Every statement is idempotent.
 */
export async function migrate(client: Queryable): Promise<void> {
  for (const statement of SCHEMA_STATEMENTS) {
    await client.query(statement);
  }
}

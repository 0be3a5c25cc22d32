/**
 * Test helpers: a scripted Queryable standing in for the pg pool.
 */

import type { LinkRow, QueryRows, Queryable, UserRow } from "../src/index.js";

export interface RecordedQuery {
  text: string;
  values: unknown[];
}

type Scripted = QueryRows<unknown> | Error;

/**
 * Answers queries in call order with the scripted responses and records
 * every statement it receives. Unscripted queries get an empty result.
 */
export class ScriptedDb implements Queryable {
  readonly calls: RecordedQuery[] = [];
  private readonly script: Scripted[] = [];

  respond(...responses: Scripted[]): this {
    this.script.push(...responses);
    return this;
  }

  respondRows(...rows: unknown[]): this {
    return this.respond({ rows, rowCount: rows.length });
  }

  query<R>(text: string, values?: unknown[]): Promise<QueryRows<R>>;
  async query(text: string, values: unknown[] = []): Promise<QueryRows<unknown>> {
    this.calls.push({ text, values });
    const next = this.script.shift();
    if (next instanceof Error) {
      throw next;
    }
    return next ?? { rows: [], rowCount: 0 };
  }

  /** Statement text with whitespace collapsed */
  sql(index: number): string {
    return this.calls[index].text.replace(/\s+/g, " ").trim();
  }
}

export const T0 = new Date("2026-01-01T00:00:00.000Z");

export function linkRow(overrides: Partial<LinkRow> = {}): LinkRow {
  return {
    short_code: "abc123",
    destination: "https://example.com/a",
    title: null,
    enabled: true,
    click_count: "0",
    last_clicked_at: null,
    owner_id: "owner-1",
    created_at: T0,
    updated_at: T0,
    ...overrides,
  };
}

export function userRow(overrides: Partial<UserRow> = {}): UserRow {
  return {
    id: "9a7c1a4e-6a0e-4a8e-9a55-3c0f2b1d9e01",
    email: "ada@example.com",
    hashed_password: "hashed",
    active: true,
    created_at: T0,
    updated_at: T0,
    ...overrides,
  };
}

/** Shape pg uses for server-side errors */
export function pgError(code: string, message: string, extra: Record<string, string> = {}): Error {
  return Object.assign(new Error(message), { code, ...extra });
}

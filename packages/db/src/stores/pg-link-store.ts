/**
 * PostgreSQL-backed LinkStore
 *
 * Every mutation is a single statement, so each is atomic at the store
 * boundary: the code constraint guards inserts, the click increment is
 * computed by the server, and owner-scoped writes carry owner_id in
 * their WHERE clause.
 */

import type { Queryable } from "../client.js";
import { StoreUnavailableError } from "../errors.js";
import {
  rowToLink,
  type ClickTally,
  type Link,
  type LinkFilterOptions,
  type LinkPatch,
  type LinkQueryResult,
  type LinkRow,
  type NewLink,
  type PaginationParams,
} from "../types.js";
import type { LinkStore } from "./types.js";

// =============================================================================
// SQL
// =============================================================================

const LINK_COLUMNS = `short_code, destination, title, enabled, click_count, last_clicked_at,
  owner_id, created_at, updated_at`;

const FIND_BY_CODE = `
  SELECT ${LINK_COLUMNS}
  FROM links
  WHERE short_code = $1
  LIMIT 1
`;

const EXISTS = `SELECT 1 FROM links WHERE short_code = $1 LIMIT 1`;

const INSERT = `
  INSERT INTO links (short_code, destination, title, owner_id, created_at, updated_at)
  VALUES ($1, $2, $3, $4, $5, $5)
  RETURNING ${LINK_COLUMNS}
`;

/**
 * last_clicked_at never moves backwards when increments land out of order
 */
const INCREMENT_CLICKS = `
  UPDATE links
  SET click_count = click_count + 1,
      last_clicked_at = GREATEST(COALESCE(last_clicked_at, $2), $2)
  WHERE short_code = $1
  RETURNING click_count, last_clicked_at
`;

const DELETE_OWNED = `DELETE FROM links WHERE short_code = $1 AND owner_id = $2`;

const PING = "SELECT 1";

type TallyRow = {
  click_count: string;
  last_clicked_at: Date;
};

type CountRow = {
  total: number;
};

/**
 * Escape LIKE wildcards so search terms match literally
 */
function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, (char) => `\\${char}`);
}

// =============================================================================
// Store
// =============================================================================

export class PgLinkStore implements LinkStore {
  constructor(private readonly db: Queryable) {}

  async findByCode(code: string): Promise<Link | null> {
    const { rows } = await this.db.query<LinkRow>(FIND_BY_CODE, [code]);
    return rows.length > 0 ? rowToLink(rows[0]) : null;
  }

  async exists(code: string): Promise<boolean> {
    const { rows } = await this.db.query<{ "?column?": number }>(EXISTS, [code]);
    return rows.length > 0;
  }

  async insert(link: NewLink): Promise<Link> {
    const { rows } = await this.db.query<LinkRow>(INSERT, [
      link.code,
      link.destination,
      link.title,
      link.ownerId,
      link.createdAt,
    ]);
    return rowToLink(rows[0]);
  }

  async updateOwned(code: string, ownerId: string, patch: LinkPatch, updatedAt: Date): Promise<Link | null> {
    const values: unknown[] = [code, ownerId];
    const assignments: string[] = [];

    const assign = (column: string, value: unknown): void => {
      values.push(value);
      assignments.push(`${column} = $${values.length}`);
    };

    if (patch.destination !== undefined) assign("destination", patch.destination);
    if (patch.title !== undefined) assign("title", patch.title);
    if (patch.enabled !== undefined) assign("enabled", patch.enabled);
    assign("updated_at", updatedAt);

    const { rows } = await this.db.query<LinkRow>(
      `UPDATE links SET ${assignments.join(", ")}
       WHERE short_code = $1 AND owner_id = $2
       RETURNING ${LINK_COLUMNS}`,
      values
    );
    return rows.length > 0 ? rowToLink(rows[0]) : null;
  }

  async incrementClicks(code: string, clickedAt: Date): Promise<ClickTally | null> {
    const { rows } = await this.db.query<TallyRow>(INCREMENT_CLICKS, [code, clickedAt]);
    if (rows.length === 0) {
      return null;
    }
    return {
      clickCount: Number(rows[0].click_count),
      lastClickedAt: rows[0].last_clicked_at,
    };
  }

  async deleteOwned(code: string, ownerId: string): Promise<boolean> {
    const { rowCount } = await this.db.query(DELETE_OWNED, [code, ownerId]);
    return (rowCount ?? 0) > 0;
  }

  async listByOwner(
    ownerId: string,
    pagination: PaginationParams,
    filters: LinkFilterOptions
  ): Promise<LinkQueryResult> {
    const values: unknown[] = [ownerId];
    const conditions = ["owner_id = $1"];

    const where = (clause: (param: string) => string, value: unknown): void => {
      values.push(value);
      conditions.push(clause(`$${values.length}`));
    };

    if (filters.enabled !== undefined) where((p) => `enabled = ${p}`, filters.enabled);
    if (filters.createdFrom) where((p) => `created_at >= ${p}`, filters.createdFrom);
    if (filters.createdTo) where((p) => `created_at <= ${p}`, filters.createdTo);
    if (filters.search) {
      where((p) => `(title ILIKE ${p} OR destination ILIKE ${p})`, `%${escapeLike(filters.search)}%`);
    }

    const whereClause = conditions.join(" AND ");
    const filterValues = [...values];
    const offset = (pagination.page - 1) * pagination.pageSize;

    const [page, count] = await Promise.all([
      this.db.query<LinkRow>(
        `SELECT ${LINK_COLUMNS}
         FROM links
         WHERE ${whereClause}
         ORDER BY created_at DESC, id DESC
         LIMIT $${values.length + 1} OFFSET $${values.length + 2}`,
        [...filterValues, pagination.pageSize, offset]
      ),
      this.db.query<CountRow>(`SELECT COUNT(*)::int AS total FROM links WHERE ${whereClause}`, filterValues),
    ]);

    return {
      items: page.rows.map(rowToLink),
      total: count.rows[0]?.total ?? 0,
    };
  }

  async ping(): Promise<boolean> {
    try {
      await this.db.query(PING);
      return true;
    } catch (err) {
      if (err instanceof StoreUnavailableError) {
        return false;
      }
      throw err;
    }
  }
}

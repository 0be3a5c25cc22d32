/**
 * PostgreSQL-backed UserStore
 */

import type { Queryable } from "../client.js";
import { rowToUser, type NewUser, type User, type UserRow } from "../types.js";
import type { UserStore } from "./types.js";

const USER_COLUMNS = "id, email, hashed_password, active, created_at, updated_at";

const FIND_BY_ID = `SELECT ${USER_COLUMNS} FROM users WHERE id = $1 LIMIT 1`;

const FIND_BY_EMAIL = `SELECT ${USER_COLUMNS} FROM users WHERE email = $1 LIMIT 1`;

const INSERT = `
  INSERT INTO users (id, email, hashed_password, created_at, updated_at)
  VALUES ($1, $2, $3, $4, $4)
  RETURNING ${USER_COLUMNS}
`;

export class PgUserStore implements UserStore {
  constructor(private readonly db: Queryable) {}

  async findById(id: string): Promise<User | null> {
    const { rows } = await this.db.query<UserRow>(FIND_BY_ID, [id]);
    return rows.length > 0 ? rowToUser(rows[0]) : null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const { rows } = await this.db.query<UserRow>(FIND_BY_EMAIL, [email]);
    return rows.length > 0 ? rowToUser(rows[0]) : null;
  }

  async insert(user: NewUser): Promise<User> {
    const { rows } = await this.db.query<UserRow>(INSERT, [user.id, user.email, user.hashedPassword, user.createdAt]);
    return rowToUser(rows[0]);
  }
}

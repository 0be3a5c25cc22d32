/**
 * Database Type Definitions
 *
 * Records, store inputs and raw row shapes. The PostgreSQL schema in
 * ./schema.ts is the authoritative layout.
 */

// =============================================================================
// TABLE: users
// =============================================================================

export interface User {
  id: string;
  email: string;
  hashedPassword: string;
  active: boolean;
  createdAt: Date;
  updatedAt: Date;
}

/** User without sensitive fields (for API responses) */
export interface SafeUser {
  id: string;
  email: string;
  active: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewUser {
  id: string;
  email: string;
  hashedPassword: string;
  createdAt: Date;
}

// =============================================================================
// TABLE: links
// =============================================================================

export interface Link {
  /** Short code; unique, immutable */
  code: string;
  destination: string;
  title: string | null;
  /** Disabled links stay stored but no longer resolve */
  enabled: boolean;
  clickCount: number;
  lastClickedAt: Date | null;
  ownerId: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewLink {
  code: string;
  destination: string;
  title: string | null;
  ownerId: string;
  createdAt: Date;
}

/**
 * Owner-editable fields. Absent keys are left untouched; a null title
 * clears it.
 */
export interface LinkPatch {
  destination?: string;
  title?: string | null;
  enabled?: boolean;
}

/**
 * Result of an atomic click increment
 */
export interface ClickTally {
  clickCount: number;
  lastClickedAt: Date;
}

// =============================================================================
// QUERY TYPES
// =============================================================================

/**
 * Offset pagination, page is 1-based
 */
export interface PaginationParams {
  page: number;
  pageSize: number;
}

export interface LinkFilterOptions {
  enabled?: boolean;
  /** Inclusive lower bound on createdAt */
  createdFrom?: Date;
  /** Inclusive upper bound on createdAt */
  createdTo?: Date;
  /** Case-insensitive substring of title or destination */
  search?: string;
}

export interface LinkQueryResult {
  items: Link[];
  total: number;
}

// =============================================================================
// DATABASE RESULT TYPES (raw rows)
// =============================================================================

export type LinkRow = {
  short_code: string;
  destination: string;
  title: string | null;
  enabled: boolean;
  click_count: string; // BIGINT comes back as string from pg
  last_clicked_at: Date | null;
  owner_id: string;
  created_at: Date;
  updated_at: Date;
};

export type UserRow = {
  id: string;
  email: string;
  hashed_password: string;
  active: boolean;
  created_at: Date;
  updated_at: Date;
};

/**
 * Convert database row to Link
 */
export function rowToLink(row: LinkRow): Link {
  return {
    code: row.short_code,
    destination: row.destination,
    title: row.title,
    enabled: row.enabled,
    clickCount: Number(row.click_count),
    lastClickedAt: row.last_clicked_at,
    ownerId: row.owner_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Convert database row to User
 */
export function rowToUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    hashedPassword: row.hashed_password,
    active: row.active,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Strip the password hash
 */
export function toSafeUser(user: User): SafeUser {
  return {
    id: user.id,
    email: user.email,
    active: user.active,
    createdAt: user.createdAt,
    updatedAt: user.updatedAt,
  };
}

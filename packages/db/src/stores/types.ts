/**
 * Storage contracts consumed by the API services.
 *
 * Implementations throw DuplicateKeyError for unique violations and
 * StoreUnavailableError for connectivity failures; every other outcome is
 * a return value.
 */

import type {
  ClickTally,
  Link,
  LinkFilterOptions,
  LinkPatch,
  LinkQueryResult,
  NewLink,
  NewUser,
  PaginationParams,
  User,
} from "../types.js";

export interface LinkStore {
  findByCode(code: string): Promise<Link | null>;

  /** Fast-path existence check; the unique constraint on insert decides */
  exists(code: string): Promise<boolean>;

  /** @throws DuplicateKeyError when the code is already stored */
  insert(link: NewLink): Promise<Link>;

  /**
   * Apply a patch only if `ownerId` owns the link.
   * Returns null when no link matches both.
   */
  updateOwned(code: string, ownerId: string, patch: LinkPatch, updatedAt: Date): Promise<Link | null>;

  /** Atomic +1 on the click counter. Returns null for unknown codes. */
  incrementClicks(code: string, clickedAt: Date): Promise<ClickTally | null>;

  /** Returns false when no link matches both code and owner */
  deleteOwned(code: string, ownerId: string): Promise<boolean>;

  /** Newest first */
  listByOwner(ownerId: string, pagination: PaginationParams, filters: LinkFilterOptions): Promise<LinkQueryResult>;

  ping(): Promise<boolean>;
}

export interface UserStore {
  findById(id: string): Promise<User | null>;

  /** Expects a lower-cased email */
  findByEmail(email: string): Promise<User | null>;

  /** @throws DuplicateKeyError when the email is already registered */
  insert(user: NewUser): Promise<User>;
}

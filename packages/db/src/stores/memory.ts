/**
 * In-process stores
 *
 * Same contracts as the PostgreSQL stores, kept in Maps. Used by the test
 * suites and for running the API without a database
 * (`STORE_DRIVER=memory`).
 *
 * Each operation yields to the event loop once before touching state and
 * then mutates synchronously, so concurrent callers interleave the way
 * they would against a real server while every single operation stays
 * atomic.
 */

import { setImmediate as yieldToLoop } from "node:timers/promises";
import { DuplicateKeyError } from "../errors.js";
import { LINKS_CODE_CONSTRAINT, USERS_EMAIL_CONSTRAINT } from "../schema.js";
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
import type { LinkStore, UserStore } from "./types.js";

interface StoredLink extends Link {
  /** Insertion order, the tie-breaker for equal createdAt */
  seq: number;
}

function copyLink(stored: StoredLink): Link {
  return {
    code: stored.code,
    destination: stored.destination,
    title: stored.title,
    enabled: stored.enabled,
    clickCount: stored.clickCount,
    lastClickedAt: stored.lastClickedAt,
    ownerId: stored.ownerId,
    createdAt: stored.createdAt,
    updatedAt: stored.updatedAt,
  };
}

function matchesFilters(link: StoredLink, filters: LinkFilterOptions): boolean {
  if (filters.enabled !== undefined && link.enabled !== filters.enabled) return false;
  if (filters.createdFrom && link.createdAt < filters.createdFrom) return false;
  if (filters.createdTo && link.createdAt > filters.createdTo) return false;
  if (filters.search) {
    const needle = filters.search.toLowerCase();
    const inTitle = link.title?.toLowerCase().includes(needle) ?? false;
    if (!inTitle && !link.destination.toLowerCase().includes(needle)) return false;
  }
  return true;
}

// =============================================================================
// Links
// =============================================================================

export class MemoryLinkStore implements LinkStore {
  private readonly links = new Map<string, StoredLink>();
  private seq = 0;

  get size(): number {
    return this.links.size;
  }

  async findByCode(code: string): Promise<Link | null> {
    await yieldToLoop();
    const stored = this.links.get(code);
    return stored ? copyLink(stored) : null;
  }

  async exists(code: string): Promise<boolean> {
    await yieldToLoop();
    return this.links.has(code);
  }

  async insert(link: NewLink): Promise<Link> {
    await yieldToLoop();
    if (this.links.has(link.code)) {
      throw new DuplicateKeyError(LINKS_CODE_CONSTRAINT);
    }

    const stored: StoredLink = {
      code: link.code,
      destination: link.destination,
      title: link.title,
      enabled: true,
      clickCount: 0,
      lastClickedAt: null,
      ownerId: link.ownerId,
      createdAt: link.createdAt,
      updatedAt: link.createdAt,
      seq: ++this.seq,
    };
    this.links.set(link.code, stored);
    return copyLink(stored);
  }

  async updateOwned(code: string, ownerId: string, patch: LinkPatch, updatedAt: Date): Promise<Link | null> {
    await yieldToLoop();
    const stored = this.links.get(code);
    if (!stored || stored.ownerId !== ownerId) {
      return null;
    }

    if (patch.destination !== undefined) stored.destination = patch.destination;
    if (patch.title !== undefined) stored.title = patch.title;
    if (patch.enabled !== undefined) stored.enabled = patch.enabled;
    stored.updatedAt = updatedAt;
    return copyLink(stored);
  }

  async incrementClicks(code: string, clickedAt: Date): Promise<ClickTally | null> {
    await yieldToLoop();
    const stored = this.links.get(code);
    if (!stored) {
      return null;
    }

    stored.clickCount += 1;
    if (!stored.lastClickedAt || stored.lastClickedAt < clickedAt) {
      stored.lastClickedAt = clickedAt;
    }
    return { clickCount: stored.clickCount, lastClickedAt: stored.lastClickedAt };
  }

  async deleteOwned(code: string, ownerId: string): Promise<boolean> {
    await yieldToLoop();
    const stored = this.links.get(code);
    if (!stored || stored.ownerId !== ownerId) {
      return false;
    }
    return this.links.delete(code);
  }

  async listByOwner(
    ownerId: string,
    pagination: PaginationParams,
    filters: LinkFilterOptions
  ): Promise<LinkQueryResult> {
    await yieldToLoop();
    const matching = [...this.links.values()]
      .filter((link) => link.ownerId === ownerId && matchesFilters(link, filters))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.seq - a.seq);

    const offset = (pagination.page - 1) * pagination.pageSize;
    return {
      items: matching.slice(offset, offset + pagination.pageSize).map(copyLink),
      total: matching.length,
    };
  }

  async ping(): Promise<boolean> {
    return true;
  }

  clear(): void {
    this.links.clear();
  }
}

// =============================================================================
// Users
// =============================================================================

export class MemoryUserStore implements UserStore {
  private readonly users = new Map<string, User>();

  async findById(id: string): Promise<User | null> {
    await yieldToLoop();
    const user = this.users.get(id);
    return user ? { ...user } : null;
  }

  async findByEmail(email: string): Promise<User | null> {
    await yieldToLoop();
    for (const user of this.users.values()) {
      if (user.email === email) {
        return { ...user };
      }
    }
    return null;
  }

  async insert(user: NewUser): Promise<User> {
    await yieldToLoop();
    for (const existing of this.users.values()) {
      if (existing.email === user.email) {
        throw new DuplicateKeyError(USERS_EMAIL_CONSTRAINT);
      }
    }

    const stored: User = {
      id: user.id,
      email: user.email,
      hashedPassword: user.hashedPassword,
      active: true,
      createdAt: user.createdAt,
      updatedAt: user.createdAt,
    };
    this.users.set(user.id, stored);
    return { ...stored };
  }

  /** Flip the active flag; there is no HTTP surface for this */
  setActive(id: string, active: boolean): void {
    const user = this.users.get(id);
    if (user) {
      user.active = active;
    }
  }
}

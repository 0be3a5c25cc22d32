/**
 * Store decorators that retry transient failures.
 *
 * Reads, owner-scoped patches (which set absolute values) and pings retry
 * on any StoreUnavailableError. Inserts, increments and deletes only retry
 * when the failure is known to have happened before the statement ran:
 * repeating them after an unknown outcome could double a click or turn a
 * successful delete into a NotFound.
 */

import type { Logger } from "@shortlane/logger";
import type { StoreUnavailableError } from "../errors.js";
import { retryTransient } from "../retry.js";
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

export interface RetryingStoreOptions {
  /** Total tries per operation (default: 3) */
  attempts?: number;
  /** Linear backoff step in ms (default: 50) */
  delayMs?: number;
  logger?: Logger;
}

abstract class RetryingStore {
  private readonly attempts: number;
  private readonly delayMs: number;
  private readonly logger?: Logger;

  protected constructor(options: RetryingStoreOptions) {
    this.attempts = options.attempts ?? 3;
    this.delayMs = options.delayMs ?? 50;
    this.logger = options.logger;
  }

  protected run<T>(operation: string, idempotent: boolean, fn: () => Promise<T>): Promise<T> {
    return retryTransient(fn, {
      attempts: this.attempts,
      delayMs: this.delayMs,
      idempotent,
      onRetry: (err: StoreUnavailableError, attempt: number) => {
        this.logger?.warn({ err, operation, attempt }, "Transient store failure, retrying");
      },
    });
  }
}

export class RetryingLinkStore extends RetryingStore implements LinkStore {
  constructor(private readonly inner: LinkStore, options: RetryingStoreOptions = {}) {
    super(options);
  }

  findByCode(code: string): Promise<Link | null> {
    return this.run("findByCode", true, () => this.inner.findByCode(code));
  }

  exists(code: string): Promise<boolean> {
    return this.run("exists", true, () => this.inner.exists(code));
  }

  insert(link: NewLink): Promise<Link> {
    return this.run("insert", false, () => this.inner.insert(link));
  }

  updateOwned(code: string, ownerId: string, patch: LinkPatch, updatedAt: Date): Promise<Link | null> {
    return this.run("updateOwned", true, () => this.inner.updateOwned(code, ownerId, patch, updatedAt));
  }

  incrementClicks(code: string, clickedAt: Date): Promise<ClickTally | null> {
    return this.run("incrementClicks", false, () => this.inner.incrementClicks(code, clickedAt));
  }

  deleteOwned(code: string, ownerId: string): Promise<boolean> {
    return this.run("deleteOwned", false, () => this.inner.deleteOwned(code, ownerId));
  }

  listByOwner(ownerId: string, pagination: PaginationParams, filters: LinkFilterOptions): Promise<LinkQueryResult> {
    return this.run("listByOwner", true, () => this.inner.listByOwner(ownerId, pagination, filters));
  }

  ping(): Promise<boolean> {
    return this.inner.ping();
  }
}

/**
 * Backs every authenticated request: token checks load the user by id.
 */
export class RetryingUserStore extends RetryingStore implements UserStore {
  constructor(private readonly inner: UserStore, options: RetryingStoreOptions = {}) {
    super(options);
  }

  findById(id: string): Promise<User | null> {
    return this.run("findById", true, () => this.inner.findById(id));
  }

  findByEmail(email: string): Promise<User | null> {
    return this.run("findByEmail", true, () => this.inner.findByEmail(email));
  }

  // a repeated insert after an unknown outcome would report EMAIL_TAKEN for the caller's own row
  insert(user: NewUser): Promise<User> {
    return this.run("insert", false, () => this.inner.insert(user));
  }
}

/**
 * URL Registry
 *
 * Create, read, list, update and delete short links. Owner-scoped writes
 * go to the store as a single conditional statement; the owner check and
 * the write cannot be split by a concurrent request.
 */

import type { Link, LinkFilterOptions, LinkPatch, LinkStore, PaginationParams } from "@shortlane/db";
import { createLogger, type Logger } from "@shortlane/logger";
import { validateDestination } from "@shortlane/shared";
import type { UniquenessArbiter } from "./code-arbiter.js";
import { fail, ok, type ServiceFailure, type ServiceResult } from "./results.js";

export interface CreateLinkInput {
  ownerId: string;
  destination: string;
  /** Custom code; generated when absent */
  code?: string;
  title?: string | null;
}

export interface LinkPage {
  items: Link[];
  total: number;
  page: number;
  pageSize: number;
  totalPages: number;
}

export interface UrlRegistryOptions {
  clock?: () => Date;
  logger?: Logger;
}

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export class UrlRegistry {
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(
    private readonly links: LinkStore,
    private readonly arbiter: UniquenessArbiter,
    options: UrlRegistryOptions = {}
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createLogger("links");
  }

  /**
   * Create a new link, enabled and with no clicks
   */
  async create(input: CreateLinkInput): Promise<ServiceResult<Link>> {
    const destination = validateDestination(input.destination);
    if (!destination.valid) {
      return fail("INVALID_DESTINATION", destination.error);
    }
    const { href } = destination;

    const result = await this.arbiter.claim(input.code, (code) =>
      this.links.insert({
        code,
        destination: href,
        title: input.title ?? null,
        ownerId: input.ownerId,
        createdAt: this.clock(),
      })
    );

    if (result.success) {
      this.logger.info(
        { code: result.data.code, ownerId: input.ownerId, custom: input.code !== undefined },
        "Link created"
      );
    }
    return result;
  }

  async get(code: string): Promise<ServiceResult<Link>> {
    const link = await this.links.findByCode(code);
    return link ? ok(link) : notFound(code);
  }

  /**
   * Newest first, offset paginated
   */
  async listForOwner(
    ownerId: string,
    pagination: Partial<PaginationParams> = {},
    filters: LinkFilterOptions = {}
  ): Promise<LinkPage> {
    const page = Math.max(1, Math.floor(pagination.page ?? 1));
    const pageSize = Math.min(MAX_PAGE_SIZE, Math.max(1, Math.floor(pagination.pageSize ?? DEFAULT_PAGE_SIZE)));

    const { items, total } = await this.links.listByOwner(ownerId, { page, pageSize }, filters);
    return {
      items,
      total,
      page,
      pageSize,
      totalPages: Math.ceil(total / pageSize),
    };
  }

  /**
   * Apply an owner's patch. Only destination, title and enabled can change.
   */
  async update(code: string, ownerId: string, patch: LinkPatch): Promise<ServiceResult<Link>> {
    let destination: string | undefined;
    if (patch.destination !== undefined) {
      const checked = validateDestination(patch.destination);
      if (!checked.valid) {
        // only the owner learns why the destination was refused
        const existing = await this.links.findByCode(code);
        if (!existing) return notFound(code);
        if (existing.ownerId !== ownerId) return forbidden(code);
        return fail("INVALID_DESTINATION", checked.error);
      }
      destination = checked.href;
    }

    const updated = await this.links.updateOwned(
      code,
      ownerId,
      { destination, title: patch.title, enabled: patch.enabled },
      this.clock()
    );
    if (updated) {
      this.logger.info({ code, ownerId, fields: Object.keys(patch) }, "Link updated");
      return ok(updated);
    }
    return this.explainMiss(code);
  }

  /**
   * Hard delete; the code is free for reuse as soon as this returns
   */
  async delete(code: string, ownerId: string): Promise<ServiceResult<void>> {
    if (await this.links.deleteOwned(code, ownerId)) {
      this.logger.info({ code, ownerId }, "Link deleted");
      return ok(undefined);
    }
    return this.explainMiss(code);
  }

  /**
   * An owner-scoped write matched nothing: either the link is gone or it
   * belongs to someone else.
   */
  private async explainMiss(code: string): Promise<ServiceFailure> {
    const existing = await this.links.findByCode(code);
    return existing ? forbidden(code) : notFound(code);
  }
}

export function notFound(code: string): ServiceFailure {
  return fail("NOT_FOUND", `Short link "${code}" not found`);
}

export function forbidden(code: string): ServiceFailure {
  return fail("FORBIDDEN", `You do not own short link "${code}"`);
}

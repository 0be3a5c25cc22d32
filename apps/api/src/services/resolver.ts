/**
 * Resolver Service
 *
 * Public resolution of short codes, plus owner-only click statistics.
 *
 * Click recording modes:
 * - background (default): the destination is returned at once and the
 *   increment runs detached. Pending increments are tracked so shutdown
 *   and tests can wait for them with `drain()`.
 * - inline: the increment completes before the destination is returned.
 */

import type { LinkStore } from "@shortlane/db";
import { createLogger, type Logger } from "@shortlane/logger";
import type { ClickAccountant } from "./clicks.js";
import { forbidden, notFound } from "./links.js";
import { fail, ok, type ServiceResult } from "./results.js";
import type { ClickRecordingMode } from "../config.js";

export interface LinkStats {
  code: string;
  clickCount: number;
  lastClickedAt: Date | null;
  createdAt: Date;
}

export interface ResolverServiceOptions {
  clickRecording?: ClickRecordingMode;
  logger?: Logger;
}

export class ResolverService {
  private readonly mode: ClickRecordingMode;
  private readonly logger: Logger;
  private readonly pending = new Set<Promise<void>>();

  constructor(
    private readonly links: LinkStore,
    private readonly clicks: ClickAccountant,
    options: ResolverServiceOptions = {}
  ) {
    this.mode = options.clickRecording ?? "background";
    this.logger = options.logger ?? createLogger("resolver");
  }

  /**
   * Look up the destination for a code and count the click.
   * Disabled links are reported as such and never counted.
   */
  async resolve(code: string): Promise<ServiceResult<string>> {
    const link = await this.links.findByCode(code);
    if (!link) {
      return notFound(code);
    }
    if (!link.enabled) {
      return fail("DISABLED", `Short link "${code}" is disabled`);
    }

    if (this.mode === "inline") {
      const tally = await this.clicks.recordClick(code);
      if (!tally.success) {
        // deleted between lookup and increment
        return tally;
      }
    } else {
      this.recordInBackground(code);
    }

    return ok(link.destination);
  }

  async stats(code: string, ownerId: string): Promise<ServiceResult<LinkStats>> {
    const link = await this.links.findByCode(code);
    if (!link) {
      return notFound(code);
    }
    if (link.ownerId !== ownerId) {
      return forbidden(code);
    }
    return ok({
      code: link.code,
      clickCount: link.clickCount,
      lastClickedAt: link.lastClickedAt,
      createdAt: link.createdAt,
    });
  }

  /** Number of background increments still running */
  get pendingClicks(): number {
    return this.pending.size;
  }

  /**
   * Wait for every background increment, including ones started while
   * waiting
   */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(this.pending);
    }
  }

  private recordInBackground(code: string): void {
    const task: Promise<void> = this.clicks
      .recordClick(code)
      .then(
        (result) => {
          if (!result.success) {
            this.logger.warn({ code, errorCode: result.errorCode }, "Click not recorded, link is gone");
          }
        },
        (err: unknown) => {
          this.logger.error({ err, code }, "Failed to record click");
        }
      )
      .finally(() => {
        this.pending.delete(task);
      });
    this.pending.add(task);
  }
}

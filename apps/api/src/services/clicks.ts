/**
 * Click Accountant
 *
 * The only writer of clickCount. Each click is one atomic increment in
 * the store, so N concurrent clicks add exactly N.
 */

import type { ClickTally, LinkStore } from "@shortlane/db";
import { notFound } from "./links.js";
import { ok, type ServiceResult } from "./results.js";

export class ClickAccountant {
  constructor(
    private readonly links: LinkStore,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async recordClick(code: string): Promise<ServiceResult<ClickTally>> {
    const tally = await this.links.incrementClicks(code, this.clock());
    return tally ? ok(tally) : notFound(code);
  }
}

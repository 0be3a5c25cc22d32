/**
 * Uniqueness Arbiter
 *
 * Decides which short code a new link gets.
 *
 * - Custom codes are validated and checked, never silently replaced.
 * - Generated codes are drawn until an unused one turns up or the attempt
 *   budget runs out.
 *
 * The existence check is only a fast path. Two creators can both see a
 * code as free; the store's unique constraint picks the winner at insert
 * time, which is why `claim` owns the insert as well.
 */

import { DuplicateKeyError, LINKS_CODE_CONSTRAINT, type LinkStore } from "@shortlane/db";
import { createLogger, type Logger } from "@shortlane/logger";
import { SHORTCODE_CONFIG, validateCode, type CodeGenerator } from "@shortlane/shared";
import { fail, ok, type ServiceFailure, type ServiceResult } from "./results.js";

export interface UniquenessArbiterOptions {
  generator: CodeGenerator;
  /** Draws allowed per generated code (default: 10) */
  maxAttempts?: number;
  logger?: Logger;
}

export type UnavailableReason = "invalid" | "reserved" | "taken";

export interface CodeAvailability {
  code: string;
  available: boolean;
  reason: UnavailableReason | null;
}

interface AttemptBudget {
  used: number;
}

/**
 * True when an insert lost the race for its short code
 */
function isCodeConflict(err: unknown): boolean {
  return err instanceof DuplicateKeyError && (err.constraint === LINKS_CODE_CONSTRAINT || err.constraint === null);
}

export class UniquenessArbiter {
  private readonly generator: CodeGenerator;
  private readonly maxAttempts: number;
  private readonly logger: Logger;

  constructor(private readonly links: LinkStore, options: UniquenessArbiterOptions) {
    this.generator = options.generator;
    this.maxAttempts = options.maxAttempts ?? SHORTCODE_CONFIG.MAX_ATTEMPTS;
    this.logger = options.logger ?? createLogger("code-arbiter");
  }

  /**
   * Pick a code without inserting anything.
   */
  async reserve(requestedCode?: string): Promise<ServiceResult<string>> {
    if (requestedCode !== undefined) {
      return this.reserveCustom(requestedCode);
    }

    const budget: AttemptBudget = { used: 0 };
    const code = await this.drawUnused(budget);
    return code === null ? this.exhausted(budget) : ok(code);
  }

  /**
   * Pick a code and insert under it.
   *
   * A custom code that loses the insert race is CODE_TAKEN. A generated
   * one is redrawn; insert conflicts and existence hits share one budget.
   */
  async claim<T>(requestedCode: string | undefined, insert: (code: string) => Promise<T>): Promise<ServiceResult<T>> {
    if (requestedCode !== undefined) {
      const reservation = await this.reserveCustom(requestedCode);
      if (!reservation.success) {
        return reservation;
      }
      try {
        return ok(await insert(reservation.data));
      } catch (err) {
        if (isCodeConflict(err)) {
          this.logger.debug({ code: requestedCode }, "Custom code lost insert race");
          return this.taken(requestedCode);
        }
        throw err;
      }
    }

    const budget: AttemptBudget = { used: 0 };
    for (;;) {
      const code = await this.drawUnused(budget);
      if (code === null) {
        return this.exhausted(budget);
      }
      try {
        return ok(await insert(code));
      } catch (err) {
        if (!isCodeConflict(err)) {
          throw err;
        }
        this.logger.debug({ code, attempt: budget.used }, "Generated code lost insert race, redrawing");
      }
    }
  }

  /**
   * Whether a custom code could be claimed right now
   */
  async checkAvailability(code: string): Promise<CodeAvailability> {
    const validation = validateCode(code);
    if (!validation.valid) {
      return { code, available: false, reason: validation.reserved ? "reserved" : "invalid" };
    }
    if (await this.links.exists(code)) {
      return { code, available: false, reason: "taken" };
    }
    return { code, available: true, reason: null };
  }

  private async reserveCustom(code: string): Promise<ServiceResult<string>> {
    const validation = validateCode(code);
    if (!validation.valid) {
      return fail("INVALID_CODE_FORMAT", validation.error ?? "Invalid short code");
    }
    if (await this.links.exists(code)) {
      return this.taken(code);
    }
    return ok(code);
  }

  private async drawUnused(budget: AttemptBudget): Promise<string | null> {
    while (budget.used < this.maxAttempts) {
      budget.used++;
      const candidate = this.generator.generate();

      if (!validateCode(candidate).valid) {
        this.logger.debug({ candidate }, "Discarding reserved or malformed generated code");
        continue;
      }
      if (await this.links.exists(candidate)) {
        this.logger.debug({ candidate, attempt: budget.used }, "Generated code collision");
        continue;
      }
      return candidate;
    }
    return null;
  }

  private taken(code: string): ServiceFailure {
    return fail("CODE_TAKEN", `Short code "${code}" is already taken`);
  }

  private exhausted(budget: AttemptBudget): ServiceFailure {
    this.logger.error({ attempts: budget.used }, "Short code space exhausted, no unused code found");
    return fail("CODE_SPACE_EXHAUSTED", "Could not allocate a unique short code. Please try again.");
  }
}

/**
 * Shortlane API Services
 *
 * Business logic layer. `createServices` wires the services over a pair
 * of stores; routes reach them through `fastify.services`.
 */

import type { LinkStore, UserStore } from "@shortlane/db";
import { RandomCodeGenerator, type CodeGenerator } from "@shortlane/shared";
import type { AppConfig } from "../config.js";
import { AuthService } from "./auth.js";
import { ClickAccountant } from "./clicks.js";
import { UniquenessArbiter } from "./code-arbiter.js";
import { UrlRegistry } from "./links.js";
import { ResolverService } from "./resolver.js";

export * from "./results.js";
export * from "./auth.js";
export * from "./clicks.js";
export * from "./code-arbiter.js";
export * from "./links.js";
export * from "./resolver.js";

export interface Services {
  arbiter: UniquenessArbiter;
  registry: UrlRegistry;
  clicks: ClickAccountant;
  resolver: ResolverService;
  auth: AuthService;
}

export interface ServiceDependencies {
  config: AppConfig;
  linkStore: LinkStore;
  userStore: UserStore;
  /** Defaults to random codes of config.shortcodeLength */
  generator?: CodeGenerator;
  clock?: () => Date;
}

export function createServices(deps: ServiceDependencies): Services {
  const { config, linkStore, userStore, clock } = deps;

  const arbiter = new UniquenessArbiter(linkStore, {
    generator: deps.generator ?? new RandomCodeGenerator({ length: config.shortcodeLength }),
    maxAttempts: config.shortcodeMaxAttempts,
  });
  const clicks = new ClickAccountant(linkStore, clock);

  return {
    arbiter,
    registry: new UrlRegistry(linkStore, arbiter, { clock }),
    clicks,
    resolver: new ResolverService(linkStore, clicks, { clickRecording: config.clickRecording }),
    auth: new AuthService(userStore, {
      jwtSecret: config.jwtSecret,
      jwtExpiresInSeconds: config.jwtExpiresInSeconds,
      bcryptRounds: config.bcryptRounds,
      clock,
    }),
  };
}

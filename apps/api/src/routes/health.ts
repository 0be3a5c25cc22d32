/**
 * Health Check Routes
 *
 * Liveness and readiness probes for orchestrators and load balancers.
 */

import type { FastifyInstance, FastifyPluginAsync } from "fastify";
import type { Redis } from "ioredis";
import type { LinkStore } from "@shortlane/db";

export interface HealthRoutesOptions {
  linkStore: LinkStore;
  redis?: Redis | null;
}

type CheckStatus = "ok" | "error";

export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (
  fastify: FastifyInstance,
  options: HealthRoutesOptions
) => {
  const { linkStore, redis } = options;

  // Liveness probe - basic server health
  fastify.get("/health", { schema: { tags: ["health"] } }, async () => {
    return { status: "ok", timestamp: new Date().toISOString() };
  });

  // Readiness probe - checks dependencies
  fastify.get("/health/ready", { schema: { tags: ["health"] } }, async (request, reply) => {
    const checks: Record<string, CheckStatus> = {
      database: "error",
    };

    try {
      checks.database = (await linkStore.ping()) ? "ok" : "error";
    } catch (err) {
      request.log.warn({ err }, "Readiness check: database ping failed");
    }

    if (redis) {
      checks.cache = "error";
      try {
        checks.cache = (await redis.ping()) === "PONG" ? "ok" : "error";
      } catch (err) {
        request.log.warn({ err }, "Readiness check: Redis ping failed");
      }
    }

    const allHealthy = Object.values(checks).every((v) => v === "ok");

    return reply.status(allHealthy ? 200 : 503).send({
      status: allHealthy ? "ok" : "degraded",
      checks,
      timestamp: new Date().toISOString(),
    });
  });
};

/**
 * Application factory
 *
 * Builds the Fastify instance with plugins, services and routes. The
 * entry point (./index.ts) adds stores, Redis and the process lifecycle;
 * tests call buildApp directly with in-memory stores.
 */

import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import type { Redis } from "ioredis";
import { getLogLevel } from "@shortlane/logger";
import { getDbMetrics, StoreUnavailableError, type LinkStore, type UserStore } from "@shortlane/db";
import type { CodeGenerator } from "@shortlane/shared";

import type { AppConfig } from "./config.js";
import { createServices, type Services } from "./services/index.js";
import { authPlugin } from "./middleware/auth.js";
import { authRoutes } from "./routes/auth/index.js";
import { healthRoutes } from "./routes/health.js";
import { linksRoutes } from "./routes/links/index.js";
import { redirectRoutes } from "./routes/redirect.js";

declare module "fastify" {
  interface FastifyInstance {
    services: Services;
    appConfig: AppConfig;
  }
}

export interface BuildAppOptions {
  config: AppConfig;
  linkStore: LinkStore;
  userStore: UserStore;
  /** Shared rate-limit store across instances; in-memory when absent */
  redis?: Redis | null;
  generator?: CodeGenerator;
  clock?: () => Date;
}

// ============================================================================
// Fastify Instance
// ============================================================================

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const { config, linkStore, userStore, redis = null } = options;

  const fastify = Fastify({
    logger:
      config.nodeEnv === "test"
        ? false
        : {
            level: getLogLevel(),
            transport:
              config.prettyLogs
                ? {
                    target: "pino-pretty",
                    options: { colorize: true },
                  }
                : undefined,
          },
    trustProxy: true,
    requestIdHeader: "x-request-id",
  });

  const services = createServices({
    config,
    linkStore,
    userStore,
    generator: options.generator,
    clock: options.clock,
  });

  fastify.decorate("appConfig", config);
  fastify.decorate("services", services);

  // Background click increments finish before the stores close
  fastify.addHook("onClose", async () => {
    await services.resolver.drain();
  });

  await registerPlugins(fastify, config, redis);
  await registerRoutes(fastify, linkStore, redis);
  registerErrorHandler(fastify, config);

  return fastify;
}

// ============================================================================
// Plugins
// ============================================================================

async function registerPlugins(fastify: FastifyInstance, config: AppConfig, redis: Redis | null): Promise<void> {
  // Security headers
  await fastify.register(helmet, {
    contentSecurityPolicy: config.nodeEnv === "production",
  });

  await fastify.register(cors, {
    origin: config.corsOrigin,
    credentials: true,
  });

  // Per-IP limits, shared through Redis when configured
  await fastify.register(rateLimit, {
    max: config.rateLimit.max,
    timeWindow: "1 minute",
    redis: redis ?? undefined,
    keyGenerator: (request) => request.ip || "unknown",
    skipOnError: true,
    errorResponseBuilder: (_request, context) => ({
      statusCode: 429,
      error: "Too many requests",
      message: `You have exceeded the ${context.max} requests in ${context.after} limit`,
    }),
  });

  await fastify.register(swagger, {
    openapi: {
      info: {
        title: "Shortlane API",
        description: "URL shortening service API",
        version: "1.0.0",
      },
      servers: [{ url: config.shortUrlBase }],
      tags: [
        { name: "auth", description: "Authentication endpoints" },
        { name: "links", description: "Link management endpoints" },
        { name: "redirect", description: "Short code resolution" },
        { name: "health", description: "Health check endpoints" },
      ],
      components: {
        securitySchemes: {
          bearerAuth: {
            type: "http",
            scheme: "bearer",
            bearerFormat: "JWT",
          },
        },
      },
    },
  });

  await fastify.register(swaggerUi, {
    routePrefix: "/docs",
    uiConfig: {
      docExpansion: "list",
      deepLinking: true,
    },
  });
}

// ============================================================================
// Routes
// ============================================================================

async function registerRoutes(fastify: FastifyInstance, linkStore: LinkStore, redis: Redis | null): Promise<void> {
  await fastify.register(authPlugin);

  await fastify.register(healthRoutes, { linkStore, redis });
  await fastify.register(authRoutes);
  await fastify.register(linksRoutes);
  // Last: GET /:code sits beside the static paths above
  await fastify.register(redirectRoutes);

  // Prometheus metrics endpoint
  fastify.get("/metrics", { schema: { tags: ["health"] } }, async (_request, reply) => {
    reply.header("Content-Type", "text/plain; version=0.0.4");
    return buildPrometheusMetrics(getDbMetrics(), fastify.services.resolver.pendingClicks);
  });
}

/**
 * Build Prometheus-compatible metrics string
 */
export function buildPrometheusMetrics(dbMetrics: ReturnType<typeof getDbMetrics>, pendingClicks: number): string {
  const lines: string[] = [];

  lines.push("# HELP shortlane_api_db_queries_total Total database queries");
  lines.push("# TYPE shortlane_api_db_queries_total counter");
  lines.push(`shortlane_api_db_queries_total ${dbMetrics.totalQueries}`);

  lines.push("# HELP shortlane_api_db_slow_queries_total Slow database queries");
  lines.push("# TYPE shortlane_api_db_slow_queries_total counter");
  lines.push(`shortlane_api_db_slow_queries_total ${dbMetrics.slowQueries}`);

  lines.push("# HELP shortlane_api_db_errors_total Database errors");
  lines.push("# TYPE shortlane_api_db_errors_total counter");
  lines.push(`shortlane_api_db_errors_total ${dbMetrics.errors}`);

  lines.push("# HELP shortlane_api_db_avg_query_time_ms Average query time in ms");
  lines.push("# TYPE shortlane_api_db_avg_query_time_ms gauge");
  lines.push(`shortlane_api_db_avg_query_time_ms ${dbMetrics.avgQueryTimeMs.toFixed(2)}`);

  lines.push("# HELP shortlane_api_pending_clicks Click increments still being written");
  lines.push("# TYPE shortlane_api_pending_clicks gauge");
  lines.push(`shortlane_api_pending_clicks ${pendingClicks}`);

  return lines.join("\n");
}

// ============================================================================
// Error Handling
// ============================================================================

function registerErrorHandler(fastify: FastifyInstance, config: AppConfig): void {
  fastify.setErrorHandler((error, request, reply) => {
    if (error instanceof StoreUnavailableError) {
      request.log.error({ err: error }, "Store unavailable");
      return reply.status(503).send({
        success: false,
        error: "Service temporarily unavailable. Please try again.",
        errorCode: "SERVICE_UNAVAILABLE",
      });
    }

    // Rate limit exceeded
    if (error.statusCode === 429) {
      return reply.status(429).send({
        success: false,
        error: "Too many requests. Please try again later.",
        errorCode: "RATE_LIMITED",
      });
    }

    // Schema and body parsing errors
    if (error.validation || error.statusCode === 400 || error.statusCode === 415) {
      return reply.status(error.statusCode ?? 400).send({
        success: false,
        error: error.message,
        errorCode: "VALIDATION_FAILED",
      });
    }

    if (error.statusCode === 401) {
      return reply.status(401).send({
        success: false,
        error: "Authentication required",
        errorCode: "UNAUTHORIZED",
      });
    }

    request.log.error({ err: error }, "Request error");

    const statusCode = error.statusCode ?? 500;
    return reply.status(statusCode).send({
      success: false,
      error: config.nodeEnv === "production" ? "Internal server error" : error.message,
      errorCode: "INTERNAL_ERROR",
    });
  });
}

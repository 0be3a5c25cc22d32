/**
 * Shortlane API Service
 *
 * Main entry point. Loads configuration, opens the stores and Redis,
 * starts the server and shuts it down gracefully.
 *
 * Endpoints:
 *   POST /auth/register, /auth/login   - Accounts and tokens
 *   POST /links, GET /links            - Create and list short links
 *   GET/PATCH/DELETE /links/:code      - Manage a link
 *   GET  /:code                        - Redirect to the destination
 *   GET  /health, /metrics, /docs      - Operations
 */

import { Redis } from "ioredis";
import { logger } from "@shortlane/logger";
import {
  createPgClient,
  MemoryLinkStore,
  MemoryUserStore,
  PgLinkStore,
  PgUserStore,
  RetryingLinkStore,
  RetryingUserStore,
  type LinkStore,
  type PgClient,
  type UserStore,
} from "@shortlane/db";

import { loadConfig, validateConfig, type AppConfig } from "./config.js";
import { buildApp } from "./app.js";

interface Stores {
  linkStore: LinkStore;
  userStore: UserStore;
  pgClient: PgClient | null;
}

// ============================================================================
// Stores
// ============================================================================

async function openStores(config: AppConfig): Promise<Stores> {
  if (config.storeDriver === "memory" || !config.databaseUrl) {
    logger.warn("Using in-memory stores");
    return { linkStore: new MemoryLinkStore(), userStore: new MemoryUserStore(), pgClient: null };
  }

  const pgClient = createPgClient({
    connectionString: config.databaseUrl,
    max: config.dbPoolMax,
    timeoutMs: config.dbTimeoutMs,
  });

  if (!(await pgClient.ping())) {
    await pgClient.end();
    throw new Error("Database connection failed");
  }
  logger.info("Database connection verified");

  const retry = {
    attempts: config.storeRetryAttempts,
    delayMs: config.storeRetryDelayMs,
    logger,
  };

  return {
    linkStore: new RetryingLinkStore(new PgLinkStore(pgClient), retry),
    userStore: new RetryingUserStore(new PgUserStore(pgClient), retry),
    pgClient,
  };
}

// ============================================================================
// Redis Client for Rate Limiting
// ============================================================================

async function connectRedis(redisUrl: string | null): Promise<Redis | null> {
  if (!redisUrl) {
    logger.info("REDIS_URL not set, using in-memory rate limiting");
    return null;
  }

  const client = new Redis(redisUrl, {
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false,
    lazyConnect: true,
  });

  try {
    await client.connect();
    await client.ping();
    logger.info("Redis connected for rate limiting");
    return client;
  } catch (error) {
    logger.warn({ error }, "Redis not available, using in-memory rate limiting");
    client.disconnect();
    return null;
  }
}

// ============================================================================
// Server Start
// ============================================================================

async function start(): Promise<void> {
  const config = loadConfig();
  validateConfig(config);

  const { linkStore, userStore, pgClient } = await openStores(config);
  const redis = await connectRedis(config.redisUrl);

  const fastify = await buildApp({ config, linkStore, userStore, redis });

  // ==========================================================================
  // Graceful Shutdown
  // ==========================================================================

  let shuttingDown = false;

  async function gracefulShutdown(signal: string): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Received shutdown signal");

    try {
      // Stops accepting requests and drains background click writes
      await fastify.close();
      logger.info("Fastify server closed");

      if (redis) {
        await redis.quit();
        logger.info("Redis connection closed");
      }

      if (pgClient) {
        await pgClient.end();
        logger.info("Database connection closed");
      }

      process.exit(0);
    } catch (err) {
      logger.error({ err }, "Error during shutdown");
      process.exit(1);
    }
  }

  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));
  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));

  await fastify.listen({ port: config.port, host: config.host });

  logger.info(`Shortlane API running on http://${config.host}:${config.port}`);
  logger.info(`Swagger docs: http://${config.host}:${config.port}/docs`);
}

start().catch((err: unknown) => {
  logger.error({ err }, "Failed to start server");
  process.exit(1);
});

/**
 * Configuration Module
 *
 * Loads configuration from environment variables with defaults.
 * Fails fast on startup if required vars are missing.
 */

import { SHORTCODE_CONFIG } from "@shortlane/shared";
import { logger } from "@shortlane/logger";

export type StoreDriver = "postgres" | "memory";

export type ClickRecordingMode = "background" | "inline";

export interface AppConfig {
  // Server
  port: number;
  host: string;
  nodeEnv: string;
  /** pino-pretty output; needs NODE_ENV=development set explicitly */
  prettyLogs: boolean;
  corsOrigin: string | boolean;

  // Storage
  storeDriver: StoreDriver;
  databaseUrl: string | null;
  dbPoolMax: number;
  dbTimeoutMs: number;
  storeRetryAttempts: number;
  storeRetryDelayMs: number;

  // Redis (distributed rate limiting)
  redisUrl: string | null;

  // Auth
  jwtSecret: string;
  jwtExpiresInSeconds: number;
  bcryptRounds: number;

  // Links
  shortUrlBase: string;
  shortcodeLength: number;
  shortcodeMaxAttempts: number;
  clickRecording: ClickRecordingMode;

  // Rate limits, requests per minute
  rateLimit: {
    max: number;
    createMax: number;
    authMax: number;
  };
}

type Env = Record<string, string | undefined>;

const DEV_JWT_SECRET = "dev-only-secret-change-me";

// =============================================================================
// Environment Parsing Helpers
// =============================================================================

/**
 * Get required environment variable or throw.
 */
function required(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

/**
 * Get optional environment variable with default.
 */
function optional(env: Env, name: string, defaultValue: string): string {
  return env[name] || defaultValue;
}

/**
 * Parse integer with default.
 */
function optionalInt(env: Env, name: string, defaultValue: number): number {
  const value = env[name];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function oneOf<T extends string>(env: Env, name: string, allowed: readonly T[], defaultValue: T): T {
  const value = env[name];
  if (!value) return defaultValue;
  const match = allowed.find((candidate) => candidate === value.toLowerCase());
  if (!match) {
    throw new Error(`${name} must be one of ${allowed.join(", ")} (got "${value}")`);
  }
  return match;
}

// =============================================================================
// Configuration Loading
// =============================================================================

/**
 * Load configuration from environment.
 * Call once at startup.
 *
 * @throws Error if required variables are missing or malformed
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const nodeEnv = optional(env, "NODE_ENV", "development");
  const storeDriver = oneOf<StoreDriver>(env, "STORE_DRIVER", ["postgres", "memory"], "postgres");

  const jwtSecret = env.JWT_SECRET || DEV_JWT_SECRET;
  if (nodeEnv === "production" && jwtSecret === DEV_JWT_SECRET) {
    throw new Error("JWT_SECRET must be set in production environment");
  }

  return {
    port: optionalInt(env, "PORT", 3000),
    host: optional(env, "HOST", "0.0.0.0"),
    nodeEnv,
    prettyLogs: env.NODE_ENV === "development",
    corsOrigin: env.CORS_ORIGIN || true,

    storeDriver,
    databaseUrl: storeDriver === "postgres" ? required(env, "DATABASE_URL") : env.DATABASE_URL || null,
    dbPoolMax: optionalInt(env, "DB_POOL_MAX", 10),
    dbTimeoutMs: optionalInt(env, "DB_TIMEOUT_MS", 5000),
    storeRetryAttempts: optionalInt(env, "STORE_RETRY_ATTEMPTS", 3),
    storeRetryDelayMs: optionalInt(env, "STORE_RETRY_DELAY_MS", 50),

    redisUrl: env.REDIS_URL || null,

    jwtSecret,
    jwtExpiresInSeconds: optionalInt(env, "JWT_EXPIRES_IN_SECONDS", 7 * 24 * 60 * 60),
    bcryptRounds: optionalInt(env, "BCRYPT_ROUNDS", 12),

    shortUrlBase: optional(env, "SHORT_URL_BASE", "http://localhost:3000").replace(/\/+$/, ""),
    shortcodeLength: optionalInt(env, "SHORTCODE_LENGTH", SHORTCODE_CONFIG.DEFAULT_LENGTH),
    shortcodeMaxAttempts: optionalInt(env, "SHORTCODE_MAX_ATTEMPTS", SHORTCODE_CONFIG.MAX_ATTEMPTS),
    clickRecording: oneOf<ClickRecordingMode>(env, "CLICK_RECORDING", ["background", "inline"], "background"),

    rateLimit: {
      max: optionalInt(env, "RATE_LIMIT_MAX", 100),
      createMax: optionalInt(env, "RATE_LIMIT_CREATE_MAX", 20),
      authMax: optionalInt(env, "RATE_LIMIT_AUTH_MAX", 10),
    },
  };
}

/**
 * Validate configuration at runtime.
 * Logs warnings for suboptimal settings.
 */
export function validateConfig(config: AppConfig): void {
  const { MIN_LENGTH, MAX_LENGTH } = SHORTCODE_CONFIG.CODE;
  if (config.shortcodeLength < MIN_LENGTH || config.shortcodeLength > MAX_LENGTH) {
    throw new Error(`SHORTCODE_LENGTH must be between ${MIN_LENGTH} and ${MAX_LENGTH}`);
  }

  if (config.shortcodeMaxAttempts < 1 || config.storeRetryAttempts < 1) {
    throw new Error("SHORTCODE_MAX_ATTEMPTS and STORE_RETRY_ATTEMPTS must be at least 1");
  }

  if (config.shortcodeLength < 5) {
    logger.warn(
      { shortcodeLength: config.shortcodeLength },
      "SHORTCODE_LENGTH is short. Generated codes will collide often."
    );
  }

  if (config.storeDriver === "memory" && config.nodeEnv === "production") {
    logger.warn("STORE_DRIVER=memory keeps links in process memory. Nothing survives a restart.");
  }

  if (config.jwtSecret === DEV_JWT_SECRET) {
    logger.warn("JWT_SECRET is not set. Using the development secret.");
  }
}

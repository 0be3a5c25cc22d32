/**
 * JSON logging over pino, one named logger per component:
 *
 * ```ts
 * const log = createLogger("links");
 * log.info({ code }, "Link created");
 * ```
 *
 * LOG_LEVEL overrides the level (silent under NODE_ENV=test). Output is
 * pretty-printed only when NODE_ENV is explicitly "development", since
 * pino-pretty is a dev dependency.
 */

import pino from "pino";

const NODE_ENV = process.env.NODE_ENV || "development";
const LOG_LEVEL = process.env.LOG_LEVEL || (NODE_ENV === "test" ? "silent" : "info");
const SERVICE_NAME = process.env.SERVICE_NAME || "shortlane";

const PRETTY_LOGS = process.env.NODE_ENV === "development";

export function createLogger(name: string): pino.Logger {
  return pino({
    name: `${SERVICE_NAME}:${name}`,
    level: LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    transport: PRETTY_LOGS
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        }
      : undefined,
    base: {
      service: name,
      env: NODE_ENV,
    },
  });
}

export const logger = createLogger("main");

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

/**
 * LOG_LEVEL for Fastify's request logger
 */
export function getLogLevel(): LogLevel {
  const levels: LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];
  return levels.find((level) => level === LOG_LEVEL) ?? "info";
}

export type { Logger } from "pino";

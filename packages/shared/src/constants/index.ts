/**
 * Short Code Configuration Constants
 *
 * Single source of truth for short code generation and validation.
 */
export const SHORTCODE_CONFIG = {
  /**
   * Default length for generated codes.
   * 58^6 = ~38 billion combinations.
   */
  DEFAULT_LENGTH: 6,

  /**
   * Letters and digits without 0, O, I and l, which are easy to misread.
   */
  ALPHABET: "abcdefghijkmnopqrstuvwxyzABCDEFGHJKLMNPQRSTUVWXYZ123456789",

  /** Draws allowed before a generated code gives up */
  MAX_ATTEMPTS: 10,

  /**
   * Constraints shared by custom codes and configured generator lengths.
   */
  CODE: {
    MIN_LENGTH: 3,
    MAX_LENGTH: 50,
    PATTERN: /^[a-zA-Z0-9_-]+$/,
  },
} as const;

/**
 * Codes that collide with the service's own routes or are held back.
 * Compared case-insensitively.
 */
export const RESERVED_CODES: ReadonlySet<string> = new Set([
  "admin",
  "api",
  "auth",
  "docs",
  "health",
  "links",
  "login",
  "logout",
  "metrics",
  "redoc",
  "signup",
]);

/**
 * Destination URL Constants
 */
export const URL_CONFIG = {
  /** Maximum URL length to store */
  MAX_LENGTH: 2048,

  ALLOWED_PROTOCOLS: ["http:", "https:"] as const,

  /** Exact hosts refused besides the 127.0.0.0/8 range and IPv6 loopback forms */
  BLOCKED_HOSTS: ["localhost", "0.0.0.0", "[::]", "[::1]"] as const,
} as const;

/** Maximum title length */
export const TITLE_MAX_LENGTH = 255;

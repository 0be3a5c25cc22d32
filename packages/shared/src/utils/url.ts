/**
 * Destination URL validation
 */

import { URL_CONFIG } from "../constants/index.js";
import type { DestinationValidation } from "../types/index.js";

const IPV4_LOOPBACK = /^127\.\d{1,3}\.\d{1,3}\.\d{1,3}$/;
// WHATWG URL prints an IPv4-mapped address in hex: [::ffff:7f00:1]
const IPV4_MAPPED_LOOPBACK = /^\[::ffff:7f[0-9a-f]{2}:[0-9a-f]{1,4}\]$/;

function isAllowedProtocol(protocol: string): boolean {
  return URL_CONFIG.ALLOWED_PROTOCOLS.some((allowed) => allowed === protocol);
}

/**
 * Loopback and unspecified hosts. Hostnames arrive lower-cased, with IPv4
 * shorthand (0x7f.1, 2130706433) already expanded to dotted decimal.
 */
function isBlockedHost(hostname: string): boolean {
  const host = hostname.endsWith(".") ? hostname.slice(0, -1) : hostname;

  if (URL_CONFIG.BLOCKED_HOSTS.some((blocked) => blocked === host)) return true;
  if (host.endsWith(".localhost")) return true;
  return IPV4_LOOPBACK.test(host) || IPV4_MAPPED_LOOPBACK.test(host);
}

/**
 * Validate a destination URL.
 *
 * Accepts absolute http(s) URLs up to URL_CONFIG.MAX_LENGTH characters
 * that do not point back at a loopback host. The returned `href` is the
 * percent-encoded form, safe to send in a Location header.
 */
export function validateDestination(destination: string): DestinationValidation {
  if (destination.length === 0) {
    return { valid: false, error: "Destination URL is required" };
  }

  const tooLong = `Destination URL too long (max ${URL_CONFIG.MAX_LENGTH} characters)`;
  if (destination.length > URL_CONFIG.MAX_LENGTH) {
    return { valid: false, error: tooLong };
  }

  let parsed: URL;
  try {
    parsed = new URL(destination);
  } catch {
    return { valid: false, error: "Destination is not a valid URL" };
  }

  if (!isAllowedProtocol(parsed.protocol)) {
    return { valid: false, error: "Destination must use http or https" };
  }

  if (isBlockedHost(parsed.hostname)) {
    return { valid: false, error: "Destination host is not allowed" };
  }

  // percent-encoding can push a URL over the limit
  if (parsed.href.length > URL_CONFIG.MAX_LENGTH) {
    return { valid: false, error: tooLong };
  }

  return { valid: true, href: parsed.href };
}

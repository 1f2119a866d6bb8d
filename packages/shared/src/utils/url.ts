/**
 * URL Validation
 */

import { URL_CONFIG } from "../constants/index.js";

/**
 * On success `url` is the serialized form of the input: tabs and newlines
 * removed, non-ASCII percent-encoded, host lowercased (punycode for IDNs).
 * It is always a legal HTTP header value.
 */
export type UrlValidationResult = { valid: true; url: string } | { valid: false; error: string };

/**
 * Validate a destination URL and return its normalized form.
 *
 * Must be absolute, use http or https, and name a host.
 */
export function validateUrl(url: string): UrlValidationResult {
  if (!url) {
    return { valid: false, error: "URL is required" };
  }

  const parsed = parseHttpUrl(url);
  if (!parsed) {
    return {
      valid: false,
      error: "Invalid URL format. Must start with http:// or https://",
    };
  }

  return { valid: true, url: parsed.href };
}

export function isValidUrl(url: string): boolean {
  return parseHttpUrl(url) !== null;
}

function parseHttpUrl(url: string): URL | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return null;
  }

  if (!URL_CONFIG.ALLOWED_PROTOCOLS.includes(parsed.protocol) || parsed.hostname.length === 0) {
    return null;
  }
  return parsed;
}

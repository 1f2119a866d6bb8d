/**
 * Short Code Configuration Constants
 *
 * Single source of truth for short code generation and validation.
 */
export const SHORTCODE_CONFIG = {
  /**
   * Length for auto-generated short codes.
   * 62^6 = ~5.7 × 10^10 combinations.
   */
  DEFAULT_LENGTH: 6,

  /** Letters then digits, 62 characters total. */
  ALPHABET: "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789",

  /**
   * Attempt budget for random allocation.
   * Fixed policy, not derived from alphabet size; overridable per allocator.
   */
  MAX_ATTEMPTS: 10,

  /**
   * Any short code accepted by the store, custom or generated.
   */
  PATTERN: /^[A-Za-z0-9_-]+$/,

  /** Custom code constraints (user-provided short codes). */
  CUSTOM_CODE: {
    MAX_LENGTH: 20,
  },

  /**
   * Top-level route segments owned by the HTTP layer.
   * A short code with one of these names could never be reached.
   */
  RESERVED: ["api", "health"] as readonly string[],
} as const;

/**
 * URL Validation Constants
 */
export const URL_CONFIG = {
  /** Allowed protocols */
  ALLOWED_PROTOCOLS: ["http:", "https:"] as readonly string[],
} as const;

/**
 * Number of mappings returned by the recent listing.
 */
export const RECENT_MAPPINGS_LIMIT = 10;

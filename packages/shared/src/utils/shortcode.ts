/**
 * Short Code Generation Module
 *
 * ┌─────────────────────────────────────────────────────────────────────────┐
 * │ RESPONSIBILITIES                                                        │
 * ├─────────────────────────────────────────────────────────────────────────┤
 * │ 1. GENERATION  - Random Base62 code creation                            │
 * │ 2. VALIDATION  - Custom code and route parameter checking               │
 * └─────────────────────────────────────────────────────────────────────────┘
 *
 * Strategy: Random Base62
 * - Length: 6 characters (62^6 ≈ 5.7 × 10^10 combinations)
 * - Alphabet: a-zA-Z0-9
 * - Collision handling lives in the allocator: check → insert → retry
 */

import { randomInt } from "node:crypto";
import { SHORTCODE_CONFIG } from "../constants/index.js";

// =============================================================================
// TYPES
// =============================================================================

/**
 * Result of a validation operation; `error` is the user-facing message.
 */
export type ValidationResult = { valid: true } | { valid: false; error: string };

/**
 * Returns an integer in [0, max), uniformly distributed.
 */
export type RandomSource = (max: number) => number;

/**
 * Default source: rejection-sampled CSPRNG, no modulo bias.
 */
export const cryptoRandom: RandomSource = (max) => randomInt(max);

// =============================================================================
// SECTION 1: GENERATION
// =============================================================================

/**
 * Generate a random Base62 short code.
 *
 * @example
 * ```ts
 * const code = generateRandomCode();  // "aB3xY9"
 * const pinned = generateRandomCode(4, () => 0); // "aaaa"
 * ```
 */
export function generateRandomCode(
  length: number = SHORTCODE_CONFIG.DEFAULT_LENGTH,
  random: RandomSource = cryptoRandom
): string {
  const { ALPHABET } = SHORTCODE_CONFIG;

  let code = "";
  for (let i = 0; i < length; i++) {
    code += ALPHABET.charAt(random(ALPHABET.length));
  }

  return code;
}

// =============================================================================
// SECTION 2: VALIDATION
// =============================================================================

/**
 * Validate a user-provided custom code.
 *
 * Rules:
 * - Characters: a-zA-Z0-9, hyphen (-), underscore (_)
 * - At most 20 characters
 *
 * Availability (taken or reserved) is the allocator's concern.
 *
 * @example
 * ```ts
 * validateCustomCode("my-link")    // { valid: true }
 * validateCustomCode("bad code!")  // { valid: false, error: "..." }
 * ```
 */
export function validateCustomCode(code: string): ValidationResult {
  const { PATTERN, CUSTOM_CODE } = SHORTCODE_CONFIG;

  if (!PATTERN.test(code)) {
    return {
      valid: false,
      error: "Custom code can only contain letters, numbers, hyphens, and underscores",
    };
  }

  if (code.length > CUSTOM_CODE.MAX_LENGTH) {
    return {
      valid: false,
      error: `Custom code must be ${CUSTOM_CODE.MAX_LENGTH} characters or less`,
    };
  }

  return { valid: true };
}

/**
 * Cheap format check for a code arriving on the redirect path.
 * Rejects anything that could never have been stored.
 */
export function isValidShortCode(code: string): boolean {
  return SHORTCODE_CONFIG.PATTERN.test(code);
}

/**
 * Check if a code collides with a route the HTTP layer owns.
 */
export function isReservedCode(code: string): boolean {
  return SHORTCODE_CONFIG.RESERVED.includes(code);
}

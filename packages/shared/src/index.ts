/**
 * @snaplink/shared - Shared Package Exports
 *
 * Central export point for shared types, errors, utilities, and constants.
 *
 * ```ts
 * import { generateRandomCode, validateCustomCode, CodeTakenError } from "@snaplink/shared";
 * ```
 */

// Types (UrlMapping, AggregateStats, wire responses)
export * from "./types/index.js";

// Error taxonomy
export * from "./errors.js";

// Utilities (short code generation, code and URL validation)
export * from "./utils/index.js";

// Constants (SHORTCODE_CONFIG, URL_CONFIG)
export * from "./constants/index.js";

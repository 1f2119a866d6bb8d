export { generateRandomCode, cryptoRandom, type RandomSource } from "./shortcode.js";
export {
  validateCustomCode,
  isValidShortCode,
  isReservedCode,
  type ValidationResult,
} from "./shortcode.js";
export { validateUrl, isValidUrl, type UrlValidationResult } from "./url.js";

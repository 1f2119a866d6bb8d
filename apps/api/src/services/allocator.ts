/**
 * Alias Allocator
 *
 * Chooses the short code for a new URL: either the caller's custom code or
 * a random Base62 candidate, then claims it in the store.
 *
 * Uniqueness is optimistic: `exists()` filters out known collisions and
 * the store's own uniqueness constraint (DuplicateError) is the guard.
 * Random candidates that collide either way, or that land on a reserved
 * route name, count against one shared attempt budget.
 */

import {
  AllocationExhaustedError,
  CodeTakenError,
  DuplicateError,
  InvalidCodeFormatError,
  InvalidUrlError,
  SHORTCODE_CONFIG,
  cryptoRandom,
  generateRandomCode,
  isReservedCode,
  validateCustomCode,
  validateUrl,
  type RandomSource,
  type UrlMapping,
} from "@snaplink/shared";
import type { AliasStore } from "@snaplink/db";
import { createLogger } from "@snaplink/logger";

const log = createLogger("allocator");

export interface AllocatorOptions {
  /** Random-path attempt budget (collisions and lost races combined) */
  maxAttempts?: number;
  /** Length of generated codes */
  codeLength?: number;
  /** Uniform integer source used to draw code symbols */
  random?: RandomSource;
}

export class AliasAllocator {
  private readonly maxAttempts: number;
  private readonly codeLength: number;
  private readonly random: RandomSource;

  constructor(
    private readonly store: AliasStore,
    options: AllocatorOptions = {}
  ) {
    this.maxAttempts = options.maxAttempts ?? SHORTCODE_CONFIG.MAX_ATTEMPTS;
    this.codeLength = options.codeLength ?? SHORTCODE_CONFIG.DEFAULT_LENGTH;
    this.random = options.random ?? cryptoRandom;
  }

  /**
   * Create a mapping for `originalUrl`, recording the creation in today's
   * daily stat once the mapping exists.
   *
   * An empty or whitespace-only `customCode` means "generate one".
   * The mapping stores the normalized URL (see `validateUrl`), which is
   * what the redirect later sends as `Location`.
   *
   * @throws InvalidUrlError
   * @throws InvalidCodeFormatError
   * @throws CodeTakenError custom code taken or reserved
   * @throws AllocationExhaustedError random budget spent
   */
  async allocate(originalUrl: string, customCode?: string | null): Promise<UrlMapping> {
    const urlCheck = validateUrl(originalUrl.trim());
    if (!urlCheck.valid) {
      throw new InvalidUrlError(urlCheck.error);
    }
    const { url } = urlCheck;

    const code = customCode?.trim() ?? "";
    const isCustom = code.length > 0;
    const mapping = isCustom ? await this.claimCustom(code, url) : await this.claimRandom(url);

    await this.store.recordCreation();

    log.info({ shortCode: mapping.shortCode, isCustom }, "Link created");
    return mapping;
  }

  /**
   * Single attempt: the caller asked for this exact code.
   */
  private async claimCustom(code: string, url: string): Promise<UrlMapping> {
    const check = validateCustomCode(code);
    if (!check.valid) {
      throw new InvalidCodeFormatError(check.error);
    }

    if (isReservedCode(code)) {
      throw new CodeTakenError(code, "Custom code is reserved. Please choose a different one.");
    }

    if (await this.store.exists(code)) {
      throw new CodeTakenError(code);
    }

    try {
      return await this.store.insert(code, url);
    } catch (err) {
      if (err instanceof DuplicateError) {
        throw new CodeTakenError(code);
      }
      throw err;
    }
  }

  private async claimRandom(url: string): Promise<UrlMapping> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const code = generateRandomCode(this.codeLength, this.random);

      if (isReservedCode(code)) {
        log.debug({ attempt, shortCode: code }, "Drew a reserved code, retrying");
        continue;
      }

      if (await this.store.exists(code)) {
        log.debug({ attempt, shortCode: code }, "Short code collision, retrying");
        continue;
      }

      try {
        return await this.store.insert(code, url);
      } catch (err) {
        if (!(err instanceof DuplicateError)) {
          throw err;
        }
        log.debug({ attempt, shortCode: code }, "Lost insert race, retrying");
      }
    }

    log.warn({ attempts: this.maxAttempts }, "Short code allocation exhausted");
    throw new AllocationExhaustedError(this.maxAttempts);
  }
}

/**
 * Short Code Generation Tests
 *
 * @see packages/shared/src/utils/shortcode.ts
 */

import { describe, it, expect, jest } from "@jest/globals";
import {
  generateRandomCode,
  validateCustomCode,
  isValidShortCode,
  isReservedCode,
  SHORTCODE_CONFIG,
  type RandomSource,
} from "../src/index.js";

describe("Short Code Generation", () => {
  describe("generateRandomCode", () => {
    it("should generate a code of default length", () => {
      const code = generateRandomCode();
      expect(code).toHaveLength(6);
    });

    it("should generate a code of specified length", () => {
      expect(generateRandomCode(10)).toHaveLength(10);
    });

    it("should only contain alphanumeric characters", () => {
      for (let i = 0; i < 200; i++) {
        expect(generateRandomCode()).toMatch(/^[a-zA-Z0-9]{6}$/);
      }
    });

    it("should draw every symbol from the full 62-character alphabet", () => {
      const random = jest.fn<RandomSource>().mockReturnValue(0);

      generateRandomCode(6, random);

      expect(random).toHaveBeenCalledTimes(6);
      for (const call of random.mock.calls) {
        expect(call[0]).toBe(62);
      }
    });

    it("should map random indexes onto the alphabet", () => {
      const indexes = [0, 25, 26, 51, 52, 61];
      let next = 0;
      const random: RandomSource = () => indexes[next++];

      expect(generateRandomCode(6, random)).toBe("azAZ09");
    });

    it("should be deterministic for a degenerate random source", () => {
      expect(generateRandomCode(6, () => 0)).toBe("aaaaaa");
      expect(generateRandomCode(6, () => 0)).toBe("aaaaaa");
    });

    it("should generate unique codes (statistical test)", () => {
      const codes = new Set<string>();
      const iterations = 1000;

      for (let i = 0; i < iterations; i++) {
        codes.add(generateRandomCode());
      }

      expect(codes.size).toBe(iterations);
    });
  });

  describe("SHORTCODE_CONFIG", () => {
    it("should use a 62 symbol alphabet without duplicates", () => {
      expect(SHORTCODE_CONFIG.ALPHABET).toHaveLength(62);
      expect(new Set(SHORTCODE_CONFIG.ALPHABET).size).toBe(62);
    });

    it("should allow 10 allocation attempts", () => {
      expect(SHORTCODE_CONFIG.MAX_ATTEMPTS).toBe(10);
    });
  });
});

describe("Short Code Validation", () => {
  describe("validateCustomCode", () => {
    it.each(["ab", "myLink123", "my-link", "my_link", "-x-", "a", "A".repeat(20)])(
      "should accept %s",
      (code) => {
        expect(validateCustomCode(code)).toEqual({ valid: true });
      }
    );

    it("should reject spaces and punctuation", () => {
      expect(validateCustomCode("bad code!")).toEqual({
        valid: false,
        error: "Custom code can only contain letters, numbers, hyphens, and underscores",
      });
    });

    it.each(["", "a/b", "a.b", "ümlaut", "with space"])("should reject %p", (code) => {
      expect(validateCustomCode(code).valid).toBe(false);
    });

    it("should reject codes longer than 20 characters", () => {
      expect(validateCustomCode("a".repeat(21))).toEqual({
        valid: false,
        error: "Custom code must be 20 characters or less",
      });
    });

    it("should report the character rule before the length rule", () => {
      expect(validateCustomCode("!".repeat(25))).toEqual({
        valid: false,
        error: "Custom code can only contain letters, numbers, hyphens, and underscores",
      });
    });
  });

  describe("isValidShortCode", () => {
    it("should accept generated and custom shapes", () => {
      expect(isValidShortCode("aB3xY9")).toBe(true);
      expect(isValidShortCode("my-custom_code")).toBe(true);
    });

    it("should reject anything outside the code charset", () => {
      expect(isValidShortCode("")).toBe(false);
      expect(isValidShortCode("favicon.ico")).toBe(false);
      expect(isValidShortCode("a%20b")).toBe(false);
    });
  });

  describe("isReservedCode", () => {
    it("should reserve the HTTP route names", () => {
      expect(isReservedCode("api")).toBe(true);
      expect(isReservedCode("health")).toBe(true);
    });

    it("should not reserve ordinary codes", () => {
      expect(isReservedCode("ab")).toBe(false);
      expect(isReservedCode("healthy")).toBe(false);
    });
  });
});

/**
 * Alias Allocator Tests
 *
 * @see apps/api/src/services/allocator.ts
 */

import { describe, it, expect, jest, beforeEach } from "@jest/globals";
import {
  AllocationExhaustedError,
  CodeTakenError,
  DuplicateError,
  InvalidCodeFormatError,
  InvalidUrlError,
  StorageError,
} from "@snaplink/shared";
import { MemoryAliasStore } from "@snaplink/db";
import { AliasAllocator } from "../src/services/index.js";
import { NOW, sequenceRandom } from "./setup.js";

describe("AliasAllocator", () => {
  let store: MemoryAliasStore;
  let allocator: AliasAllocator;

  beforeEach(() => {
    store = new MemoryAliasStore({ clock: () => NOW });
    allocator = new AliasAllocator(store);
  });

  describe("random codes", () => {
    it("should allocate a 6-character Base62 code and record the creation", async () => {
      const mapping = await allocator.allocate("https://x.com");

      expect(mapping.shortCode).toMatch(/^[A-Za-z0-9]{6}$/);
      expect(mapping.originalUrl).toBe("https://x.com/");
      expect(mapping.clicks).toBe(0);
      await expect(store.aggregateStats()).resolves.toEqual({
        totalUrls: 1,
        totalClicks: 0,
        todayUrls: 1,
        todayClicks: 0,
      });
    });

    it("should draw symbols from the injected source", async () => {
      allocator = new AliasAllocator(store, { random: sequenceRandom([0, 25, 26, 51, 52, 61]) });

      const mapping = await allocator.allocate("https://x.com");

      expect(mapping.shortCode).toBe("azAZ09");
    });

    it("should honor a custom code length", async () => {
      allocator = new AliasAllocator(store, { codeLength: 8 });

      const mapping = await allocator.allocate("https://x.com");

      expect(mapping.shortCode).toHaveLength(8);
    });

    it("should never hand out the same code twice under concurrency", async () => {
      const mappings = await Promise.all(
        Array.from({ length: 200 }, (_, i) => allocator.allocate(`https://x.com/${i}`))
      );

      const codes = new Set(mappings.map((m) => m.shortCode));
      expect(codes.size).toBe(200);
      await expect(store.aggregateStats()).resolves.toMatchObject({ totalUrls: 200, todayUrls: 200 });
    });

    it("should retry past an existing code", async () => {
      await store.insert("aaaaaa", "https://taken.example");
      allocator = new AliasAllocator(store, {
        random: sequenceRandom([0, 0, 0, 0, 0, 0, 1]),
      });

      const mapping = await allocator.allocate("https://x.com");

      expect(mapping.shortCode).toBe("bbbbbb");
    });

    it("should give up after exactly 10 collisions", async () => {
      const exists = jest.spyOn(store, "exists").mockResolvedValue(true);
      const insert = jest.spyOn(store, "insert");

      const err = await allocator.allocate("https://x.com").catch((e: unknown) => e);

      expect(err).toBeInstanceOf(AllocationExhaustedError);
      expect(err).toMatchObject({ attempts: 10 });
      expect(exists).toHaveBeenCalledTimes(10);
      expect(insert).not.toHaveBeenCalled();
    });

    it("should use a configured attempt budget", async () => {
      allocator = new AliasAllocator(store, { maxAttempts: 3 });
      const exists = jest.spyOn(store, "exists").mockResolvedValue(true);

      await expect(allocator.allocate("https://x.com")).rejects.toBeInstanceOf(AllocationExhaustedError);
      expect(exists).toHaveBeenCalledTimes(3);
    });

    it("should exhaust when the random source is degenerate", async () => {
      allocator = new AliasAllocator(store, { random: () => 0 });

      await expect(allocator.allocate("https://x.com/1")).resolves.toMatchObject({ shortCode: "aaaaaa" });
      await expect(allocator.allocate("https://x.com/2")).rejects.toBeInstanceOf(AllocationExhaustedError);
      await expect(store.aggregateStats()).resolves.toMatchObject({ totalUrls: 1, todayUrls: 1 });
    });

    it("should skip a reserved code without touching the store", async () => {
      allocator = new AliasAllocator(store, {
        // "health", then "bbbbbb"
        random: sequenceRandom([7, 4, 0, 11, 19, 7, 1]),
      });
      const exists = jest.spyOn(store, "exists");

      const mapping = await allocator.allocate("https://x.com");

      expect(mapping.shortCode).toBe("bbbbbb");
      expect(exists).toHaveBeenCalledTimes(1);
      expect(exists).toHaveBeenCalledWith("bbbbbb");
    });

    it("should count reserved draws against the budget", async () => {
      allocator = new AliasAllocator(store, {
        maxAttempts: 1,
        random: sequenceRandom([7, 4, 0, 11, 19, 7]),
      });

      await expect(allocator.allocate("https://x.com")).rejects.toBeInstanceOf(AllocationExhaustedError);
      await expect(store.exists("health")).resolves.toBe(false);
    });

    it("should count a lost insert race against the budget and retry", async () => {
      allocator = new AliasAllocator(store, {
        random: sequenceRandom([0, 0, 0, 0, 0, 0, 1]),
      });
      const insert = jest.spyOn(store, "insert").mockRejectedValueOnce(new DuplicateError("aaaaaa"));

      const mapping = await allocator.allocate("https://x.com");

      expect(mapping.shortCode).toBe("bbbbbb");
      expect(insert).toHaveBeenCalledTimes(2);
    });

    it("should exhaust when every insert loses its race", async () => {
      allocator = new AliasAllocator(store, { maxAttempts: 4 });
      const insert = jest.spyOn(store, "insert").mockRejectedValue(new DuplicateError("x"));

      await expect(allocator.allocate("https://x.com")).rejects.toBeInstanceOf(AllocationExhaustedError);
      expect(insert).toHaveBeenCalledTimes(4);
    });

    it("should not retry storage failures", async () => {
      const failure = new StorageError("insert", new Error("disk full"));
      const insert = jest.spyOn(store, "insert").mockRejectedValueOnce(failure);

      await expect(allocator.allocate("https://x.com")).rejects.toBe(failure);
      expect(insert).toHaveBeenCalledTimes(1);
    });
  });

  describe("custom codes", () => {
    it("should claim a custom code once", async () => {
      await expect(allocator.allocate("https://x.com", "ab")).resolves.toMatchObject({ shortCode: "ab" });

      const err = await allocator.allocate("https://y.com", "ab").catch((e: unknown) => e);
      expect(err).toBeInstanceOf(CodeTakenError);
      expect(err).toMatchObject({
        shortCode: "ab",
        message: "Custom code already exists. Please choose a different one.",
      });
    });

    it("should reject malformed codes", async () => {
      const err = await allocator.allocate("https://x.com", "bad code!").catch((e: unknown) => e);

      expect(err).toBeInstanceOf(InvalidCodeFormatError);
      expect(err).toMatchObject({
        message: "Custom code can only contain letters, numbers, hyphens, and underscores",
      });
    });

    it("should reject codes longer than 20 characters", async () => {
      await expect(allocator.allocate("https://x.com", "a".repeat(20))).resolves.toBeDefined();

      const err = await allocator.allocate("https://x.com", "b".repeat(21)).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(InvalidCodeFormatError);
      expect(err).toMatchObject({ message: "Custom code must be 20 characters or less" });
    });

    it("should reject reserved route names", async () => {
      const err = await allocator.allocate("https://x.com", "health").catch((e: unknown) => e);

      expect(err).toBeInstanceOf(CodeTakenError);
      expect(err).toMatchObject({ message: "Custom code is reserved. Please choose a different one." });
    });

    it("should trim the code and treat blank as absent", async () => {
      await expect(allocator.allocate("https://x.com", "  mine  ")).resolves.toMatchObject({
        shortCode: "mine",
      });

      const generated = await allocator.allocate("https://x.com", "   ");
      expect(generated.shortCode).toMatch(/^[A-Za-z0-9]{6}$/);
    });

    it("should let one of many concurrent claims win", async () => {
      const results = await Promise.allSettled(
        Array.from({ length: 10 }, (_, i) => allocator.allocate(`https://x.com/${i}`, "same"))
      );

      const rejected = results.filter((r): r is PromiseRejectedResult => r.status === "rejected");
      expect(results.filter((r) => r.status === "fulfilled")).toHaveLength(1);
      expect(rejected).toHaveLength(9);
      for (const r of rejected) {
        expect(r.reason).toBeInstanceOf(CodeTakenError);
      }
      await expect(store.aggregateStats()).resolves.toMatchObject({ totalUrls: 1, todayUrls: 1 });
    });

    it("should surface a lost insert race as CodeTakenError without retrying", async () => {
      await store.insert("mine", "https://first.example");
      jest.spyOn(store, "exists").mockResolvedValue(false);
      const insert = jest.spyOn(store, "insert");

      await expect(allocator.allocate("https://x.com", "mine")).rejects.toBeInstanceOf(CodeTakenError);
      expect(insert).toHaveBeenCalledTimes(1);
    });
  });

  describe("URL validation", () => {
    it.each([
      ["not-a-url", "Invalid URL format. Must start with http:// or https://"],
      ["ftp://x.com", "Invalid URL format. Must start with http:// or https://"],
      ["", "URL is required"],
      ["   ", "URL is required"],
    ])("should reject %j", async (url, message) => {
      const err = await allocator.allocate(url).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(InvalidUrlError);
      expect(err).toMatchObject({ message });
    });

    it("should accept and trim a valid URL", async () => {
      await expect(allocator.allocate("  https://x.com  ")).resolves.toMatchObject({
        originalUrl: "https://x.com/",
      });
    });

    it("should store the normalized URL", async () => {
      await expect(allocator.allocate("https://x.com/a\nb", "nl")).resolves.toMatchObject({
        originalUrl: "https://x.com/ab",
      });
      await expect(allocator.allocate("https://x.com/日本", "cjk")).resolves.toMatchObject({
        originalUrl: "https://x.com/%E6%97%A5%E6%9C%AC",
      });
      await expect(store.lookup("cjk")).resolves.toMatchObject({
        originalUrl: "https://x.com/%E6%97%A5%E6%9C%AC",
      });
    });

    it("should validate the URL before the custom code", async () => {
      await expect(allocator.allocate("not-a-url", "bad code!")).rejects.toBeInstanceOf(InvalidUrlError);
    });

    it("should not touch the store when validation fails", async () => {
      const exists = jest.spyOn(store, "exists");
      const recordCreation = jest.spyOn(store, "recordCreation");

      await expect(allocator.allocate("ftp://x.com")).rejects.toBeInstanceOf(InvalidUrlError);
      await expect(allocator.allocate("https://x.com", "bad code!")).rejects.toBeInstanceOf(
        InvalidCodeFormatError
      );

      expect(exists).not.toHaveBeenCalled();
      expect(recordCreation).not.toHaveBeenCalled();
    });
  });
});

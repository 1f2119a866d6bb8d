/**
 * @snaplink/db - Alias Store Package
 *
 * Persistent storage for URL mappings and daily statistics.
 *
 * Usage:
 * ```ts
 * import { createAliasStore } from "@snaplink/db";
 *
 * const store = await createAliasStore({ driver: "postgres", databaseUrl });
 * const mapping = await store.insert("abc123", "https://example.com");
 * await store.recordCreation();
 * ```
 */

export type { AliasStore, StoreOptions } from "./store.js";
export { MemoryAliasStore } from "./memory-store.js";
export { PostgresAliasStore, SQL } from "./postgres-store.js";
export { createAliasStore, type StoreConfig, type StoreDriver } from "./factory.js";
export { createPool, type PoolConfig } from "./client.js";
export { initSchema, SCHEMA_STATEMENTS } from "./schema.js";
export { WriteLock } from "./write-lock.js";
export { systemClock, toDateKey, type Clock } from "./dates.js";
export * from "./types.js";

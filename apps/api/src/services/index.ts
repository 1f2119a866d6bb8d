/**
 * API Services
 *
 * Business logic layer between the routes and the alias store.
 */

export { AliasAllocator, type AllocatorOptions } from "./allocator.js";
export { LinkService } from "./links.js";

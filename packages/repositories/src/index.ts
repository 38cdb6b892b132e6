/**
 * packages/repositories - Shared Repository Layer
 *
 * - Interface-based repository pattern
 * - Postgres (drizzle) and in-memory implementations of the same interfaces
 */

export * from "./interfaces";
export * from "./postgres";
export * from "./memory";
export * from "./types";

/**
 * packages/db - Database Schema (Drizzle SoT)
 *
 * - Single source of truth for all market-making tables
 * - Prices/sizes are numeric (strings in drizzle), times are timestamptz (UTC)
 */

// Quoting
export * from "./mm-quote";
export * from "./mm-fill";

// Inventory (1 row per market/token upsert)
export * from "./mm-inventory";

// Risk
export * from "./high-water-mark";

// Reporting
export * from "./mm-daily-metrics";
export * from "./bot-status";

/**
 * mm_inventory - Latest position per (market, token)
 *
 * Source of truth across restarts; reconciliation corrects memory towards it.
 */

import { numeric, pgTable, primaryKey, text, timestamp } from "drizzle-orm/pg-core";

export const mmInventory = pgTable(
  "mm_inventory",
  {
    marketId: text("market_id").notNull(),
    tokenId: text("token_id").notNull(),
    leg: text("leg").notNull(),
    position: numeric("position").notNull(),
    avgEntry: numeric("avg_entry").notNull(),
    realizedPnl: numeric("realized_pnl").notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true, mode: "date" }).notNull().defaultNow(),
  },
  table => [primaryKey({ columns: [table.marketId, table.tokenId] })],
);

export type MmInventory = typeof mmInventory.$inferSelect;
export type NewMmInventory = typeof mmInventory.$inferInsert;

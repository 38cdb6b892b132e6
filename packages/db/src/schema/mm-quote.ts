/**
 * mm_quote - Quote pairs placed by the market maker
 *
 * - One row per placement; requotes insert a new row and retire the old one
 * - status: active / filled / cancelled / replaced / killed
 * - mid_price is the mid observed at quote time
 */

import { index, integer, numeric, pgTable, serial, text, timestamp } from "drizzle-orm/pg-core";

export const mmQuote = pgTable(
  "mm_quote",
  {
    id: serial("id").primaryKey(),
    marketId: text("market_id").notNull(),
    tokenId: text("token_id").notNull(),
    noTokenId: text("no_token_id"),
    conditionId: text("condition_id"),
    bidPrice: numeric("bid_price").notNull(),
    askPrice: numeric("ask_price").notNull(),
    bidSize: numeric("bid_size").notNull(),
    askSize: numeric("ask_size").notNull(),
    bidOrderId: text("bid_order_id"),
    askOrderId: text("ask_order_id"),
    midPrice: numeric("mid_price").notNull(),
    status: text("status").notNull(),
    levels: integer("levels").notNull().default(1),
    createdAt: timestamp("created_at", { withTimezone: true, mode: "date" }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true, mode: "date" }).notNull().defaultNow(),
  },
  table => [index("mm_quote_status_market_idx").on(table.status, table.marketId)],
);

export type MmQuote = typeof mmQuote.$inferSelect;
export type NewMmQuote = typeof mmQuote.$inferInsert;

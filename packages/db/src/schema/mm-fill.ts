/**
 * mm_fill - Fills detected while reconciling quotes
 *
 * - One row per filled order side (order_id unique, inserts are idempotent)
 * - leg: yes / no
 */

import { index, integer, numeric, pgTable, text, timestamp, uniqueIndex, uuid } from "drizzle-orm/pg-core";

export const mmFill = pgTable(
  "mm_fill",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    ts: timestamp("ts", { withTimezone: true, mode: "date" }).notNull(),
    quoteId: integer("quote_id"),
    marketId: text("market_id").notNull(),
    tokenId: text("token_id").notNull(),
    orderId: text("order_id").notNull(),
    leg: text("leg").notNull(),
    side: text("side").notNull(),
    price: numeric("price").notNull(),
    size: numeric("size").notNull(),
    fee: numeric("fee").notNull().default("0"),
    midAtFill: numeric("mid_at_fill"),
    realizedPnl: numeric("realized_pnl"),
  },
  table => [
    uniqueIndex("mm_fill_order_id_uidx").on(table.orderId),
    index("mm_fill_market_ts_idx").on(table.marketId, table.ts.desc()),
  ],
);

export type MmFill = typeof mmFill.$inferSelect;
export type NewMmFill = typeof mmFill.$inferInsert;

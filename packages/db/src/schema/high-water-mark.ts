/**
 * high_water_mark - Peak portfolio value (single row, id = 1)
 */

import { integer, numeric, pgTable, timestamp } from "drizzle-orm/pg-core";

export const HIGH_WATER_MARK_ROW_ID = 1;

export const highWaterMark = pgTable("high_water_mark", {
  id: integer("id").primaryKey().default(HIGH_WATER_MARK_ROW_ID),
  value: numeric("value").notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true, mode: "date" }).notNull().defaultNow(),
});

export type HighWaterMark = typeof highWaterMark.$inferSelect;

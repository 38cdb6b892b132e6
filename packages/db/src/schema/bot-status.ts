/**
 * bot_status - Key/value status fields exposed to dashboards
 */

import { pgTable, text, timestamp } from "drizzle-orm/pg-core";

export const botStatus = pgTable("bot_status", {
  key: text("key").primaryKey(),
  value: text("value").notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true, mode: "date" }).notNull().defaultNow(),
});

export type BotStatus = typeof botStatus.$inferSelect;

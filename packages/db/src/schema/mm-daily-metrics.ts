/**
 * mm_daily_metrics - One row per UTC day
 *
 * Percentage returns (daily_return_pct) feed the Sharpe ratio.
 */

import { integer, numeric, pgTable, text, timestamp } from "drizzle-orm/pg-core";

export const mmDailyMetrics = pgTable("mm_daily_metrics", {
  date: text("date").primaryKey(), // YYYY-MM-DD (UTC)
  fillsCount: integer("fills_count").notNull(),
  roundTrips: numeric("round_trips").notNull(),
  grossPnl: numeric("gross_pnl").notNull(),
  netPnl: numeric("net_pnl").notNull(),
  totalFees: numeric("total_fees").notNull(),
  spreadCaptureRate: numeric("spread_capture_rate").notNull(),
  avgFillQualityBps: numeric("avg_fill_quality_bps"),
  portfolioValue: numeric("portfolio_value"),
  dailyReturnPct: numeric("daily_return_pct"),
  sharpe: numeric("sharpe"),
  profitFactor: numeric("profit_factor"),
  updatedAt: timestamp("updated_at", { withTimezone: true, mode: "date" }).notNull().defaultNow(),
});

export type MmDailyMetrics = typeof mmDailyMetrics.$inferSelect;
export type NewMmDailyMetrics = typeof mmDailyMetrics.$inferInsert;

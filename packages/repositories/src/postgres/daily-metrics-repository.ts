/**
 * Postgres Daily Metrics Repository
 *
 * - Upsert mm_daily_metrics per UTC date
 */

import { desc } from "drizzle-orm";
import { ResultAsync } from "neverthrow";

import { mmDailyMetrics, type Db } from "@outcome-mm/db";

import type { DailyMetricsRepository } from "../interfaces/daily-metrics-repository";
import { parseNullableNumeric, toNullableNumeric, toRepositoryError } from "../types";

/**
 * Create a Postgres daily metrics repository
 */
export function createPostgresDailyMetricsRepository(db: Db): DailyMetricsRepository {
  return {
    upsertDailyMetrics(record) {
      const values = {
        fillsCount: record.fillsCount,
        roundTrips: String(record.roundTrips),
        grossPnl: String(record.grossPnl),
        netPnl: String(record.netPnl),
        totalFees: String(record.totalFees),
        spreadCaptureRate: String(record.spreadCaptureRate),
        avgFillQualityBps: toNullableNumeric(record.avgFillQualityBps),
        portfolioValue: toNullableNumeric(record.portfolioValue),
        dailyReturnPct: toNullableNumeric(record.dailyReturnPct),
        sharpe: toNullableNumeric(record.sharpe),
        profitFactor: toNullableNumeric(record.profitFactor),
        updatedAt: new Date(),
      };
      return ResultAsync.fromPromise(
        db
          .insert(mmDailyMetrics)
          .values({ date: record.date, ...values })
          .onConflictDoUpdate({ target: mmDailyMetrics.date, set: values }),
        toRepositoryError,
      ).map(() => undefined);
    },

    listRecentDailyMetrics(limit) {
      return ResultAsync.fromPromise(
        db.select().from(mmDailyMetrics).orderBy(desc(mmDailyMetrics.date)).limit(limit),
        toRepositoryError,
      ).map(rows =>
        rows.map(row => ({
          date: row.date,
          fillsCount: row.fillsCount,
          roundTrips: Number(row.roundTrips),
          grossPnl: Number(row.grossPnl),
          netPnl: Number(row.netPnl),
          totalFees: Number(row.totalFees),
          spreadCaptureRate: Number(row.spreadCaptureRate),
          avgFillQualityBps: parseNullableNumeric(row.avgFillQualityBps),
          portfolioValue: parseNullableNumeric(row.portfolioValue),
          dailyReturnPct: parseNullableNumeric(row.dailyReturnPct),
          sharpe: parseNullableNumeric(row.sharpe),
          profitFactor: parseNullableNumeric(row.profitFactor),
        })),
      );
    },
  };
}

/**
 * Daily metrics - aggregate today's (UTC) fills into mm_daily_metrics
 *
 * Returns are percentages (day-over-day portfolio value); Sharpe runs over
 * the stored daily returns of the last SHARPE_WINDOW_DAYS days, today included.
 * Re-running during the day overwrites the same row.
 */

import {
  computePnl,
  dailyReturnPct,
  fillQuality,
  profitFactor,
  roundTo,
  sharpeRatio,
  spreadCaptureRate,
  type MetricsFill,
  type Ms,
  type Usdc,
} from "@outcome-mm/core";
import type { DailyMetricsRecord, FillRecord, Repositories } from "@outcome-mm/repositories";
import { logger } from "@outcome-mm/utils";

export const SHARPE_WINDOW_DAYS = 30;

const DAY_MS = 86_400_000;

export interface DailyMetricsDeps {
  repositories: Pick<Repositories, "fills" | "quotes" | "dailyMetrics">;
  /** Current portfolio value (cash + inventory); null when unavailable */
  getPortfolioValue: () => Promise<Usdc | null>;
  clock?: () => Ms;
}

export const utcDayStart = (ms: Ms): Ms => Math.floor(ms / DAY_MS) * DAY_MS;

const toMetricsFill = (fill: FillRecord): MetricsFill => ({
  quoteId: fill.quoteId,
  side: fill.side,
  price: fill.price,
  size: fill.size,
  fee: fill.fee,
});

/**
 * Mean fill quality in bps over fills that carry a mid; null without any
 */
export function averageFillQualityBps(fills: readonly FillRecord[]): number | null {
  const scored = fills.filter(f => f.midAtFill !== null && f.midAtFill > 0);
  if (scored.length === 0) return null;

  const total = scored.reduce((acc, f) => acc + fillQuality(f.price, f.midAtFill ?? 0, f.side), 0);
  return roundTo(total / scored.length, 2);
}

/**
 * Compute and upsert today's row; returns it, or null when a read failed
 */
export async function runDailyMetrics(deps: DailyMetricsDeps): Promise<DailyMetricsRecord | null> {
  const nowMs = (deps.clock ?? Date.now)();
  const dayStart = utcDayStart(nowMs);
  const date = new Date(dayStart).toISOString().slice(0, 10);
  const { fills, quotes, dailyMetrics } = deps.repositories;

  const todaysFills = await fills.listFillsBetween(new Date(dayStart), new Date(dayStart + DAY_MS));
  if (todaysFills.isErr()) {
    logger.warn("Daily metrics skipped: fills unavailable", { error: todaysFills.error.message });
    return null;
  }

  const quoteIds = [...new Set(todaysFills.value.flatMap(f => (f.quoteId === null ? [] : [f.quoteId])))];
  const quoteRows = await quotes.getQuotesByIds(quoteIds);
  if (quoteRows.isErr()) {
    logger.warn("Daily metrics skipped: quotes unavailable", { error: quoteRows.error.message });
    return null;
  }

  const history = await dailyMetrics.listRecentDailyMetrics(SHARPE_WINDOW_DAYS);
  if (history.isErr()) {
    logger.warn("Daily metrics skipped: history unavailable", { error: history.error.message });
    return null;
  }

  const metricsFills = todaysFills.value.map(toMetricsFill);
  const pnl = computePnl(metricsFills);
  const portfolioValue = await deps.getPortfolioValue();

  const previousValue = history.value.find(r => r.date < date && r.portfolioValue !== null)?.portfolioValue ?? null;
  const todayReturn =
    portfolioValue !== null && previousValue !== null ?
      roundTo(dailyReturnPct(previousValue, portfolioValue), 4)
    : null;

  const pastReturns = history.value
    .filter(r => r.date < date)
    .flatMap(r => (r.dailyReturnPct === null ? [] : [r.dailyReturnPct]))
    .slice(0, SHARPE_WINDOW_DAYS - 1);
  const returns = todayReturn === null ? pastReturns : [todayReturn, ...pastReturns];

  const roundTripPnls = todaysFills.value.flatMap(f => (f.realizedPnl === null ? [] : [f.realizedPnl]));
  const pf = roundTripPnls.length > 0 ? profitFactor(roundTripPnls) : null;

  const record: DailyMetricsRecord = {
    date,
    fillsCount: todaysFills.value.length,
    roundTrips: pnl.numRoundTrips,
    grossPnl: pnl.grossPnl,
    netPnl: pnl.netPnl,
    totalFees: pnl.totalFees,
    spreadCaptureRate: roundTo(spreadCaptureRate(metricsFills, quoteRows.value), 4),
    avgFillQualityBps: averageFillQualityBps(todaysFills.value),
    portfolioValue: portfolioValue === null ? null : roundTo(portfolioValue, 2),
    dailyReturnPct: todayReturn,
    sharpe: returns.length >= 2 ? roundTo(sharpeRatio(returns), 4) : null,
    profitFactor: pf === null || Number.isFinite(pf) ? pf : null,
  };

  const saved = await dailyMetrics.upsertDailyMetrics(record);
  if (saved.isErr()) {
    logger.warn("Failed to persist daily metrics", { date, error: saved.error.message });
    return null;
  }

  logger.info("Daily metrics updated", {
    date,
    fills: record.fillsCount,
    netPnl: record.netPnl,
    dailyReturnPct: record.dailyReturnPct ?? "-",
  });
  return record;
}

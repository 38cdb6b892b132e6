/**
 * Performance metrics for market-making
 *
 * Fill quality and adverse selection are in basis points of the mid at fill.
 * Daily returns are percentages (1.5 = +1.5%).
 *
 * This module is pure (no I/O, no throw).
 */

import { roundTo } from "./quote-calculator";
import type { Price, Shares, Side, Usdc } from "./types";

export interface MetricsFill {
  quoteId: number | null;
  side: Side;
  price: Price;
  size: Shares;
  fee: Usdc;
}

export interface MetricsQuote {
  id: number;
  bidPrice: Price;
  askPrice: Price;
}

export interface PnlSummary {
  grossPnl: Usdc;
  netPnl: Usdc;
  totalFees: Usdc;
  numRoundTrips: number;
  totalBuySize: Shares;
  totalSellSize: Shares;
}

/**
 * How favorable a fill was against mid; positive = bought below or sold above
 */
export function fillQuality(fillPrice: Price, midAtFill: Price, side: Side): number {
  if (midAtFill <= 0) return 0;

  const improvement = side === "buy" ? (midAtFill - fillPrice) / midAtFill : (fillPrice - midAtFill) / midAtFill;
  return improvement * 10_000;
}

/**
 * How far mid moved against the fill afterwards; positive = adverse
 */
export function adverseSelection(midAtFill: Price, midLater: Price, side: Side): number {
  if (midAtFill <= 0) return 0;

  const movement = side === "buy" ? (midAtFill - midLater) / midAtFill : (midLater - midAtFill) / midAtFill;
  return movement * 10_000;
}

export function computePnl(fills: readonly MetricsFill[]): PnlSummary {
  let buyCost = 0;
  let sellRevenue = 0;
  let buySize = 0;
  let sellSize = 0;
  let fees = 0;

  for (const fill of fills) {
    fees += fill.fee;
    if (fill.side === "buy") {
      buyCost += fill.price * fill.size;
      buySize += fill.size;
    } else {
      sellRevenue += fill.price * fill.size;
      sellSize += fill.size;
    }
  }

  const matched = Math.min(buySize, sellSize);
  const grossPnl = matched > 0 ? sellRevenue - buyCost : 0;

  return {
    grossPnl: roundTo(grossPnl, 6),
    netPnl: roundTo(grossPnl - fees, 6),
    totalFees: roundTo(fees, 6),
    numRoundTrips: matched > 0 ? Math.floor(matched) : 0,
    totalBuySize: roundTo(buySize, 4),
    totalSellSize: roundTo(sellSize, 4),
  };
}

function vwap(fills: readonly MetricsFill[]): number {
  const size = fills.reduce((acc, f) => acc + f.size, 0);
  return size > 0 ? fills.reduce((acc, f) => acc + f.price * f.size, 0) / size : 0;
}

/**
 * Mean share of the quoted spread captured by round trips on the same quote
 *
 * A quote counts when it saw both a buy and a sell and had a positive spread.
 */
export function spreadCaptureRate(fills: readonly MetricsFill[], quotes: readonly MetricsQuote[]): number {
  const byQuote = new Map<number, MetricsFill[]>();
  for (const fill of fills) {
    if (fill.quoteId === null) continue;
    const list = byQuote.get(fill.quoteId) ?? [];
    list.push(fill);
    byQuote.set(fill.quoteId, list);
  }

  let total = 0;
  let count = 0;

  for (const [quoteId, quoteFills] of byQuote) {
    const buys = quoteFills.filter(f => f.side === "buy");
    const sells = quoteFills.filter(f => f.side === "sell");
    if (buys.length === 0 || sells.length === 0) continue;

    const quote = quotes.find(q => q.id === quoteId);
    if (!quote) continue;

    const theoretical = quote.askPrice - quote.bidPrice;
    if (theoretical <= 0) continue;

    total += (vwap(sells) - vwap(buys)) / theoretical;
    count++;
  }

  return count > 0 ? total / count : 0;
}

/**
 * Annualized Sharpe ratio (365 days) of daily percentage returns
 *
 * Fewer than two returns yield 0; zero variance uses a 0.001 floor on std.
 */
export function sharpeRatio(dailyReturns: readonly number[], riskFreeRatePct = 0): number {
  if (dailyReturns.length < 2) return 0;

  const excess = dailyReturns.map(r => r - riskFreeRatePct / 365);
  const mean = excess.reduce((acc, r) => acc + r, 0) / excess.length;
  const variance = excess.reduce((acc, r) => acc + (r - mean) ** 2, 0) / (excess.length - 1);
  const std = variance > 0 ? Math.sqrt(variance) : 0.001;

  return (mean / std) * Math.sqrt(365);
}

/**
 * Gross gains / gross losses over round-trip P&L values
 *
 * Infinity when there are gains but no losses; 0 when there is neither.
 */
export function profitFactor(roundTripPnls: readonly Usdc[]): number {
  let gains = 0;
  let losses = 0;
  for (const pnl of roundTripPnls) {
    if (pnl > 0) gains += pnl;
    else if (pnl < 0) losses += Math.abs(pnl);
  }

  if (losses === 0) return gains > 0 ? Number.POSITIVE_INFINITY : 0;
  return gains / losses;
}

/**
 * Inventory turnovers per day (two fills per round trip)
 */
export function inventoryTurnRate(fillsCount: number, avgInventory: Shares, periodHours: number): number {
  if (avgInventory <= 0 || periodHours <= 0) return 0;

  const dailyFills = fillsCount * (24 / periodHours);
  return dailyFills / (2 * avgInventory);
}

/**
 * Day-over-day portfolio return in percent
 */
export function dailyReturnPct(startValue: Usdc, endValue: Usdc): number {
  if (startValue <= 0) return 0;
  return ((endValue - startValue) / startValue) * 100;
}

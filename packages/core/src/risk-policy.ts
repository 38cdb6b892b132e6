/**
 * Risk Policy - pure checks for market-making quotes and drawdown
 *
 * Quote validation order (first failure wins):
 * 1. paused
 * 2. crossed (bid >= ask)
 * 3. out of range
 * 4. spread wider than min(2 * maxDelta + 1, maxSpreadPts)
 * 5. a side more than 2 * maxDelta from mid
 * 6. spread tighter than 1 point
 *
 * This module is pure (no I/O, no throw).
 */

import { MAX_PRICE, MIN_PRICE, TICK_SIZE, clampPrice, roundTo, roundToTick } from "./quote-calculator";
import type { DrawdownThresholds, Points, Price, QuoteValidation, RiskMode, Usdc } from "./types";

/** Narrowest spread worth quoting */
export const MIN_QUOTE_SPREAD_PTS: Points = 1.0;

export interface MmQuoteCheck {
  bid: Price;
  ask: Price;
  mid: Price;
  maxDelta: Points;
  maxSpreadPts: Points;
  paused: boolean;
}

export function validateMmQuote(check: MmQuoteCheck): QuoteValidation {
  const { bid, ask, mid, maxDelta, maxSpreadPts, paused } = check;

  if (paused) {
    return { ok: false, reason: "Trading paused" };
  }

  if (bid >= ask) {
    return { ok: false, reason: `Invalid quote: bid ${bid.toFixed(2)} >= ask ${ask.toFixed(2)}` };
  }

  if (bid < MIN_PRICE || ask > MAX_PRICE) {
    return { ok: false, reason: `Quote out of range: bid=${bid.toFixed(2)}, ask=${ask.toFixed(2)}` };
  }

  const spread = roundTo((ask - bid) * 100, 2);
  const maxSpread = Math.min(2 * maxDelta + 1, maxSpreadPts);
  if (spread > maxSpread) {
    return { ok: false, reason: `Spread too wide: ${spread.toFixed(1)}pts > ${maxSpread.toFixed(1)}pts` };
  }

  const bidDelta = Math.abs(mid - bid) * 100;
  const askDelta = Math.abs(ask - mid) * 100;
  const hardCap = maxDelta * 2;
  if (bidDelta > hardCap || askDelta > hardCap) {
    return {
      ok: false,
      reason: `Delta too wide: bid_delta=${bidDelta.toFixed(1)}pts, ask_delta=${askDelta.toFixed(1)}pts, hard_cap=${hardCap.toFixed(1)}pts`,
    };
  }

  if (spread < MIN_QUOTE_SPREAD_PTS) {
    return { ok: false, reason: `Spread too tight: ${spread.toFixed(1)}pts < ${MIN_QUOTE_SPREAD_PTS.toFixed(1)}pts minimum` };
  }

  return { ok: true, reason: "OK" };
}

/**
 * Drawdown from peak in percent; 0 without a positive peak
 */
export function computeDrawdownPct(peak: Usdc, value: Usdc): number {
  if (peak <= 0) return 0;
  return ((peak - value) / peak) * 100;
}

/**
 * kill at >= killPct, reduce at >= reducePct, otherwise ok
 */
export function classifyDrawdown(ddPct: number, thresholds: Pick<DrawdownThresholds, "reducePct" | "killPct">): RiskMode {
  if (ddPct >= thresholds.killPct) return "kill";
  if (ddPct >= thresholds.reducePct) return "reduce";
  return "ok";
}

/**
 * Cross-reject cooldown in seconds
 *
 * 0 below the threshold; then base * level, level growing by one every
 * `threshold` further rejects, capped at maxSeconds.
 */
export function cooldownSecondsForStreak(streak: number, threshold: number, baseSeconds: number, maxSeconds: number): number {
  const th = Math.max(1, threshold);
  if (streak < th) return 0;

  const level = 1 + Math.max(0, Math.floor((streak - th) / th));
  return Math.min(maxSeconds, baseSeconds * level);
}

export interface InventoryRiskCheck {
  ok: boolean;
  reason: string;
}

/**
 * Reject above maxInventory; warn (still ok) above 90% utilization
 */
export function checkInventoryRisk(netInventory: number, maxInventory: number): InventoryRiskCheck {
  if (Math.abs(netInventory) > maxInventory) {
    return { ok: false, reason: `Inventory ${netInventory.toFixed(1)} exceeds max ${maxInventory.toFixed(1)}` };
  }
  const utilization = maxInventory > 0 ? Math.abs(netInventory) / maxInventory : 0;
  if (utilization > 0.9) {
    return { ok: true, reason: `WARNING: inventory at ${Math.round(utilization * 100)}% capacity` };
  }
  return { ok: true, reason: "OK" };
}

export interface ExposureCheck {
  withinLimit: boolean;
  /** Exposure as a share of cash + exposure, one decimal */
  exposurePct: number;
}

/**
 * Exposure relative to the whole portfolio (cash + positions)
 */
export function computeExposureCheck(balance: Usdc, exposure: Usdc, maxExposurePct: number): ExposureCheck {
  if (balance <= 0) return { withinLimit: true, exposurePct: 0 };

  const totalPortfolio = balance + exposure;
  const exposurePct = totalPortfolio > 0 ? (exposure / totalPortfolio) * 100 : 0;
  return { withinLimit: exposurePct <= maxExposurePct, exposurePct: roundTo(exposurePct, 1) };
}

/**
 * Keep quotes maker-only against the current top of book
 *
 * Caps the bid at bestAsk - 1 tick and floors the ask at bestBid + 1 tick.
 * If that crosses the pair, fall back to joining the touch.
 */
export function sanitizePostOnlyQuotes(bid: Price, ask: Price, bestBid: Price, bestAsk: Price): { bid: Price; ask: Price } {
  const snap = (p: Price): Price => clampPrice(roundToTick(p));

  let b = snap(bid);
  let a = snap(ask);

  if (bestAsk > 0) b = Math.min(b, snap(bestAsk - TICK_SIZE));
  if (bestBid > 0) a = Math.max(a, snap(bestBid + TICK_SIZE));

  if (b >= a) {
    if (bestBid > 0 && bestAsk > bestBid) {
      b = snap(bestBid);
      a = snap(bestAsk);
      if (b >= a) b = snap(a - TICK_SIZE);
    } else {
      const mid = (b + a) / 2;
      b = snap(mid - TICK_SIZE);
      a = snap(mid + TICK_SIZE);
      if (b >= a) a = snap(b + TICK_SIZE);
    }
  }

  return { bid: b, ask: a };
}

/**
 * Quote Calculator - heuristic pricing for binary outcome tokens
 *
 * half-spread (delta) = a * vol + b * |imbalance| * 10 + c * stale * 5 + d * feeBuffer
 * bid = mid - delta + skew, ask = mid + delta + skew (points converted to price)
 *
 * This module is pure (no I/O, no throw).
 */

import { Decimal } from "decimal.js";

import type { BookSummary, Points, Price, Usdc } from "./types";

export const TICK_SIZE = 0.01;
export const MIN_PRICE = 0.01;
export const MAX_PRICE = 0.99;

/** Maker fees are zero; a small buffer is kept in the spread anyway */
const FEE_BUFFER_PTS = 1.0;

/**
 * Round half up to a fixed number of decimals
 */
export function roundTo(value: number, decimals: number): number {
  return new Decimal(value).toDecimalPlaces(decimals).toNumber();
}

/**
 * Round a price to the venue tick (0.01), half up
 */
export function roundToTick(price: Price): Price {
  return new Decimal(price).toNearest(TICK_SIZE).toDecimalPlaces(2).toNumber();
}

export function clamp(value: number, low: number, high: number): number {
  return Math.max(low, Math.min(high, value));
}

export function clampPrice(price: Price): Price {
  return clamp(price, MIN_PRICE, MAX_PRICE);
}

/**
 * Depth-weighted mid
 *
 * Heavier bid depth pulls the mid toward the ask, and vice versa.
 * Returns null when the book is empty or crossed.
 */
export function computeWeightedMid(book: Pick<BookSummary, "bestBid" | "bestAsk" | "bidDepth" | "askDepth">): Price | null {
  const { bestBid, bestAsk, bidDepth, askDepth } = book;

  if (bestBid <= 0 || bestAsk <= 0 || bestAsk <= bestBid) return null;

  const totalDepth = bidDepth + askDepth;
  if (totalDepth <= 0) return (bestBid + bestAsk) / 2;

  const wBid = askDepth / totalDepth;
  const wAsk = bidDepth / totalDepth;
  return wBid * bestBid + wAsk * bestAsk;
}

export interface DynamicDeltaInput {
  /** Short-term volatility proxy, in points */
  volShort: Points;
  /** Book imbalance in [-1, 1]; only the magnitude matters */
  bookImbalance: number;
  /** 0 = fresh, 1 = stale */
  staleRisk: number;
  deltaMin?: Points;
  deltaMax?: Points;
  a?: number;
  b?: number;
  c?: number;
  d?: number;
  /** EWMA volatility in points; overrides volShort when > 0 */
  trackedVol?: Points;
}

/**
 * Compute the dynamic half-spread in points, clamped to [deltaMin, deltaMax]
 */
export function computeDynamicDelta(input: DynamicDeltaInput): Points {
  const {
    bookImbalance,
    staleRisk,
    deltaMin = 1.5,
    deltaMax = 8.0,
    a = 0.3,
    b = 0.2,
    c = 0.3,
    d = 0.2,
    trackedVol = 0,
  } = input;

  const vol = trackedVol > 0 ? trackedVol : input.volShort;

  const rawDelta = a * vol + b * Math.abs(bookImbalance) * 10 + c * staleRisk * 5 + d * FEE_BUFFER_PTS;
  return clamp(rawDelta, deltaMin, deltaMax);
}

/**
 * Inventory-driven quote shift, in points
 *
 * skew = -r * skewFactor - sign(r) * r^2 * quadraticFactor, r = net / max in [-1, 1]
 *
 * Long inventory shifts both quotes down, short shifts them up.
 * The quadratic term makes the shift grow faster near the limit.
 */
export function computeSkew(
  netInventory: number,
  maxInventory: number,
  skewFactor = 0.5,
  quadraticFactor = 0.3,
): Points {
  if (maxInventory <= 0) return 0;

  const ratio = clamp(netInventory / maxInventory, -1, 1);
  const linear = -ratio * skewFactor;
  const sign = ratio > 0 ? -1 : 1;
  const quadratic = sign * ratio ** 2 * quadraticFactor;

  return linear + quadratic;
}

/**
 * Bid/ask from mid, half-spread and skew (both in points)
 *
 * Clamped to [0.01, 0.99] and rounded to tick. When rounding collapses or
 * crosses the quote, it is re-separated one tick around the rounded mid.
 */
export function computeBidAsk(mid: Price, delta: Points, skew: Points = 0): { bid: Price; ask: Price } {
  const deltaPrice = delta / 100;
  const skewPrice = skew / 100;

  let bid = roundToTick(clampPrice(mid - deltaPrice + skewPrice));
  let ask = roundToTick(clampPrice(mid + deltaPrice + skewPrice));

  if (bid >= ask) {
    const midTick = roundToTick(mid);
    bid = roundToTick(midTick - TICK_SIZE);
    ask = roundToTick(midTick + TICK_SIZE);
  }

  return { bid, ask };
}

export interface QuoteSizeInput {
  capital: Usdc;
  maxPerMarket: Usdc;
  /** Current inventory valued at average entry */
  currentInventoryUsdc: Usdc;
  maxInventory: Usdc;
  baseSizeUsd?: Usdc;
}

/**
 * Quote size in USDC
 *
 * min(base, maxPerMarket, 10% of capital, remaining capacity); 0 at capacity.
 */
export function computeQuoteSize(input: QuoteSizeInput): Usdc {
  const { capital, maxPerMarket, currentInventoryUsdc, maxInventory, baseSizeUsd = 5 } = input;

  const remainingCapacity = maxInventory - Math.abs(currentInventoryUsdc);
  if (remainingCapacity <= 0) return 0;

  const size = Math.min(baseSizeUsd, maxPerMarket, capital * 0.1, remainingCapacity);
  return Math.max(0, roundTo(size, 2));
}

/**
 * Anything carrying the mid a quote was made at
 */
export interface QuotedMidSource {
  quotedMid: Price;
  mid: Price;
}

/**
 * Whether the mid moved far enough (in points) from the quoted mid to requote
 *
 * `quotedMid` is used when set; (bid + ask) / 2 is wrong for one-sided quotes.
 */
export function shouldRequote(current: QuotedMidSource | null | undefined, newMid: Price, thresholdPts: Points = 0.5): boolean {
  if (!current) return true;

  const currentMid = current.quotedMid > 0 ? current.quotedMid : current.mid;
  const diffPts = Math.abs(newMid - currentMid) * 100;
  return diffPts >= thresholdPts;
}

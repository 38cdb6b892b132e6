/**
 * Avellaneda-Stoikov pricing
 *
 *   reservation price  r = mid - q * gamma * sigma^2 * T
 *   optimal spread     s = gamma * sigma^2 * T + (2 / gamma) * ln(1 + gamma / kappa)
 *   dynamic gamma      gamma = gammaBase * (1 + alpha * |q|)
 *
 * q is inventory normalized by capacity; sigma is volatility in price units.
 *
 * This module is pure (no I/O, no throw).
 */

import { MAX_PRICE, MIN_PRICE, TICK_SIZE, clamp, roundTo } from "./quote-calculator";
import type { AsParams, Points, Price, PricedQuote } from "./types";

/** Spread used when gamma or kappa make the closed form undefined */
const FALLBACK_SPREAD = 0.02;

export const DEFAULT_AS_PARAMS: Readonly<AsParams> = {
  gammaBase: 0.1,
  gammaAlpha: 0.5,
  kappa: 1.5,
  T: 1.0,
  minSpreadPts: 1.0,
  maxSpreadPts: 15.0,
};

export function computeDynamicGamma(gammaBase: number, alpha: number, inventoryRatio: number): number {
  return gammaBase * (1 + alpha * Math.abs(inventoryRatio));
}

/**
 * Indifference price; a long position (q > 0) lowers it
 */
export function computeReservationPrice(
  mid: Price,
  inventory: number,
  maxInventory: number,
  gamma: number,
  volPts: Points,
  T: number,
): Price {
  if (maxInventory <= 0) return mid;

  const q = inventory / maxInventory;
  const sigma = volPts / 100;
  return mid - q * gamma * sigma ** 2 * T;
}

/**
 * Optimal full spread in price units
 */
export function computeOptimalSpread(gamma: number, volPts: Points, T: number, kappa: number): Price {
  if (gamma <= 0 || kappa <= 0) return FALLBACK_SPREAD;

  const sigma = volPts / 100;
  const inventoryComponent = gamma * sigma ** 2 * T;
  const arrivalComponent = (2 / gamma) * Math.log(1 + gamma / kappa);
  return inventoryComponent + arrivalComponent;
}

export interface AsQuoteInput {
  mid: Price;
  /** Net inventory in shares (positive = long) */
  inventory: number;
  /** Inventory capacity in shares */
  maxInventory: number;
  volPts: Points;
  /** Normalized time remaining */
  T: number;
  params: AsParams;
  /** When long, the ask never goes below avgEntry + 1 tick */
  avgEntryPrice?: Price;
}

/**
 * gamma -> reservation -> spread -> bid/ask
 *
 * Spread is clamped to [minSpreadPts, maxSpreadPts]; prices are rounded to
 * 2 decimals, clamped to [0.01, 0.99] and re-separated around their midpoint
 * when they collapse.
 */
export function computeAsQuotes(input: AsQuoteInput): PricedQuote {
  const { mid, inventory, maxInventory, volPts, T, params, avgEntryPrice = 0 } = input;

  const inventoryRatio = maxInventory > 0 ? inventory / maxInventory : 0;
  const gamma = computeDynamicGamma(params.gammaBase, params.gammaAlpha, inventoryRatio);

  const reservationPrice = computeReservationPrice(mid, inventory, maxInventory, gamma, volPts, T);
  const rawSpread = computeOptimalSpread(gamma, volPts, T, params.kappa);
  const spread = clamp(rawSpread * 100, params.minSpreadPts, params.maxSpreadPts) / 100;

  let bid = reservationPrice - spread / 2;
  let ask = reservationPrice + spread / 2;

  if (avgEntryPrice > 0 && inventory > 0) {
    ask = Math.max(ask, avgEntryPrice + TICK_SIZE);
  }

  bid = clamp(roundTo(bid, 2), MIN_PRICE, MAX_PRICE);
  ask = clamp(roundTo(ask, 2), MIN_PRICE, MAX_PRICE);

  if (bid >= ask) {
    const midPoint = (bid + ask) / 2;
    bid = Math.max(MIN_PRICE, roundTo(midPoint - TICK_SIZE, 2));
    ask = Math.min(MAX_PRICE, roundTo(midPoint + TICK_SIZE, 2));
  }

  return { bid, ask, reservationPrice };
}

/**
 * Days to resolution -> T in (0, 1]
 *
 * maxDays and beyond map to 1; a resolved or past-due market maps to 0.01.
 */
export function estimateTimeRemaining(daysToResolution: number, maxDays = 30): number {
  if (daysToResolution <= 0) return 0.01;
  return Math.min(daysToResolution / maxDays, 1);
}

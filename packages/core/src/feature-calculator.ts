/**
 * Feature Calculator - per-market signal trackers
 *
 * - VolTracker: EWMA volatility of mid changes, in points
 * - StaleTracker: how long the mid has been unchanged, 0 (fresh) to 1 (stale)
 * - KappaEstimator: order-arrival intensity from recent fill rate
 *
 * Trackers are keyed by market id and take timestamps from the caller,
 * so they stay free of clock I/O.
 */

import { clamp } from "./quote-calculator";
import type { Ms, Points, Price } from "./types";

// ─────────────────────────────────────────────────────────────────────────────
// Volatility
// ─────────────────────────────────────────────────────────────────────────────

export class VolTracker {
  private readonly alpha: number;
  private readonly ewmaVar = new Map<string, number>();
  private readonly lastMid = new Map<string, Price>();

  /**
   * @param halflife - Observations until a squared change loses half its weight
   */
  constructor(halflife = 20) {
    this.alpha = 1 - 0.5 ** (1 / Math.max(halflife, 1));
  }

  /**
   * Record a mid observation and return the volatility estimate in points
   *
   * The first observation (or a non-positive mid) yields 0.
   */
  update(marketId: string, mid: Price): Points {
    const last = this.lastMid.get(marketId);
    this.lastMid.set(marketId, mid);

    if (last === undefined || last <= 0 || mid <= 0) return 0;

    const change = (mid - last) * 100;
    const sqChange = change ** 2;

    const prevVar = this.ewmaVar.get(marketId) ?? sqChange;
    const nextVar = this.alpha * sqChange + (1 - this.alpha) * prevVar;
    this.ewmaVar.set(marketId, nextVar);

    return Math.sqrt(nextVar);
  }

  getVol(marketId: string): Points {
    return Math.sqrt(this.ewmaVar.get(marketId) ?? 0);
  }

  reset(marketId: string): void {
    this.ewmaVar.delete(marketId);
    this.lastMid.delete(marketId);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Staleness
// ─────────────────────────────────────────────────────────────────────────────

/** Mid moves smaller than this count as unchanged */
const MID_CHANGE_EPSILON = 1e-6;

export class StaleTracker {
  private readonly thresholdMs: Ms;
  private readonly lastMid = new Map<string, Price>();
  private readonly lastChangeMs = new Map<string, Ms>();

  constructor(thresholdSeconds = 60) {
    this.thresholdMs = thresholdSeconds * 1000;
  }

  updateIfChanged(marketId: string, mid: Price, nowMs: Ms): void {
    const prev = this.lastMid.get(marketId);
    if (prev === undefined || Math.abs(mid - prev) > MID_CHANGE_EPSILON) {
      this.lastChangeMs.set(marketId, nowMs);
    }
    this.lastMid.set(marketId, mid);
  }

  /**
   * 0 = fresh, 1 = unchanged for at least the threshold; 0 for unknown markets
   */
  getStaleness(marketId: string, nowMs: Ms): number {
    const last = this.lastChangeMs.get(marketId);
    if (last === undefined || this.thresholdMs <= 0) return 0;

    return Math.min((nowMs - last) / this.thresholdMs, 1);
  }

  reset(marketId: string): void {
    this.lastMid.delete(marketId);
    this.lastChangeMs.delete(marketId);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Order-arrival intensity
// ─────────────────────────────────────────────────────────────────────────────

export const KAPPA_MIN = 0.5;
export const KAPPA_MAX = 10;

export class KappaEstimator {
  private readonly windowMs: Ms;
  private readonly defaultKappa: number;
  private readonly fills = new Map<string, Ms[]>();

  constructor(windowMinutes = 60, defaultKappa = 1.5) {
    this.windowMs = windowMinutes * 60_000;
    this.defaultKappa = defaultKappa;
  }

  recordFill(marketId: string, nowMs: Ms): void {
    const cutoff = nowMs - this.windowMs;
    const recent = (this.fills.get(marketId) ?? []).filter(t => t >= cutoff);
    recent.push(nowMs);
    this.fills.set(marketId, recent);
  }

  /**
   * Fills per minute over the window, clamped to [0.5, 10]
   *
   * Fewer than two fills in the window, or all at the same instant,
   * yield the default.
   */
  getKappa(marketId: string, nowMs: Ms, fallback: number = this.defaultKappa): number {
    const cutoff = nowMs - this.windowMs;
    const recent = (this.fills.get(marketId) ?? []).filter(t => t >= cutoff);
    if (recent.length < 2) return fallback;

    const first = recent[0];
    const last = recent[recent.length - 1];
    if (first === undefined || last === undefined) return fallback;

    const spanMs = last - first;
    if (spanMs <= 0) return fallback;

    const ratePerMin = (recent.length - 1) / (spanMs / 60_000);
    return clamp(ratePerMin, KAPPA_MIN, KAPPA_MAX);
  }

  reset(marketId: string): void {
    this.fills.delete(marketId);
  }
}

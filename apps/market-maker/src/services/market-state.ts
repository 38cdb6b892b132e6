/**
 * Market State Registry - per-market quoting state owned by the cycle
 *
 * - Active quote pair per market
 * - Retired pairs whose cancel failed, with the status they close with
 * - Post-only cross-reject streak and the cooldown it earns
 * - Error circuit breaker (consecutive failures of any kind)
 * - Markets whose split failed (not retried until restart)
 */

import { cooldownSecondsForStreak, type Ms, type QuoteFailure, type QuotePair } from "@outcome-mm/core";
import type { QuoteStatus } from "@outcome-mm/repositories";
import { logger } from "@outcome-mm/utils";

export interface MarketStateOptions {
  crossRejectThreshold: number;
  crossCooldownSeconds: number;
  crossCooldownMaxSeconds: number;
  circuitBreakerThreshold: number;
  circuitBreakerCooldownSeconds: number;
}

export const isCrossRejectFailure = (failure: QuoteFailure | null): boolean =>
  failure !== null && (failure.bidError?.type === "post_only_cross" || failure.askError?.type === "post_only_cross");

export class MarketStateRegistry {
  private readonly options: MarketStateOptions;

  readonly activeQuotes = new Map<string, QuotePair>();
  /** Still resting on the venue; the cancel is retried every cycle */
  readonly retiringQuotes = new Map<QuotePair, QuoteStatus>();
  private readonly crossRejectStreak = new Map<string, number>();
  private readonly cooldownUntil = new Map<string, Ms>();
  private readonly errorCount = new Map<string, number>();
  private readonly circuitUntil = new Map<string, Ms>();
  private readonly splitFailed = new Set<string>();

  constructor(options: MarketStateOptions) {
    this.options = options;
  }

  /**
   * Cross-reject cooldown still running; an expired one is cleared with its streak
   */
  isInCooldown(marketId: string, nowMs: Ms): boolean {
    const until = this.cooldownUntil.get(marketId);
    if (until === undefined) return false;
    if (nowMs < until) return true;

    this.cooldownUntil.delete(marketId);
    this.crossRejectStreak.delete(marketId);
    return false;
  }

  cooldownRemainingMs(marketId: string, nowMs: Ms): Ms {
    const until = this.cooldownUntil.get(marketId);
    return until === undefined ? 0 : Math.max(0, until - nowMs);
  }

  /**
   * Circuit breaker open; an expired one is cleared with its error count
   */
  isCircuitOpen(marketId: string, nowMs: Ms): boolean {
    const until = this.circuitUntil.get(marketId);
    if (until === undefined) return false;
    if (nowMs < until) return true;

    this.circuitUntil.delete(marketId);
    this.errorCount.delete(marketId);
    return false;
  }

  /**
   * Count a failed placement
   *
   * Every failure feeds the circuit breaker. Only post-only cross rejects grow
   * the cross streak; any other failure resets it.
   */
  registerQuoteFailure(marketId: string, failure: QuoteFailure | null, nowMs: Ms): void {
    const errors = (this.errorCount.get(marketId) ?? 0) + 1;
    this.errorCount.set(marketId, errors);
    if (errors >= this.options.circuitBreakerThreshold) {
      this.circuitUntil.set(marketId, nowMs + this.options.circuitBreakerCooldownSeconds * 1000);
      logger.warn("Circuit breaker opened", {
        marketId,
        errors,
        cooldownSeconds: this.options.circuitBreakerCooldownSeconds,
      });
    }

    if (!isCrossRejectFailure(failure)) {
      this.crossRejectStreak.delete(marketId);
      return;
    }

    const streak = (this.crossRejectStreak.get(marketId) ?? 0) + 1;
    this.crossRejectStreak.set(marketId, streak);

    const threshold = Math.max(1, this.options.crossRejectThreshold);
    const cooldownSeconds = cooldownSecondsForStreak(
      streak,
      threshold,
      this.options.crossCooldownSeconds,
      this.options.crossCooldownMaxSeconds,
    );
    if (cooldownSeconds <= 0) return;

    const until = nowMs + cooldownSeconds * 1000;
    this.cooldownUntil.set(marketId, Math.max(this.cooldownUntil.get(marketId) ?? 0, until));
    if (streak % threshold === 0) {
      logger.warn("Cross-reject cooldown set", { marketId, streak, cooldownSeconds });
    }
  }

  /** A successful placement clears every failure counter */
  registerQuoteSuccess(marketId: string): void {
    this.crossRejectStreak.delete(marketId);
    this.errorCount.delete(marketId);
    this.cooldownUntil.delete(marketId);
  }

  crossRejectStreakOf(marketId: string): number {
    return this.crossRejectStreak.get(marketId) ?? 0;
  }

  errorCountOf(marketId: string): number {
    return this.errorCount.get(marketId) ?? 0;
  }

  markSplitFailed(marketId: string): void {
    this.splitFailed.add(marketId);
  }

  hasSplitFailed(marketId: string): boolean {
    return this.splitFailed.has(marketId);
  }

  /** Forget cooldowns for a market leaving the candidate list */
  forgetMarket(marketId: string): void {
    this.activeQuotes.delete(marketId);
    this.crossRejectStreak.delete(marketId);
    this.cooldownUntil.delete(marketId);
  }
}

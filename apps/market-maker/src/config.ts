/**
 * MmConfig from validated env
 *
 * Cross-field rules zod does not express per field:
 * - MM_DELTA_MIN <= MM_DELTA_MAX
 * - MM_DD_REDUCE_PCT <= MM_DD_KILL_PCT
 * - MM_DD_RESUME_PCT < MM_DD_KILL_PCT (hysteresis)
 */

import { err, ok, type Result } from "neverthrow";

import type { MmConfig } from "@outcome-mm/core";

import type { Env } from "./env";

export type MmEnv = Pick<
  Env,
  | "MM_CYCLE_SECONDS"
  | "MM_DELTA_MIN"
  | "MM_DELTA_MAX"
  | "MM_QUOTE_SIZE_USD"
  | "MM_MAX_SPREAD_PTS"
  | "MM_INVENTORY_SKEW_FACTOR"
  | "MM_UNWIND_THRESHOLD"
  | "MM_REQUOTE_THRESHOLD"
  | "MM_MIN_QUOTE_LIFETIME_SECONDS"
  | "MM_POST_ONLY"
  | "MM_HANGING_ORDERS"
  | "MM_CROSS_REJECT_THRESHOLD"
  | "MM_CROSS_COOLDOWN_SECONDS"
  | "MM_CROSS_COOLDOWN_MAX_SECONDS"
  | "MM_CIRCUIT_BREAKER_THRESHOLD"
  | "MM_CIRCUIT_BREAKER_COOLDOWN_SECONDS"
  | "MM_MAX_MARKETS"
  | "MM_MAX_TOTAL_EXPOSURE_PCT"
  | "MM_VENUE_CONCURRENCY"
  | "MM_DD_REDUCE_PCT"
  | "MM_DD_KILL_PCT"
  | "MM_DD_RESUME_PCT"
  | "MM_DD_COOLDOWN_MINUTES"
  | "MM_DD_MAX_RECOVERIES_PER_DAY"
  | "MM_TWO_SIDED"
  | "MM_USE_SPLIT_MERGE"
  | "MM_SPLIT_SIZE_USD"
  | "MM_MERGE_THRESHOLD"
  | "MM_MERGE_EVERY_CYCLES"
  | "MM_RECONCILE_EVERY_CYCLES"
  | "MM_PRICING_ENGINE"
  | "MM_STALE_THRESHOLD_SECONDS"
  | "MM_AS_GAMMA_BASE"
  | "MM_AS_GAMMA_ALPHA"
  | "MM_AS_KAPPA_DEFAULT"
  | "MM_AS_KAPPA_WINDOW_MINUTES"
  | "MM_MULTI_LEVEL_COUNT"
  | "MM_LEVEL_SPREAD_MULT"
  | "MM_LEVEL_SIZE_MULT"
  | "MM_VOL_WIDEN_THRESHOLD"
  | "MM_EVENT_RISK_WIDEN_PCT"
>;

export type ConfigError = {
  type: "INVALID_CONFIG";
  message: string;
};

export function buildMmConfig(env: MmEnv): Result<MmConfig, ConfigError> {
  if (env.MM_DELTA_MIN > env.MM_DELTA_MAX) {
    return err({
      type: "INVALID_CONFIG",
      message: `MM_DELTA_MIN (${env.MM_DELTA_MIN}) exceeds MM_DELTA_MAX (${env.MM_DELTA_MAX})`,
    });
  }
  if (env.MM_DD_REDUCE_PCT > env.MM_DD_KILL_PCT) {
    return err({
      type: "INVALID_CONFIG",
      message: `MM_DD_REDUCE_PCT (${env.MM_DD_REDUCE_PCT}) exceeds MM_DD_KILL_PCT (${env.MM_DD_KILL_PCT})`,
    });
  }
  if (env.MM_DD_RESUME_PCT >= env.MM_DD_KILL_PCT) {
    return err({
      type: "INVALID_CONFIG",
      message: `MM_DD_RESUME_PCT (${env.MM_DD_RESUME_PCT}) must be below MM_DD_KILL_PCT (${env.MM_DD_KILL_PCT})`,
    });
  }

  return ok({
    cycleSeconds: env.MM_CYCLE_SECONDS,
    deltaMin: env.MM_DELTA_MIN,
    deltaMax: env.MM_DELTA_MAX,
    quoteSizeUsd: env.MM_QUOTE_SIZE_USD,
    maxSpreadPts: env.MM_MAX_SPREAD_PTS,
    inventorySkewFactor: env.MM_INVENTORY_SKEW_FACTOR,
    unwindThreshold: env.MM_UNWIND_THRESHOLD,
    requoteThresholdPts: env.MM_REQUOTE_THRESHOLD,
    minQuoteLifetimeSeconds: env.MM_MIN_QUOTE_LIFETIME_SECONDS,
    postOnly: env.MM_POST_ONLY,
    hangingOrders: env.MM_HANGING_ORDERS,
    crossRejectThreshold: env.MM_CROSS_REJECT_THRESHOLD,
    crossCooldownSeconds: env.MM_CROSS_COOLDOWN_SECONDS,
    crossCooldownMaxSeconds: env.MM_CROSS_COOLDOWN_MAX_SECONDS,
    circuitBreakerThreshold: env.MM_CIRCUIT_BREAKER_THRESHOLD,
    circuitBreakerCooldownSeconds: env.MM_CIRCUIT_BREAKER_COOLDOWN_SECONDS,
    maxMarkets: env.MM_MAX_MARKETS,
    maxTotalExposurePct: env.MM_MAX_TOTAL_EXPOSURE_PCT,
    venueConcurrency: env.MM_VENUE_CONCURRENCY,
    ddReducePct: env.MM_DD_REDUCE_PCT,
    ddKillPct: env.MM_DD_KILL_PCT,
    ddResumePct: env.MM_DD_RESUME_PCT,
    ddCooldownMinutes: env.MM_DD_COOLDOWN_MINUTES,
    ddMaxRecoveriesPerDay: env.MM_DD_MAX_RECOVERIES_PER_DAY,
    twoSided: env.MM_TWO_SIDED,
    useSplitMerge: env.MM_USE_SPLIT_MERGE,
    splitSizeUsd: env.MM_SPLIT_SIZE_USD,
    mergeThreshold: env.MM_MERGE_THRESHOLD,
    mergeEveryCycles: env.MM_MERGE_EVERY_CYCLES,
    reconcileEveryCycles: env.MM_RECONCILE_EVERY_CYCLES,
    pricingEngine: env.MM_PRICING_ENGINE,
    staleThresholdSeconds: env.MM_STALE_THRESHOLD_SECONDS,
    asGammaBase: env.MM_AS_GAMMA_BASE,
    asGammaAlpha: env.MM_AS_GAMMA_ALPHA,
    asKappaDefault: env.MM_AS_KAPPA_DEFAULT,
    asKappaWindowMinutes: env.MM_AS_KAPPA_WINDOW_MINUTES,
    multiLevelCount: env.MM_MULTI_LEVEL_COUNT,
    levelSpreadMult: env.MM_LEVEL_SPREAD_MULT,
    levelSizeMult: env.MM_LEVEL_SIZE_MULT,
    volWidenThresholdPts: env.MM_VOL_WIDEN_THRESHOLD,
    eventRiskWidenPct: env.MM_EVENT_RISK_WIDEN_PCT,
  });
}

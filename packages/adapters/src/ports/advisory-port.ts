/**
 * Advisory Ports - optional, fallible oracles consulted for recommendations
 *
 * The market-making loop must work with every oracle disabled or failing;
 * see `createAdvisoryClient` for the fallbacks.
 */

import type { ResultAsync } from "neverthrow";

import type { MarketCandidate, Usdc } from "@outcome-mm/core";

export type AdvisoryError =
  | { type: "timeout"; message: string }
  | { type: "invalid_response"; message: string }
  | { type: "unavailable"; message: string };

// ─────────────────────────────────────────────────────────────────────────────
// Risk officer
// ─────────────────────────────────────────────────────────────────────────────

export interface RiskReviewRequest {
  marketId: string;
  proposedSizeUsd: Usdc;
  netExposureUsd: Usdc;
}

export interface RiskVerdict {
  approve: boolean;
  /** Multiplier applied to quote size, (0, 1] */
  sizeFactor: number;
  reason: string;
  /** true when produced by a fallback rather than the oracle */
  fallback: boolean;
}

export interface RiskOfficer {
  review(request: RiskReviewRequest): ResultAsync<RiskVerdict, AdvisoryError>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Market scorer
// ─────────────────────────────────────────────────────────────────────────────

export interface MarketScore {
  marketId: string;
  /** 0-100 */
  score: number;
  fallback: boolean;
}

export interface MarketScorer {
  score(candidate: MarketCandidate): ResultAsync<MarketScore, AdvisoryError>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Event guard (resolution / news risk)
// ─────────────────────────────────────────────────────────────────────────────

export interface EventAssessment {
  marketId: string;
  /** Widen spreads */
  warning: boolean;
  /** Stop quoting this market */
  kill: boolean;
  reason: string;
  fallback: boolean;
}

export interface EventGuard {
  assess(candidate: MarketCandidate): ResultAsync<EventAssessment, AdvisoryError>;
}

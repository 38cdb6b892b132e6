/**
 * Core Domain Types
 *
 * Pure type definitions for the market-making core.
 * No I/O dependencies, no side effects.
 *
 * Prices live on the 0-1 scale of a binary outcome token. "Points" are
 * hundredths of that scale (1 point = 1 tick = $0.01).
 */

// ─────────────────────────────────────────────────────────────────────────────
// Value Objects
// ─────────────────────────────────────────────────────────────────────────────

/** Price on the 0-1 scale */
export type Price = number;

/** Size in shares (outcome tokens) */
export type Shares = number;

/** Amount in USDC */
export type Usdc = number;

/** Price distance in points (0-100 scale) */
export type Points = number;

/** Milliseconds */
export type Ms = number;

/** Side of an order */
export type Side = "buy" | "sell";

/** Which outcome token of a binary market a position or fill belongs to */
export type Leg = "yes" | "no";

// ─────────────────────────────────────────────────────────────────────────────
// Order lifecycle
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Order states
 *
 * - NEW: submitted, venue has not confirmed yet
 * - LIVE: resting on the book
 * - PARTIAL: resting, partially matched
 * - FILLED: fully matched (terminal)
 * - CANCELLED: cancelled or expired; a late fill may still arrive
 * - UNKNOWN: venue returned something we could not map
 */
export type OrderState = "NEW" | "LIVE" | "PARTIAL" | "FILLED" | "CANCELLED" | "UNKNOWN";

// ─────────────────────────────────────────────────────────────────────────────
// Market data
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Top-of-book summary for one token
 */
export interface BookSummary {
  bestBid: Price;
  bestAsk: Price;
  /** Aggregated size of the top bid levels */
  bidDepth: Shares;
  /** Aggregated size of the top ask levels */
  askDepth: Shares;
  mid: Price | null;
  spread: Price;
  /** (bidDepth - askDepth) / (bidDepth + askDepth), in [-1, 1] */
  imbalance?: number;
  minOrderSize?: Shares;
}

/**
 * A market handed to the market-making loop by the (external) scanner
 */
export interface MarketCandidate {
  marketId: string;
  /** YES token */
  tokenId: string;
  noTokenId?: string;
  conditionId?: string;
  daysToResolution?: number;
  question?: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Inventory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * In-memory inventory for one market (YES and NO legs)
 *
 * `yesAvgEntry` / `noAvgEntry` are only meaningful while the matching
 * position is non-zero.
 */
export interface MarketInventory {
  marketId: string;
  yesTokenId: string;
  yesPosition: Shares;
  yesAvgEntry: Price;
  yesRealizedPnl: Usdc;
  noTokenId: string;
  noPosition: Shares;
  noAvgEntry: Price;
  noRealizedPnl: Usdc;
  openedAtMs: Ms | null;
  updatedAtMs: Ms;
}

/**
 * Inventory snapshot exposed to the orchestrator and dashboards
 */
export interface InventorySnapshot {
  marketId: string;
  yesTokenId: string;
  noTokenId: string;
  yesPosition: Shares;
  noPosition: Shares;
  yesAvgEntry: Price;
  noAvgEntry: Price;
  realizedPnl: Usdc;
  mergeablePairs: Shares;
}

// ─────────────────────────────────────────────────────────────────────────────
// Pricing
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Avellaneda-Stoikov model parameters
 */
export interface AsParams {
  /** Base risk aversion */
  gammaBase: number;
  /** Inventory sensitivity of gamma */
  gammaAlpha: number;
  /** Order-arrival intensity */
  kappa: number;
  /** Normalized time to resolution, (0, 1] */
  T: number;
  minSpreadPts: Points;
  maxSpreadPts: Points;
}

export type PricingEngine = "as" | "heuristic";

/**
 * Output of either pricing mode
 */
export interface PricedQuote {
  bid: Price;
  ask: Price;
  /** Reservation price (AS) or mid (heuristic) */
  reservationPrice: Price;
}

// ─────────────────────────────────────────────────────────────────────────────
// Proposals
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One proposed order (a single rung of the ladder)
 */
export interface OrderProposal {
  marketId: string;
  tokenId: string;
  side: Side;
  price: Price;
  size: Shares;
  /** 0 = tightest */
  level: number;
  isHanging: boolean;
}

/**
 * Candidate bid/ask ladder for one market
 */
export interface QuoteProposal {
  marketId: string;
  tokenId: string;
  bids: OrderProposal[];
  asks: OrderProposal[];
  mid: Price;
  reservationPrice: Price;
}

// ─────────────────────────────────────────────────────────────────────────────
// Quoting outcomes
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Fill detected while reconciling a quote pair
 */
export interface DetectedFill {
  side: Side;
  orderId: string;
  price: Price;
  size: Shares;
  fee: Usdc;
}

/**
 * Structured reason for a failed quote placement, kept for diagnostics
 */
export interface QuoteFailure {
  marketId: string;
  tokenId: string;
  placeBid: boolean;
  placeAsk: boolean;
  bidPrice: Price;
  askPrice: Price;
  bidSize: Shares;
  askSize: Shares;
  bidError: { type: string; message: string } | null;
  askError: { type: string; message: string } | null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Risk
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Drawdown-driven risk mode
 *
 * - ok: quote normally
 * - reduce: caller halves size and market count
 * - kill: all market-making paused
 */
export type RiskMode = "ok" | "reduce" | "kill";

export interface DrawdownThresholds {
  reducePct: number;
  killPct: number;
  resumePct: number;
}

export interface QuoteValidation {
  ok: boolean;
  reason: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Market-making parameters (all sourced from env at the composition root)
 */
export interface MmConfig {
  cycleSeconds: number;
  // Spread & delta
  deltaMin: Points;
  deltaMax: Points;
  quoteSizeUsd: Usdc;
  maxSpreadPts: Points;
  // Inventory
  inventorySkewFactor: number;
  unwindThreshold: number;
  // Quote lifecycle
  requoteThresholdPts: Points;
  minQuoteLifetimeSeconds: number;
  postOnly: boolean;
  hangingOrders: boolean;
  crossRejectThreshold: number;
  crossCooldownSeconds: number;
  crossCooldownMaxSeconds: number;
  circuitBreakerThreshold: number;
  circuitBreakerCooldownSeconds: number;
  // Markets & capital
  maxMarkets: number;
  maxTotalExposurePct: number;
  venueConcurrency: number;
  // Kill switch
  ddReducePct: number;
  ddKillPct: number;
  ddResumePct: number;
  ddCooldownMinutes: number;
  ddMaxRecoveriesPerDay: number;
  // Two-sided quoting
  twoSided: boolean;
  useSplitMerge: boolean;
  splitSizeUsd: Usdc;
  mergeThreshold: Shares;
  mergeEveryCycles: number;
  reconcileEveryCycles: number;
  // Pricing
  pricingEngine: PricingEngine;
  staleThresholdSeconds: number;
  asGammaBase: number;
  asGammaAlpha: number;
  asKappaDefault: number;
  asKappaWindowMinutes: number;
  // Proposal pipeline
  multiLevelCount: number;
  levelSpreadMult: number;
  levelSizeMult: number;
  volWidenThresholdPts: Points;
  eventRiskWidenPct: number;
}

/**
 * packages/core - Pure market-making logic
 *
 * Pricing, trackers, inventory math, proposal pipeline, order lifecycle
 * and risk policy for binary outcome tokens.
 * NO I/O dependencies (DB, HTTP, WS, FS).
 * NO exceptions thrown (uses Result types where needed).
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────
export type {
  // Value objects
  Price,
  Shares,
  Usdc,
  Points,
  Ms,
  Side,
  Leg,
  // Orders
  OrderState,
  // Market data
  BookSummary,
  MarketCandidate,
  // Inventory
  MarketInventory,
  InventorySnapshot,
  // Pricing
  AsParams,
  PricingEngine,
  PricedQuote,
  // Proposals
  OrderProposal,
  QuoteProposal,
  // Quoting
  DetectedFill,
  QuoteFailure,
  // Risk
  RiskMode,
  DrawdownThresholds,
  QuoteValidation,
  // Config
  MmConfig,
} from "./types";

// ─────────────────────────────────────────────────────────────────────────────
// Order lifecycle
// ─────────────────────────────────────────────────────────────────────────────
export type { OrderTransitionError, TransitionOutcome } from "./order-state";
export {
  ORDER_STATES,
  ORDER_TRANSITIONS,
  OPEN_STATES,
  canTransition,
  transition,
  isOpenState,
  isDoneState,
  parseVenueStatus,
} from "./order-state";

export type { QuotePairInit } from "./quote-pair";
export { QuotePair } from "./quote-pair";

// ─────────────────────────────────────────────────────────────────────────────
// Pricing
// ─────────────────────────────────────────────────────────────────────────────
export type { DynamicDeltaInput, QuoteSizeInput, QuotedMidSource } from "./quote-calculator";
export {
  TICK_SIZE,
  MIN_PRICE,
  MAX_PRICE,
  roundTo,
  roundToTick,
  clamp,
  clampPrice,
  computeWeightedMid,
  computeDynamicDelta,
  computeSkew,
  computeBidAsk,
  computeQuoteSize,
  shouldRequote,
} from "./quote-calculator";

export type { AsQuoteInput } from "./as-calculator";
export {
  DEFAULT_AS_PARAMS,
  computeDynamicGamma,
  computeReservationPrice,
  computeOptimalSpread,
  computeAsQuotes,
  estimateTimeRemaining,
} from "./as-calculator";

// ─────────────────────────────────────────────────────────────────────────────
// Feature trackers
// ─────────────────────────────────────────────────────────────────────────────
export { VolTracker, StaleTracker, KappaEstimator, KAPPA_MIN, KAPPA_MAX } from "./feature-calculator";

// ─────────────────────────────────────────────────────────────────────────────
// Inventory math
// ─────────────────────────────────────────────────────────────────────────────
export type { LegState, InventoryError, InventoryFill } from "./inventory-math";
export {
  SPLIT_COST_BASIS,
  createEmptyInventory,
  applyFill,
  applyInventoryFill,
  applyMerge,
  applySplit,
  getLeg,
  mergeablePairs,
  positionAgeHours,
  inventoryExposure,
  isFlat,
  toSnapshot,
} from "./inventory-math";

// ─────────────────────────────────────────────────────────────────────────────
// Proposal pipeline
// ─────────────────────────────────────────────────────────────────────────────
export type { ProposalStage, BaseProposalInput, PipelineBook } from "./proposal-pipeline";
export {
  MIN_VIABLE_SIZE,
  createBaseProposal,
  applyMultiLevel,
  widenSpreads,
  applyVolAdjustment,
  applyEventRisk,
  applyBudgetConstraint,
  applyPostOnlyFilter,
  runProposalPipeline,
} from "./proposal-pipeline";

// ─────────────────────────────────────────────────────────────────────────────
// Risk policy
// ─────────────────────────────────────────────────────────────────────────────
export type { MmQuoteCheck, InventoryRiskCheck, ExposureCheck } from "./risk-policy";
export {
  MIN_QUOTE_SPREAD_PTS,
  validateMmQuote,
  computeDrawdownPct,
  classifyDrawdown,
  cooldownSecondsForStreak,
  checkInventoryRisk,
  computeExposureCheck,
  sanitizePostOnlyQuotes,
} from "./risk-policy";

// ─────────────────────────────────────────────────────────────────────────────
// Metrics
// ─────────────────────────────────────────────────────────────────────────────
export type { MetricsFill, MetricsQuote, PnlSummary } from "./metrics";
export {
  fillQuality,
  adverseSelection,
  computePnl,
  spreadCaptureRate,
  sharpeRatio,
  profitFactor,
  inventoryTurnRate,
  dailyReturnPct,
} from "./metrics";

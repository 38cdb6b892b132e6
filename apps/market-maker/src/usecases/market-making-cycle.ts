/**
 * Market-Making Cycle - one pass of the quoting loop
 *
 * 1. Reconcile live quotes (fills -> ledger, store, kappa) and retry cancels
 *    of retired quotes still resting on the venue
 * 2. Balance -> portfolio value -> drawdown check / auto-resume
 * 3. Paused: cancel every quote, skip quoting
 * 4. Effective sizing (reduce mode halves market count and size)
 * 5. Candidates: scorer filter, cap, cancel quotes of markets that left
 * 6. Capital split and global exposure check
 * 7. Per market: book -> mid -> trackers -> price -> validate -> sides/sizes
 *    -> advisory review -> proposal pipeline -> place/requote -> persist
 * 8. Maintenance (merge, store reconciliation, bot status) always runs
 *
 * Book fetches and event-guard checks run concurrently (the venue is
 * concurrency limited); state changes happen market by market.
 */

import {
  applyBudgetConstraint,
  applyEventRisk,
  applyMultiLevel,
  applyVolAdjustment,
  computeAsQuotes,
  computeBidAsk,
  computeDynamicDelta,
  computeQuoteSize,
  computeSkew,
  computeWeightedMid,
  createBaseProposal,
  estimateTimeRemaining,
  roundTo,
  runProposalPipeline,
  sanitizePostOnlyQuotes,
  shouldRequote,
  validateMmQuote,
  type BookSummary,
  type KappaEstimator,
  type MarketCandidate,
  type MmConfig,
  type Ms,
  type Price,
  type ProposalStage,
  type QuotePair,
  type RiskMode,
  type Shares,
  type StaleTracker,
  type Usdc,
  type VolTracker,
} from "@outcome-mm/core";
import {
  describeVenueError,
  type AdvisoryClient,
  type EventAssessment,
  type VenueError,
  type VenuePort,
} from "@outcome-mm/adapters";
import type { QuoteStatus, Repositories } from "@outcome-mm/repositories";
import { logger } from "@outcome-mm/utils";

import { runInventoryMaintenance } from "../maintenance/inventory-maintenance";
import type { InventoryLedger } from "../services/inventory-ledger";
import type { MarketStateRegistry } from "../services/market-state";
import type { QuoteRequest, Quoter } from "../services/quoter";
import type { RiskManager } from "../services/risk-manager";
import { persistInventory, recordFill } from "./record-fill";

/** Markets priced outside this band are not quoted */
const MIN_QUOTABLE_MID: Price = 0.02;
const MAX_QUOTABLE_MID: Price = 0.98;

/** Venue minimum order size when the book does not say */
const DEFAULT_MIN_SHARES: Shares = 5;

/** Days to resolution assumed when the candidate does not carry it */
const DEFAULT_DAYS_TO_RESOLUTION = 30;

export interface MarketMakingCycleDeps {
  config: MmConfig;
  venue: VenuePort;
  quoter: Quoter;
  ledger: InventoryLedger;
  risk: RiskManager;
  registry: MarketStateRegistry;
  repositories: Repositories;
  advisory: AdvisoryClient;
  trackers: {
    vol: VolTracker;
    stale: StaleTracker;
    kappa: KappaEstimator;
  };
  /** Candidate markets, best first (supplied by the external scanner) */
  getCandidates: () => Promise<MarketCandidate[]>;
  /** Candidates scoring below this are not quoted */
  minMarketScore: number;
  clock?: () => Ms;
}

export type CycleSkipReason =
  | "overlap"
  | "balance_unavailable"
  | "paused"
  | "no_candidates"
  | "exposure_limit"
  | "insufficient_capital";

export type MarketOutcome =
  | "placed"
  | "requoted"
  | "kept"
  | "cooldown"
  | "circuit_open"
  | "killed"
  | "no_book"
  | "extreme_mid"
  | "rejected"
  | "no_sides"
  | "not_approved"
  | "failed";

export interface CycleSummary {
  cycle: number;
  skipped: CycleSkipReason | null;
  riskMode: RiskMode;
  paused: boolean;
  balance: Usdc | null;
  portfolioValue: Usdc | null;
  fills: number;
  markets: Record<string, MarketOutcome>;
  activeMarkets: number;
}

export interface MarketMakingCycle {
  runOnce(): Promise<CycleSummary>;
  cycleCount(): number;
}

interface CapitalContext {
  freeCapital: Usdc;
  committed: Usdc;
  maxPerMarket: Usdc;
  quoteSizeUsd: Usdc;
}

export function createMarketMakingCycle(deps: MarketMakingCycleDeps): MarketMakingCycle {
  const { config, venue, quoter, ledger, risk, registry, repositories, advisory, trackers } = deps;
  const clock = deps.clock ?? Date.now;

  const knownMarkets = new Map<string, MarketCandidate>();
  let cycle = 0;
  let running = false;

  const recordFillDeps = {
    ledger,
    fills: repositories.fills,
    inventory: repositories.inventory,
    kappa: trackers.kappa,
    clock,
  };

  // ───────────────────────────────────────────────────────────────────────────
  // Quote bookkeeping
  // ───────────────────────────────────────────────────────────────────────────

  const setQuoteStatus = async (pair: QuotePair, status: QuoteStatus): Promise<void> => {
    if (pair.dbId === null) return;
    const updated = await repositories.quotes.updateQuoteStatus(pair.dbId, status);
    if (updated.isErr()) {
      logger.warn("Failed to update quote status", { quoteId: pair.dbId, status, error: updated.error.message });
    }
  };

  const persistQuote = async (pair: QuotePair, levels: number): Promise<void> => {
    const inserted = await repositories.quotes.insertQuote({
      marketId: pair.marketId,
      tokenId: pair.tokenId,
      noTokenId: pair.noTokenId,
      conditionId: pair.conditionId,
      bidPrice: pair.bidPrice,
      askPrice: pair.askPrice,
      bidSize: pair.bidSize,
      askSize: pair.askSize,
      bidOrderId: pair.bidOrderId,
      askOrderId: pair.askOrderId,
      midPrice: pair.quotedMid,
      status: "active",
      levels,
    });
    if (inserted.isOk()) {
      pair.dbId = inserted.value;
    } else {
      logger.warn("Failed to persist quote", { marketId: pair.marketId, error: inserted.error.message });
    }
  };

  /** Late fills on a pair that is being dropped */
  const harvest = async (pair: QuotePair): Promise<number> => {
    const fills = await quoter.harvestLateFills(pair);
    for (const fill of fills) {
      await recordFill(recordFillDeps, pair, fill);
    }
    return fills.length;
  };

  /**
   * Cancel a dropped pair and close its row; on a failed cancel the pair is
   * parked in `retiringQuotes` and retried next cycle
   */
  const settleRetired = async (pair: QuotePair, status: QuoteStatus): Promise<number> => {
    const cancelled = await quoter.cancelQuotePair(pair);
    const fills = await harvest(pair);

    if (!cancelled) {
      if (!registry.retiringQuotes.has(pair)) {
        logger.warn("Retired quote still resting, cancel retried next cycle", { marketId: pair.marketId, status });
      }
      registry.retiringQuotes.set(pair, status);
      return fills;
    }

    registry.retiringQuotes.delete(pair);
    await setQuoteStatus(pair, status);
    quoter.release(pair);
    return fills;
  };

  const retire = async (marketId: string, status: QuoteStatus): Promise<number> => {
    const pair = registry.activeQuotes.get(marketId);
    if (!pair) return 0;

    registry.activeQuotes.delete(marketId);
    return settleRetired(pair, status);
  };

  // ───────────────────────────────────────────────────────────────────────────
  // Steps
  // ───────────────────────────────────────────────────────────────────────────

  const reconcileQuotes = async (): Promise<number> => {
    let count = 0;

    for (const [pair, status] of [...registry.retiringQuotes]) {
      const fills = await quoter.reconcileQuote(pair);
      for (const fill of fills) {
        await recordFill(recordFillDeps, pair, fill);
      }
      count += fills.length + (await settleRetired(pair, status));
    }

    for (const [marketId, pair] of [...registry.activeQuotes]) {
      const fills = await quoter.reconcileQuote(pair);
      if (pair.isTerminal) {
        fills.push(...(await quoter.harvestLateFills(pair)));
      }

      for (const fill of fills) {
        await recordFill(recordFillDeps, pair, fill);
      }
      count += fills.length;

      if (pair.isTerminal) {
        registry.activeQuotes.delete(marketId);
        const filled = pair.bidState === "FILLED" || pair.askState === "FILLED";
        await setQuoteStatus(pair, filled ? "filled" : "cancelled");
        quoter.release(pair);
      }
    }

    return count;
  };

  const selectMarkets = async (maxMarkets: number): Promise<MarketCandidate[]> => {
    const candidates = await deps.getCandidates();
    const scores = await Promise.all(candidates.map(c => advisory.score(c)));
    return candidates.filter((_, i) => (scores[i]?.score ?? 0) >= deps.minMarketScore).slice(0, maxMarkets);
  };

  const lockedCapital = (): Usdc => {
    let locked = 0;
    for (const pair of [...registry.activeQuotes.values(), ...registry.retiringQuotes.keys()]) {
      if (pair.hasOpenBid()) locked += pair.bidSize * pair.bidPrice;
    }
    return locked;
  };

  const quoteMarket = async (
    candidate: MarketCandidate,
    book: BookSummary | null,
    assessment: EventAssessment,
    capital: CapitalContext,
  ): Promise<MarketOutcome> => {
    const { marketId, tokenId } = candidate;
    const nowMs = clock();

    if (!book) return "no_book";

    const mid = computeWeightedMid(book) ?? book.mid;
    if (mid === null) return "no_book";
    if (mid < MIN_QUOTABLE_MID || mid > MAX_QUOTABLE_MID) {
      logger.debug("Skipping extreme mid", { marketId, mid });
      return "extreme_mid";
    }

    // ── Trackers ──
    trackers.stale.updateIfChanged(marketId, mid, nowMs);
    const trackedVol = trackers.vol.update(marketId, mid);
    const staleness = trackers.stale.getStaleness(marketId, nowMs);
    const spreadPts = book.spread * 100;

    const inv = ledger.get(marketId);
    let netPosition = inv.yesPosition;
    const { maxPerMarket } = capital;

    // ── Pricing ──
    let bid: Price;
    let ask: Price;
    let reservationPrice: Price = mid;

    if (config.pricingEngine === "as") {
      const priced = computeAsQuotes({
        mid,
        inventory: netPosition,
        maxInventory: maxPerMarket / mid,
        volPts: trackedVol > 0 ? trackedVol : Math.max(spreadPts * 0.5, 1),
        T: estimateTimeRemaining(candidate.daysToResolution ?? DEFAULT_DAYS_TO_RESOLUTION),
        params: {
          gammaBase: config.asGammaBase,
          gammaAlpha: config.asGammaAlpha,
          kappa: trackers.kappa.getKappa(marketId, nowMs),
          T: 1,
          minSpreadPts: config.deltaMin * 2,
          maxSpreadPts: config.maxSpreadPts,
        },
        avgEntryPrice: inv.yesAvgEntry,
      });
      bid = priced.bid;
      ask = priced.ask;
      reservationPrice = priced.reservationPrice;
    } else {
      const delta = computeDynamicDelta({
        volShort: Math.max(spreadPts * 0.5, 1),
        bookImbalance: book.imbalance ?? 0,
        staleRisk: staleness,
        deltaMin: config.deltaMin,
        deltaMax: config.deltaMax,
        trackedVol,
      });
      const skewFactor = config.inventorySkewFactor + ledger.getUnwindUrgency(marketId) * 0.3;
      const skew = computeSkew(ledger.getSkewDirection(marketId, maxPerMarket) * maxPerMarket, maxPerMarket, skewFactor);
      ({ bid, ask } = computeBidAsk(mid, delta, skew));
    }

    const validation = validateMmQuote({
      bid,
      ask,
      mid,
      maxDelta: config.deltaMax,
      maxSpreadPts: config.maxSpreadPts,
      paused: risk.isPaused,
    });
    if (!validation.ok) {
      logger.debug("Quote rejected by risk", { marketId, reason: validation.reason, bid, ask, mid });
      return "rejected";
    }

    if (config.postOnly) {
      ({ bid, ask } = sanitizePostOnlyQuotes(bid, ask, book.bestBid, book.bestAsk));
    }

    // ── Sides ──
    const minShares = Math.max(DEFAULT_MIN_SHARES, book.minOrderSize ?? DEFAULT_MIN_SHARES);
    const atCapacity = ledger.isAtCapacity(marketId, maxPerMarket, mid);
    const inventoryRisk = risk.checkInventoryRisk(Math.abs(netPosition) * mid, maxPerMarket);

    let placeBid = !atCapacity && inventoryRisk.ok;
    let placeAsk = netPosition >= minShares;

    if (
      !placeAsk &&
      config.twoSided &&
      config.useSplitMerge &&
      candidate.conditionId &&
      candidate.noTokenId &&
      !registry.hasSplitFailed(marketId) &&
      capital.freeCapital - capital.committed >= config.splitSizeUsd
    ) {
      const amount = config.splitSizeUsd;
      logger.info("Splitting collateral for two-sided quoting", { marketId, amount });

      const split = await venue.splitPosition(candidate.conditionId, amount);
      if (split.isErr()) {
        registry.markSplitFailed(marketId);
        logger.warn("Split failed, not retried until restart", { marketId, error: describeVenueError(split.error) });
      } else {
        ledger.processSplit(marketId, amount, tokenId, candidate.noTokenId);
        await persistInventory(recordFillDeps, marketId);
        capital.committed += amount;
        netPosition = ledger.get(marketId).yesPosition;
        placeAsk = netPosition >= minShares;
      }
    }

    // ── Sizes ──
    let bidShares = 0;
    if (placeBid) {
      const sizeUsd = computeQuoteSize({
        capital: capital.freeCapital - capital.committed,
        maxPerMarket,
        currentInventoryUsdc: Math.abs(netPosition) * mid,
        maxInventory: maxPerMarket,
        baseSizeUsd: capital.quoteSizeUsd,
      });
      bidShares = sizeUsd > 0 ? roundTo(sizeUsd / mid, 1) : 0;
      if (bidShares < minShares) {
        placeBid = false;
        bidShares = 0;
      }
    }

    let askShares = 0;
    if (placeAsk) {
      askShares = roundTo(Math.min(netPosition, maxPerMarket / mid), 1);
      if (askShares < minShares) {
        placeAsk = false;
        askShares = 0;
      }
    }

    if (!placeBid && !placeAsk) {
      logger.debug("No sides to quote", { marketId, atCapacity, netPosition, minShares });
      return "no_sides";
    }

    // ── Advisory review ──
    const verdict = await advisory.review({
      marketId,
      proposedSizeUsd: roundTo(bidShares * bid + askShares * ask, 2),
      netExposureUsd: roundTo(netPosition * mid, 2),
    });
    if (!verdict.approve) {
      logger.info("Quote not approved by risk officer", { marketId, reason: verdict.reason });
      return "not_approved";
    }
    if (verdict.sizeFactor < 1) {
      bidShares = roundTo(bidShares * verdict.sizeFactor, 1);
      askShares = roundTo(askShares * verdict.sizeFactor, 1);
    }

    // ── Proposal pipeline ──
    const base = createBaseProposal({
      marketId,
      tokenId,
      bidPrice: bid,
      askPrice: ask,
      bidSize: placeBid && bidShares >= minShares ? bidShares : 0,
      askSize: placeAsk && askShares >= minShares ? askShares : 0,
      mid,
      reservationPrice,
    });

    const stages: ProposalStage[] = [
      p => applyMultiLevel(p, config.multiLevelCount, config.levelSpreadMult, config.levelSizeMult),
      p => applyVolAdjustment(p, trackedVol, config.volWidenThresholdPts),
      p => applyEventRisk(p, assessment.warning, config.eventRiskWidenPct),
      // asks sell held YES and lock no collateral
      p => ({ ...applyBudgetConstraint({ ...p, asks: [] }, capital.freeCapital, capital.committed, minShares), asks: p.asks }),
    ];
    const proposal = runProposalPipeline(
      base,
      stages,
      config.postOnly ? { bestBid: book.bestBid, bestAsk: book.bestAsk } : { bestBid: 0, bestAsk: 0 },
    );

    const bidOrder = proposal.bids.find(o => o.level === 0);
    const askOrder = proposal.asks.find(o => o.level === 0);
    if (!bidOrder && !askOrder) {
      logger.debug("Proposal left no orders", { marketId });
      return "no_sides";
    }

    const request: QuoteRequest = {
      marketId,
      tokenId,
      bidPrice: bidOrder?.price ?? bid,
      askPrice: askOrder?.price ?? ask,
      bidSize: bidOrder?.size ?? 0,
      askSize: askOrder?.size ?? 0,
      placeBid: bidOrder !== undefined,
      placeAsk: askOrder !== undefined,
      quotedMid: mid,
      noTokenId: candidate.noTokenId ?? null,
      conditionId: candidate.conditionId ?? null,
    };
    const levels = Math.max(proposal.bids.length, proposal.asks.length);

    // ── Place / requote ──
    let existing = registry.activeQuotes.get(marketId);

    if (existing && !existing.isActive && !existing.isTerminal) {
      // zombie: neither side open nor done (UNKNOWN)
      await retire(marketId, "cancelled");
      existing = undefined;
    }

    if (existing?.isActive) {
      const sidesChanged = request.placeBid !== existing.hasOpenBid() || request.placeAsk !== existing.hasOpenAsk();
      const midMoved =
        existing.ageSeconds(nowMs) >= config.minQuoteLifetimeSeconds &&
        shouldRequote(existing, mid, config.requoteThresholdPts);
      if (!sidesChanged && !midMoved) return "kept";

      const previous = existing;
      const next =
        config.hangingOrders ?
          await quoter.requotePreservingHanging(previous, request)
        : await quoter.requote(previous, request);
      await harvest(previous);

      quoter.release(previous, next ?? undefined);

      if (!next) {
        registry.activeQuotes.delete(marketId);
        await setQuoteStatus(previous, "cancelled");
        registry.registerQuoteFailure(marketId, quoter.getLastQuoteFailure(), nowMs);
        return "failed";
      }

      await persistQuote(next, levels);
      await setQuoteStatus(previous, "replaced");
      registry.activeQuotes.set(marketId, next);
      registry.registerQuoteSuccess(marketId);
      if (next.hasOpenBid()) capital.committed += next.bidSize * next.bidPrice;
      return "requoted";
    }

    const pair = await quoter.placeQuotePair(request);
    if (!pair) {
      registry.registerQuoteFailure(marketId, quoter.getLastQuoteFailure(), nowMs);
      return "failed";
    }

    await persistQuote(pair, levels);
    registry.activeQuotes.set(marketId, pair);
    registry.registerQuoteSuccess(marketId);
    if (pair.hasOpenBid()) capital.committed += pair.bidSize * pair.bidPrice;
    return "placed";
  };

  // ───────────────────────────────────────────────────────────────────────────
  // Cycle
  // ───────────────────────────────────────────────────────────────────────────

  const quoteCycle = async (summary: CycleSummary): Promise<void> => {
    summary.fills = await reconcileQuotes();

    const balance = await venue.getCollateralBalance();
    if (balance.isErr()) {
      logger.warn("Could not fetch collateral balance, skipping quoting", {
        error: describeVenueError(balance.error),
      });
      summary.skipped = "balance_unavailable";
      return;
    }

    const totalExposure = ledger.getTotalExposure();
    const portfolioValue = balance.value + totalExposure;
    summary.balance = balance.value;
    summary.portfolioValue = portfolioValue;

    await risk.checkIntradayDd(portfolioValue);
    if (risk.isPaused) {
      await risk.tryAutoResume(portfolioValue);
    }

    if (risk.isPaused) {
      for (const marketId of [...registry.activeQuotes.keys()]) {
        summary.fills += await retire(marketId, "killed");
      }
      summary.skipped = "paused";
      return;
    }

    // ── Effective sizing ──
    const reduce = risk.riskMode === "reduce";
    const effectiveMaxMarkets = reduce ? Math.max(1, Math.floor(config.maxMarkets / 2)) : config.maxMarkets;
    const effectiveQuoteSize = reduce ? config.quoteSizeUsd / 2 : config.quoteSizeUsd;
    if (reduce) {
      logger.debug("Reduce mode: halved market count and size", { effectiveMaxMarkets, effectiveQuoteSize });
    }

    // ── Candidates ──
    const markets = await selectMarkets(effectiveMaxMarkets);
    for (const candidate of markets) {
      knownMarkets.set(candidate.marketId, candidate);
    }

    const selected = new Set(markets.map(m => m.marketId));
    for (const marketId of [...registry.activeQuotes.keys()]) {
      if (selected.has(marketId)) continue;
      summary.fills += await retire(marketId, "cancelled");
      registry.forgetMarket(marketId);
      trackers.vol.reset(marketId);
      trackers.stale.reset(marketId);
      logger.info("Cancelled quotes for removed market", { marketId });
    }

    if (markets.length === 0) {
      summary.skipped = "no_candidates";
      return;
    }

    // ── Capital ──
    const locked = lockedCapital();
    const freeCapital = Math.max(0, balance.value - locked);
    const remainingSlots = Math.max(1, effectiveMaxMarkets - registry.activeQuotes.size);
    const capital: CapitalContext = {
      freeCapital,
      committed: 0,
      maxPerMarket: freeCapital / remainingSlots,
      quoteSizeUsd: effectiveQuoteSize,
    };

    const exposure = risk.checkGlobalExposure(balance.value, totalExposure, config.maxTotalExposurePct);
    if (!exposure.withinLimit) {
      summary.skipped = "exposure_limit";
      return;
    }

    if (freeCapital < effectiveQuoteSize) {
      logger.warn("Free capital too low to quote", {
        balance: balance.value.toFixed(2),
        locked: locked.toFixed(2),
        free: freeCapital.toFixed(2),
      });
      summary.skipped = "insufficient_capital";
      return;
    }

    // ── Per market ──
    const nowMs = clock();
    const eligible: MarketCandidate[] = [];
    for (const candidate of markets) {
      if (registry.isInCooldown(candidate.marketId, nowMs)) {
        summary.markets[candidate.marketId] = "cooldown";
      } else if (registry.isCircuitOpen(candidate.marketId, nowMs)) {
        summary.markets[candidate.marketId] = "circuit_open";
      } else {
        eligible.push(candidate);
      }
    }

    const [assessments, books] = await Promise.all([
      Promise.all(eligible.map(c => advisory.assess(c))),
      Promise.all(eligible.map(c => venue.getBookSummary(c.tokenId))),
    ]);

    for (const [i, candidate] of eligible.entries()) {
      const assessment = assessments[i];
      const book = books[i];
      if (!assessment || !book) continue;

      if (assessment.kill) {
        summary.fills += await retire(candidate.marketId, "killed");
        logger.warn("Market killed by event guard", { marketId: candidate.marketId, reason: assessment.reason });
        summary.markets[candidate.marketId] = "killed";
        continue;
      }

      if (book.isErr()) {
        logBookError(candidate.marketId, book.error);
      }
      summary.markets[candidate.marketId] = await quoteMarket(
        candidate,
        book.isOk() ? book.value : null,
        assessment,
        capital,
      );
    }
  };

  const runOnce = async (): Promise<CycleSummary> => {
    const summary: CycleSummary = {
      cycle: cycle + 1,
      skipped: null,
      riskMode: risk.riskMode,
      paused: risk.isPaused,
      balance: null,
      portfolioValue: null,
      fills: 0,
      markets: {},
      activeMarkets: registry.activeQuotes.size,
    };

    if (running) {
      logger.debug("Market-making cycle still running, skipping");
      return { ...summary, cycle, skipped: "overlap" };
    }

    running = true;
    cycle++;
    try {
      await quoteCycle(summary);
      await runInventoryMaintenance(
        {
          config,
          venue,
          ledger,
          risk,
          inventory: repositories.inventory,
          botStatus: repositories.botStatus,
          clock,
        },
        { cycle, knownMarkets, activeQuotes: registry.activeQuotes },
      );
    } finally {
      running = false;
    }

    summary.riskMode = risk.riskMode;
    summary.paused = risk.isPaused;
    summary.activeMarkets = registry.activeQuotes.size;

    if (cycle % 10 === 0 || summary.fills > 0) {
      logger.info("MM cycle", {
        cycle,
        activeMarkets: summary.activeMarkets,
        fills: summary.fills,
        riskMode: summary.riskMode,
        balance: summary.balance?.toFixed(2) ?? "-",
        exposure: ledger.getTotalExposure().toFixed(2),
        realizedPnl: ledger.getTotalRealizedPnl().toFixed(4),
      });
    }
    return summary;
  };

  return {
    runOnce,
    cycleCount: () => cycle,
  };
}

function logBookError(marketId: string, error: VenueError): void {
  logger.debug("Book unavailable", { marketId, error: describeVenueError(error) });
}

/**
 * Quoter - places, cancels and reconciles bid/ask quote pairs on the venue
 *
 * - Only the quoter moves a QuotePair's side states
 * - Fills are reported once per order: the matched size already reported is
 *   remembered until the order fills or its pair is released, so a reconcile
 *   followed by a late-fill harvest never double counts
 * - Venue rejections never throw; a side that could not be placed is CANCELLED
 * - A side whose cancel failed stays in the pair until a later cancel succeeds
 */

import { err, ok, type Result } from "neverthrow";

import {
  QuotePair,
  TICK_SIZE,
  isOpenState,
  parseVenueStatus,
  type DetectedFill,
  type Ms,
  type OrderState,
  type Price,
  type QuoteFailure,
  type Shares,
  type Side,
} from "@outcome-mm/core";
import {
  describeVenueError,
  isOrderFilled,
  type OrderStatusReport,
  type PlacedOrder,
  type VenueError,
  type VenueOpenOrder,
  type VenuePort,
} from "@outcome-mm/adapters";
import type { QuoteRecord } from "@outcome-mm/repositories";
import { logger } from "@outcome-mm/utils";

/** A resting side is repriced once the target moves this far */
export const HANGING_REPRICE_THRESHOLD: Price = TICK_SIZE / 2;

export interface QuoteRequest {
  marketId: string;
  /** YES token both sides are quoted on */
  tokenId: string;
  bidPrice: Price;
  askPrice: Price;
  bidSize: Shares;
  askSize: Shares;
  placeBid: boolean;
  placeAsk: boolean;
  quotedMid?: Price;
  noTokenId?: string | null;
  conditionId?: string | null;
}

export interface QuoterOptions {
  postOnly: boolean;
  clock?: () => Ms;
}

export interface RebuildOutcome {
  pairs: Map<string, QuotePair>;
  /** Persisted active quotes with nothing left on the venue */
  staleQuoteIds: number[];
  /** Venue orders not referenced by any active quote, cancelled */
  orphansCancelled: number;
}

type SideKey = "bid" | "ask";

interface SideOutcome {
  orderId: string | null;
  state: OrderState;
  error: VenueError | null;
}

interface ReportedFill {
  size: Shares;
  fee: number;
}

export class Quoter {
  private readonly venue: VenuePort;
  private readonly postOnly: boolean;
  private readonly clock: () => Ms;
  private readonly reported = new Map<string, ReportedFill>();
  private lastFailure: QuoteFailure | null = null;

  constructor(venue: VenuePort, options: QuoterOptions) {
    this.venue = venue;
    this.postOnly = options.postOnly;
    this.clock = options.clock ?? Date.now;
  }

  getLastQuoteFailure(): QuoteFailure | null {
    return this.lastFailure;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Placement
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Place up to two independent orders; null when no side was placed
   */
  async placeQuotePair(request: QuoteRequest): Promise<QuotePair | null> {
    const [bid, ask] = await Promise.all([
      request.placeBid ? this.placeSide(request.tokenId, "buy", request.bidPrice, request.bidSize) : skipped(),
      request.placeAsk ? this.placeSide(request.tokenId, "sell", request.askPrice, request.askSize) : skipped(),
    ]);

    if (bid.orderId === null && ask.orderId === null) {
      this.recordFailure(request, bid.error, ask.error);
      return null;
    }

    const pair = this.newPair(request, bid, ask);
    const label =
      bid.orderId !== null && ask.orderId !== null ? "BID+ASK"
      : bid.orderId !== null ? "BID-only"
      : "ASK-only";

    logger.info(`Quote placed (${label})`, {
      marketId: request.marketId,
      bid: bid.orderId !== null ? request.bidPrice : "-",
      ask: ask.orderId !== null ? request.askPrice : "-",
      bidSize: request.bidSize,
      askSize: request.askSize,
      ...(bid.error ? { bidError: describeVenueError(bid.error) } : {}),
      ...(ask.error ? { askError: describeVenueError(ask.error) } : {}),
    });
    return pair;
  }

  /**
   * Cancel every open side with an order id; false if any cancel failed
   *
   * A side the venue no longer knows or already matched is marked CANCELLED so
   * a later `harvestLateFills` picks up whatever it matched.
   */
  async cancelQuotePair(pair: QuotePair): Promise<boolean> {
    const results = await Promise.all([this.cancelSide(pair, "bid"), this.cancelSide(pair, "ask")]);
    return results.every(Boolean);
  }

  /**
   * Cancel the open sides, then place the request
   *
   * A side whose cancel failed is still resting on the venue: it is carried
   * into the returned pair and nothing is placed in its stead.
   */
  async requote(pair: QuotePair, request: QuoteRequest): Promise<QuotePair | null> {
    return this.replaceQuote(pair, request, false);
  }

  /**
   * Requote, keeping partially filled sides and sides whose price barely moved
   *
   * Sides whose cancel failed are carried over as in `requote`. Returns null
   * when the resulting pair holds no order at all.
   */
  async requotePreservingHanging(pair: QuotePair, request: QuoteRequest): Promise<QuotePair | null> {
    return this.replaceQuote(pair, request, true);
  }

  /**
   * Forget the fill bookkeeping of a discarded pair
   *
   * Orders carried into `next` keep theirs.
   */
  release(pair: QuotePair, next?: QuotePair): void {
    const carriedIds = new Set([next?.bidOrderId, next?.askOrderId]);
    for (const orderId of [pair.bidOrderId, pair.askOrderId]) {
      if (orderId !== null && !carriedIds.has(orderId)) {
        this.reported.delete(orderId);
      }
    }
  }

  /** Orders with fill bookkeeping still held */
  trackedOrderCount(): number {
    return this.reported.size;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Reconciliation
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Poll every NEW/LIVE/PARTIAL side and return the fills that completed
   */
  async reconcileQuote(pair: QuotePair): Promise<DetectedFill[]> {
    const fills: DetectedFill[] = [];

    for (const key of ["bid", "ask"] as const) {
      const orderId = sideOrderId(pair, key);
      if (orderId === null || !isOpenState(sideState(pair, key))) continue;

      const status = await this.venue.getOrderStatus(orderId);
      if (status.isErr()) {
        logger.warn("Order status poll failed", {
          marketId: pair.marketId,
          orderId,
          error: describeVenueError(status.error),
        });
        continue;
      }

      const report = status.value;
      if (isOrderFilled(report)) {
        this.setState(pair, key, "FILLED");
        const fill = this.takeFill(pair, key, report);
        if (fill) fills.push(fill);
      } else if (report.sizeMatched > 0) {
        const parsed = parseVenueStatus(report.status);
        // a cancelled partial stays CANCELLED; the harvest reports its matched size
        this.setState(pair, key, parsed === "CANCELLED" ? "CANCELLED" : "PARTIAL");
      } else {
        this.setState(pair, key, parseVenueStatus(report.status));
      }
    }

    return fills;
  }

  /**
   * Report size matched on CANCELLED sides after they left the book
   */
  async harvestLateFills(pair: QuotePair): Promise<DetectedFill[]> {
    const fills: DetectedFill[] = [];

    for (const key of ["bid", "ask"] as const) {
      const orderId = sideOrderId(pair, key);
      if (orderId === null || sideState(pair, key) !== "CANCELLED") continue;

      const status = await this.venue.getOrderStatus(orderId);
      if (status.isErr()) {
        logger.debug("Late fill check failed", { orderId, error: describeVenueError(status.error) });
        continue;
      }

      const report = status.value;
      if (report.sizeMatched <= 0) continue;

      if (isOrderFilled(report)) {
        this.setState(pair, key, "FILLED");
      }
      const fill = this.takeFill(pair, key, report);
      if (fill) {
        logger.info("Late fill on cancelled order", { marketId: pair.marketId, orderId, size: fill.size });
        fills.push(fill);
      }
    }

    return fills;
  }

  /**
   * Rebuild in-memory quotes after a restart
   *
   * Persisted active quotes are matched against the venue's open orders by id;
   * a side whose order is gone becomes CANCELLED (late fills still harvestable),
   * and open orders nothing references are cancelled.
   */
  async rebuildActiveQuotes(records: readonly QuoteRecord[]): Promise<Result<RebuildOutcome, VenueError>> {
    const openResult = await this.venue.getOpenOrders();
    if (openResult.isErr()) return err(openResult.error);

    const open = new Map<string, VenueOpenOrder>(openResult.value.map(o => [o.orderId, o]));
    const referenced = new Set<string>();
    const pairs = new Map<string, QuotePair>();
    const staleQuoteIds: number[] = [];

    for (const rec of records) {
      const bidOpen = rec.bidOrderId !== null ? open.get(rec.bidOrderId) : undefined;
      const askOpen = rec.askOrderId !== null ? open.get(rec.askOrderId) : undefined;
      if (rec.bidOrderId !== null) referenced.add(rec.bidOrderId);
      if (rec.askOrderId !== null) referenced.add(rec.askOrderId);

      if (!bidOpen && !askOpen) {
        staleQuoteIds.push(rec.id);
        continue;
      }

      pairs.set(
        rec.marketId,
        new QuotePair({
          marketId: rec.marketId,
          tokenId: rec.tokenId,
          noTokenId: rec.noTokenId,
          conditionId: rec.conditionId,
          bidPrice: rec.bidPrice,
          askPrice: rec.askPrice,
          size: Math.max(rec.bidSize, rec.askSize),
          bidSize: rec.bidSize,
          askSize: rec.askSize,
          bidOrderId: rec.bidOrderId,
          askOrderId: rec.askOrderId,
          bidState: restoredState(rec.bidOrderId, bidOpen),
          askState: restoredState(rec.askOrderId, askOpen),
          quotedMid: rec.midPrice,
          dbId: rec.id,
          nowMs: this.clock(),
        }),
      );
    }

    let orphansCancelled = 0;
    for (const order of open.values()) {
      if (referenced.has(order.orderId)) continue;

      const cancelled = await this.venue.cancelOrder(order.orderId);
      if (cancelled.isOk()) {
        orphansCancelled++;
      } else {
        logger.warn("Failed to cancel orphan order", {
          orderId: order.orderId,
          error: describeVenueError(cancelled.error),
        });
      }
    }

    logger.info("Rebuilt active quotes", {
      restored: pairs.size,
      stale: staleQuoteIds.length,
      orphansCancelled,
    });
    return ok({ pairs, staleQuoteIds, orphansCancelled });
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────────

  private async replaceQuote(
    pair: QuotePair,
    request: QuoteRequest,
    preserveHanging: boolean,
  ): Promise<QuotePair | null> {
    const hangBid = preserveHanging && this.keepSide(pair, "bid", request.placeBid, request.bidPrice);
    const hangAsk = preserveHanging && this.keepSide(pair, "ask", request.placeAsk, request.askPrice);

    const [bidCancelled, askCancelled] = await Promise.all([
      hangBid ? Promise.resolve(true) : this.cancelSide(pair, "bid"),
      hangAsk ? Promise.resolve(true) : this.cancelSide(pair, "ask"),
    ]);
    const keepBid = hangBid || !bidCancelled;
    const keepAsk = hangAsk || !askCancelled;

    const [bid, ask] = await Promise.all([
      keepBid ? carried(pair.bidOrderId, pair.bidState)
      : request.placeBid ? this.placeSide(request.tokenId, "buy", request.bidPrice, request.bidSize)
      : skipped(),
      keepAsk ? carried(pair.askOrderId, pair.askState)
      : request.placeAsk ? this.placeSide(request.tokenId, "sell", request.askPrice, request.askSize)
      : skipped(),
    ]);

    if (bid.orderId === null && ask.orderId === null) {
      this.recordFailure(request, bid.error, ask.error);
      return null;
    }

    const next = this.newPair(
      {
        ...request,
        bidPrice: keepBid ? pair.bidPrice : request.bidPrice,
        bidSize: keepBid ? pair.bidSize : request.bidSize,
        askPrice: keepAsk ? pair.askPrice : request.askPrice,
        askSize: keepAsk ? pair.askSize : request.askSize,
      },
      bid,
      ask,
    );

    logger.debug("Requoted", {
      marketId: request.marketId,
      keptBid: keepBid,
      keptAsk: keepAsk,
      ...(!bidCancelled || !askCancelled ? { cancelFailed: true } : {}),
    });
    return next;
  }

  private async placeSide(tokenId: string, side: Side, price: Price, size: Shares): Promise<SideOutcome> {
    const placed: Result<PlacedOrder, VenueError> = await this.venue.placeLimitOrder({
      tokenId,
      side,
      price,
      size,
      orderType: "GTC",
      postOnly: this.postOnly,
    });

    if (placed.isErr()) {
      return { orderId: null, state: "CANCELLED", error: placed.error };
    }
    // resting until a status poll says otherwise
    return { orderId: placed.value.orderId, state: "LIVE", error: null };
  }

  private async cancelSide(pair: QuotePair, key: SideKey): Promise<boolean> {
    const orderId = sideOrderId(pair, key);
    if (orderId === null || !isOpenState(sideState(pair, key))) return true;

    const result = await this.venue.cancelOrder(orderId);
    if (result.isOk()) {
      this.setState(pair, key, "CANCELLED");
      return true;
    }

    if (result.error.type === "not_found" || result.error.type === "invalid_order") {
      this.setState(pair, key, "CANCELLED");
      return true;
    }

    logger.warn("Cancel failed", {
      marketId: pair.marketId,
      side: key,
      orderId,
      error: describeVenueError(result.error),
    });
    return false;
  }

  /**
   * PARTIAL sides always stay; LIVE sides stay while wanted and within the reprice threshold
   */
  private keepSide(pair: QuotePair, key: SideKey, wanted: boolean, targetPrice: Price): boolean {
    const open = key === "bid" ? pair.hasOpenBid() : pair.hasOpenAsk();
    if (!open) return false;

    const state = sideState(pair, key);
    if (state === "PARTIAL") return true;

    const current = key === "bid" ? pair.bidPrice : pair.askPrice;
    return wanted && Math.abs(current - targetPrice) < HANGING_REPRICE_THRESHOLD;
  }

  private setState(pair: QuotePair, key: SideKey, next: OrderState): void {
    const nowMs = this.clock();
    const result = key === "bid" ? pair.updateBidState(next, nowMs) : pair.updateAskState(next, nowMs);
    if (result.isErr()) {
      logger.warn("Invalid order state transition", {
        marketId: pair.marketId,
        side: key,
        from: result.error.from,
        to: result.error.to,
      });
    }
  }

  /**
   * Size matched since the last report, as a fill; null when nothing new
   */
  private takeFill(pair: QuotePair, key: SideKey, report: OrderStatusReport): DetectedFill | null {
    const previous = this.reported.get(report.orderId) ?? { size: 0, fee: 0 };
    const sidePrice = key === "bid" ? pair.bidPrice : pair.askPrice;
    const sideSize = key === "bid" ? pair.bidSize : pair.askSize;
    const matched = report.sizeMatched > 0 ? report.sizeMatched : sideSize;

    const size = matched - previous.size;
    if (size <= 0) return null;

    // a FILLED side is never polled again
    if (isOrderFilled(report)) {
      this.reported.delete(report.orderId);
    } else {
      this.reported.set(report.orderId, { size: matched, fee: report.feesPaid });
    }
    return {
      side: key === "bid" ? "buy" : "sell",
      orderId: report.orderId,
      price: report.avgFillPrice ?? sidePrice,
      size,
      fee: Math.max(report.feesPaid - previous.fee, 0),
    };
  }

  private newPair(request: QuoteRequest, bid: SideOutcome, ask: SideOutcome): QuotePair {
    return new QuotePair({
      marketId: request.marketId,
      tokenId: request.tokenId,
      noTokenId: request.noTokenId ?? null,
      conditionId: request.conditionId ?? null,
      bidPrice: request.bidPrice,
      askPrice: request.askPrice,
      size: Math.max(request.bidSize, request.askSize),
      bidSize: request.bidSize,
      askSize: request.askSize,
      bidOrderId: bid.orderId,
      askOrderId: ask.orderId,
      bidState: bid.state,
      askState: ask.state,
      quotedMid: request.quotedMid ?? (request.bidPrice + request.askPrice) / 2,
      nowMs: this.clock(),
    });
  }

  private recordFailure(request: QuoteRequest, bidError: VenueError | null, askError: VenueError | null): void {
    this.lastFailure = {
      marketId: request.marketId,
      tokenId: request.tokenId,
      placeBid: request.placeBid,
      placeAsk: request.placeAsk,
      bidPrice: request.bidPrice,
      askPrice: request.askPrice,
      bidSize: request.bidSize,
      askSize: request.askSize,
      bidError: bidError ? { type: bidError.type, message: bidError.message } : null,
      askError: askError ? { type: askError.type, message: askError.message } : null,
    };

    logger.warn("Quote placement failed on every side", {
      marketId: request.marketId,
      bidError: bidError ? describeVenueError(bidError) : "skipped",
      askError: askError ? describeVenueError(askError) : "skipped",
    });
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const skipped = (): Promise<SideOutcome> => Promise.resolve({ orderId: null, state: "CANCELLED", error: null });

const carried = (orderId: string | null, state: OrderState): Promise<SideOutcome> =>
  Promise.resolve({ orderId, state, error: null });

const sideOrderId = (pair: QuotePair, key: SideKey): string | null =>
  key === "bid" ? pair.bidOrderId : pair.askOrderId;

const sideState = (pair: QuotePair, key: SideKey): OrderState => (key === "bid" ? pair.bidState : pair.askState);

function restoredState(orderId: string | null, open: VenueOpenOrder | undefined): OrderState {
  if (orderId === null) return "CANCELLED";
  if (!open) return "CANCELLED";
  return open.sizeMatched > 0 ? "PARTIAL" : "LIVE";
}

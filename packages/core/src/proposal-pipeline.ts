/**
 * Proposal Pipeline - composable adjustments to a quote ladder
 *
 * base -> multi-level -> volatility widening -> event-risk widening
 *      -> budget cap -> post-only filter
 *
 * Every stage returns a new proposal and leaves its input untouched.
 * This module is pure (no I/O, no throw).
 */

import { MAX_PRICE, MIN_PRICE, TICK_SIZE, roundTo } from "./quote-calculator";
import type { OrderProposal, Points, Price, QuoteProposal, Shares, Usdc } from "./types";

export type ProposalStage = (proposal: QuoteProposal) => QuoteProposal;

/** Smallest order the budget stage will shrink an order down to */
export const MIN_VIABLE_SIZE: Shares = 5;

export interface BaseProposalInput {
  marketId: string;
  tokenId: string;
  bidPrice: Price;
  askPrice: Price;
  bidSize: Shares;
  askSize: Shares;
  mid: Price;
  /** Defaults to mid when 0 or omitted */
  reservationPrice?: Price;
}

/**
 * Level-0 bid and/or ask; a side with zero size or price is omitted
 */
export function createBaseProposal(input: BaseProposalInput): QuoteProposal {
  const { marketId, tokenId, bidPrice, askPrice, bidSize, askSize, mid } = input;
  const reservationPrice = input.reservationPrice !== undefined && input.reservationPrice !== 0 ? input.reservationPrice : mid;

  const bids: OrderProposal[] = [];
  const asks: OrderProposal[] = [];

  if (bidSize > 0 && bidPrice > 0) {
    bids.push({ marketId, tokenId, side: "buy", price: bidPrice, size: bidSize, level: 0, isHanging: false });
  }
  if (askSize > 0 && askPrice > 0) {
    asks.push({ marketId, tokenId, side: "sell", price: askPrice, size: askSize, level: 0, isHanging: false });
  }

  return { marketId, tokenId, bids, asks, mid, reservationPrice };
}

function cloneProposal(proposal: QuoteProposal): QuoteProposal {
  return {
    ...proposal,
    bids: proposal.bids.map(o => ({ ...o })),
    asks: proposal.asks.map(o => ({ ...o })),
  };
}

/**
 * Add levels 1..levels-1 behind level 0
 *
 * Level L sits spreadMult^L times as far from mid and is sizeMult^L times larger.
 */
export function applyMultiLevel(proposal: QuoteProposal, levels = 1, spreadMult = 1.5, sizeMult = 2.0): QuoteProposal {
  const next = cloneProposal(proposal);
  if (levels <= 1) return next;

  const baseBid = proposal.bids[0];
  const baseAsk = proposal.asks[0];
  const mid = proposal.mid;

  for (let level = 1; level < levels; level++) {
    const mult = spreadMult ** level;
    const szMult = sizeMult ** level;

    if (baseBid) {
      const deltaFromMid = mid - baseBid.price;
      next.bids.push({
        ...baseBid,
        price: Math.max(MIN_PRICE, roundTo(mid - deltaFromMid * mult, 2)),
        size: roundTo(baseBid.size * szMult, 1),
        level,
      });
    }

    if (baseAsk) {
      const deltaFromMid = baseAsk.price - mid;
      next.asks.push({
        ...baseAsk,
        price: Math.min(MAX_PRICE, roundTo(mid + deltaFromMid * mult, 2)),
        size: roundTo(baseAsk.size * szMult, 1),
        level,
      });
    }
  }

  return next;
}

/**
 * Scale every order's distance from mid by `multiplier`
 */
export function widenSpreads(proposal: QuoteProposal, multiplier: number): QuoteProposal {
  const mid = proposal.mid;
  return {
    ...proposal,
    bids: proposal.bids.map(o => ({ ...o, price: Math.max(MIN_PRICE, roundTo(mid - (mid - o.price) * multiplier, 2)) })),
    asks: proposal.asks.map(o => ({ ...o, price: Math.min(MAX_PRICE, roundTo(mid + (o.price - mid) * multiplier, 2)) })),
  };
}

/**
 * Widen when volatility exceeds the threshold
 *
 * multiplier = min(2, 1 + (vol - threshold) / threshold)
 */
export function applyVolAdjustment(proposal: QuoteProposal, volPts: Points, threshold: Points = 5): QuoteProposal {
  if (volPts <= threshold || threshold <= 0) return cloneProposal(proposal);

  const multiplier = Math.min(2, 1 + (volPts - threshold) / threshold);
  return widenSpreads(proposal, multiplier);
}

/**
 * Widen by widenPct when the event guard raised a warning
 */
export function applyEventRisk(proposal: QuoteProposal, guardWarning: boolean, widenPct = 50): QuoteProposal {
  if (!guardWarning) return cloneProposal(proposal);
  return widenSpreads(proposal, 1 + widenPct / 100);
}

/**
 * Cap the ladder to the capital left after `committed`
 *
 * A bid costs size * price, an ask size * (1 - price). The first order that
 * does not fit is shrunk if it stays at least `minViableSize`; nothing after
 * it on that side is kept.
 */
export function applyBudgetConstraint(
  proposal: QuoteProposal,
  availableCapital: Usdc,
  committed: Usdc = 0,
  minViableSize: Shares = MIN_VIABLE_SIZE,
): QuoteProposal {
  const remaining = availableCapital - committed;
  if (remaining <= 0) {
    return { ...proposal, bids: [], asks: [] };
  }

  let used = 0;

  const fitSide = (orders: readonly OrderProposal[], unitCost: (o: OrderProposal) => number): OrderProposal[] => {
    const kept: OrderProposal[] = [];
    for (const order of orders) {
      const perShare = unitCost(order);
      const cost = order.size * perShare;
      if (used + cost > remaining) {
        const maxSize = perShare > 0 ? (remaining - used) / perShare : 0;
        if (maxSize >= minViableSize) {
          const size = roundTo(maxSize, 1);
          kept.push({ ...order, size });
          used += size * perShare;
        }
        break;
      }
      kept.push({ ...order });
      used += cost;
    }
    return kept;
  };

  const bids = fitSide(proposal.bids, o => o.price);
  const asks = fitSide(proposal.asks, o => 1 - o.price);

  return { ...proposal, bids, asks };
}

/**
 * Pull back any order that would cross the book
 *
 * Bids at or above bestAsk move to bestAsk - 1 tick; asks at or below
 * bestBid move to bestBid + 1 tick. A zero best price disables that side.
 */
export function applyPostOnlyFilter(proposal: QuoteProposal, bestBid: Price, bestAsk: Price): QuoteProposal {
  return {
    ...proposal,
    bids: proposal.bids.map(o =>
      bestAsk > 0 && o.price >= bestAsk ? { ...o, price: Math.max(MIN_PRICE, roundTo(bestAsk - TICK_SIZE, 2)) } : { ...o },
    ),
    asks: proposal.asks.map(o =>
      bestBid > 0 && o.price <= bestBid ? { ...o, price: Math.min(MAX_PRICE, roundTo(bestBid + TICK_SIZE, 2)) } : { ...o },
    ),
  };
}

export interface PipelineBook {
  bestBid: Price;
  bestAsk: Price;
}

/**
 * Run `stages` in order, then the post-only filter
 *
 * The filter always runs last, so no earlier stage can reintroduce a crossing order.
 */
export function runProposalPipeline(
  proposal: QuoteProposal,
  stages: readonly ProposalStage[],
  book: PipelineBook,
): QuoteProposal {
  const adjusted = stages.reduce((current, stage) => stage(current), proposal);
  return applyPostOnlyFilter(adjusted, book.bestBid, book.bestAsk);
}

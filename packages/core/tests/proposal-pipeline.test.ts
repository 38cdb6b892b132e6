/**
 * Proposal Pipeline Unit Tests
 */

import { describe, expect, test } from "vitest";

import {
  applyBudgetConstraint,
  applyEventRisk,
  applyMultiLevel,
  applyPostOnlyFilter,
  applyVolAdjustment,
  createBaseProposal,
  runProposalPipeline,
  type ProposalStage,
} from "../src/proposal-pipeline";
import type { QuoteProposal } from "../src/types";

const createDefaultProposal = (): QuoteProposal =>
  createBaseProposal({
    marketId: "m1",
    tokenId: "yes-1",
    bidPrice: 0.48,
    askPrice: 0.52,
    bidSize: 10,
    askSize: 10,
    mid: 0.5,
  });

const prices = (proposal: QuoteProposal) => ({
  bids: proposal.bids.map(o => o.price),
  asks: proposal.asks.map(o => o.price),
});

describe("createBaseProposal", () => {
  test("should build level-0 orders on both sides", () => {
    const proposal = createDefaultProposal();

    expect(proposal.bids).toEqual([
      { marketId: "m1", tokenId: "yes-1", side: "buy", price: 0.48, size: 10, level: 0, isHanging: false },
    ]);
    expect(proposal.asks[0]?.side).toBe("sell");
    expect(proposal.reservationPrice).toBe(0.5);
  });

  test("should omit a side with zero size", () => {
    const proposal = createBaseProposal({
      marketId: "m1",
      tokenId: "yes-1",
      bidPrice: 0.48,
      askPrice: 0.52,
      bidSize: 10,
      askSize: 0,
      mid: 0.5,
      reservationPrice: 0.49,
    });

    expect(proposal.asks).toEqual([]);
    expect(proposal.reservationPrice).toBe(0.49);
  });
});

describe("applyMultiLevel", () => {
  test("should add wider, larger levels", () => {
    const proposal = applyMultiLevel(createDefaultProposal(), 2, 1.5, 2);

    expect(prices(proposal)).toEqual({ bids: [0.48, 0.47], asks: [0.52, 0.53] });
    expect(proposal.bids[1]?.size).toBe(20);
    expect(proposal.bids[1]?.level).toBe(1);
  });

  test("should compound size per level", () => {
    const proposal = applyMultiLevel(createDefaultProposal(), 3, 1.5, 2);
    expect(proposal.asks.map(o => o.size)).toEqual([10, 20, 40]);
  });

  test("should be a no-op for a single level", () => {
    expect(applyMultiLevel(createDefaultProposal(), 1)).toEqual(createDefaultProposal());
  });

  test("should not mutate its input", () => {
    const input = createDefaultProposal();
    applyMultiLevel(input, 3);
    expect(input.bids).toHaveLength(1);
  });
});

describe("applyVolAdjustment", () => {
  test("should leave the proposal unchanged below the threshold", () => {
    expect(prices(applyVolAdjustment(createDefaultProposal(), 5, 5))).toEqual({ bids: [0.48], asks: [0.52] });
  });

  test("should widen proportionally above the threshold", () => {
    // 1 + (7.5 - 5) / 5 = 1.5
    expect(prices(applyVolAdjustment(createDefaultProposal(), 7.5, 5))).toEqual({ bids: [0.47], asks: [0.53] });
  });

  test("should cap the multiplier at 2", () => {
    expect(prices(applyVolAdjustment(createDefaultProposal(), 50, 5))).toEqual({ bids: [0.46], asks: [0.54] });
  });
});

describe("applyEventRisk", () => {
  test("should widen by the configured percentage on warning", () => {
    expect(prices(applyEventRisk(createDefaultProposal(), true, 50))).toEqual({ bids: [0.47], asks: [0.53] });
  });

  test("should do nothing without a warning", () => {
    expect(prices(applyEventRisk(createDefaultProposal(), false, 50))).toEqual({ bids: [0.48], asks: [0.52] });
  });
});

describe("applyBudgetConstraint", () => {
  test("should keep everything that fits", () => {
    const proposal = applyBudgetConstraint(createDefaultProposal(), 100);
    expect(proposal.bids).toHaveLength(1);
    expect(proposal.asks).toHaveLength(1);
  });

  test("should shrink the first order that does not fit", () => {
    // bid costs 4.8 > 3 -> 3 / 0.48 = 6.25 shares, rounded to 6.3
    const proposal = applyBudgetConstraint(createDefaultProposal(), 3);

    expect(proposal.bids.map(o => o.size)).toEqual([6.3]);
    expect(proposal.asks).toEqual([]);
  });

  test("should drop orders that would shrink below the minimum viable size", () => {
    const proposal = applyBudgetConstraint(createDefaultProposal(), 2);
    expect(proposal.bids).toEqual([]);
    expect(proposal.asks).toEqual([]);
  });

  test("should cost asks at (1 - price)", () => {
    const askOnly = createBaseProposal({
      marketId: "m1",
      tokenId: "yes-1",
      bidPrice: 0,
      askPrice: 0.8,
      bidSize: 0,
      askSize: 10,
      mid: 0.78,
    });
    // 10 * 0.2 = 2 fits in 2.5
    expect(applyBudgetConstraint(askOnly, 2.5).asks.map(o => o.size)).toEqual([10]);
  });

  test("should clear the proposal when nothing is left", () => {
    const proposal = applyBudgetConstraint(createDefaultProposal(), 10, 10);
    expect(proposal.bids).toEqual([]);
    expect(proposal.asks).toEqual([]);
  });
});

describe("applyPostOnlyFilter", () => {
  test("should pull crossing orders one tick inside the book", () => {
    const proposal = createBaseProposal({
      marketId: "m1",
      tokenId: "yes-1",
      bidPrice: 0.55,
      askPrice: 0.45,
      bidSize: 10,
      askSize: 10,
      mid: 0.5,
    });

    expect(prices(applyPostOnlyFilter(proposal, 0.45, 0.55))).toEqual({ bids: [0.54], asks: [0.46] });
  });

  test("should ignore a side of the book that is empty", () => {
    const proposal = createBaseProposal({
      marketId: "m1",
      tokenId: "yes-1",
      bidPrice: 0.55,
      askPrice: 0.45,
      bidSize: 10,
      askSize: 10,
      mid: 0.5,
    });

    expect(prices(applyPostOnlyFilter(proposal, 0, 0))).toEqual({ bids: [0.55], asks: [0.45] });
  });
});

describe("runProposalPipeline", () => {
  test("should run post-only last so no stage can cross the book", () => {
    const crossBid: ProposalStage = p => ({ ...p, bids: p.bids.map(o => ({ ...o, price: 0.6 })) });

    const result = runProposalPipeline(createDefaultProposal(), [crossBid], { bestBid: 0.5, bestAsk: 0.55 });

    expect(prices(result)).toEqual({ bids: [0.54], asks: [0.52] });
  });

  test("should compose stages in order", () => {
    const stages: ProposalStage[] = [p => applyMultiLevel(p, 2, 1.5, 2), p => applyBudgetConstraint(p, 100)];

    const result = runProposalPipeline(createDefaultProposal(), stages, { bestBid: 0.47, bestAsk: 0.53 });

    expect(prices(result)).toEqual({ bids: [0.48, 0.47], asks: [0.52, 0.53] });
  });
});

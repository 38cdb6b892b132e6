/**
 * Quoter Unit Tests
 *
 * Runs against the paper venue; fills are driven with `fillOrder`.
 */

import { describe, expect, test } from "vitest";

import { PaperVenueAdapter } from "@outcome-mm/adapters";
import type { QuoteRecord } from "@outcome-mm/repositories";
import { LogLevel } from "@outcome-mm/utils";
import { withCapturedLogs } from "@outcome-mm/utils/testing";

import { Quoter, type QuoteRequest } from "../../src/services/quoter";

const createVenue = (yesHeld = 20) => {
  const venue = new PaperVenueAdapter({ initialBalance: 100 });
  venue.setBook("yes-1", { bestBid: 0.48, bestAsk: 0.52, bidDepth: 100, askDepth: 100, mid: 0.5, spread: 0.04 });
  venue.registerMarket({ conditionId: "cond-1", yesTokenId: "yes-1", noTokenId: "no-1" });
  if (yesHeld > 0) venue.setPosition("yes-1", yesHeld);
  return venue;
};

const request = (overrides: Partial<QuoteRequest> = {}): QuoteRequest => ({
  marketId: "m1",
  tokenId: "yes-1",
  bidPrice: 0.47,
  askPrice: 0.53,
  bidSize: 10,
  askSize: 10,
  placeBid: true,
  placeAsk: true,
  quotedMid: 0.5,
  ...overrides,
});

const quotedPair = async (quoter: Quoter) => {
  const pair = await quoter.placeQuotePair(request());
  if (!pair) throw new Error("expected a quote pair");
  return pair;
};

describe("Quoter", () => {
  describe("placeQuotePair", () => {
    test("should place both sides as LIVE orders", async () => {
      const quoter = new Quoter(createVenue(), { postOnly: true });

      const pair = await quotedPair(quoter);

      expect(pair.bidOrderId).toBe("paper_1");
      expect(pair.askOrderId).toBe("paper_2");
      expect(pair.bidState).toBe("LIVE");
      expect(pair.askState).toBe("LIVE");
      expect(pair.quotedMid).toBe(0.5);
    });

    test("should keep the side that was accepted when the other is rejected", async () => {
      const quoter = new Quoter(createVenue(), { postOnly: true });

      const pair = await withCapturedLogs(async logs => {
        const placed = await quoter.placeQuotePair(request({ bidPrice: 0.52 }));
        expect(logs.messages(LogLevel.INFO)).toEqual(["Quote placed (ASK-only)"]);
        return placed;
      });

      expect(pair?.bidOrderId).toBeNull();
      expect(pair?.bidState).toBe("CANCELLED");
      expect(pair?.askState).toBe("LIVE");
    });

    test("should return null and record the failure when no side is placed", async () => {
      const quoter = new Quoter(createVenue(0), { postOnly: true });

      const pair = await withCapturedLogs(async logs => {
        const placed = await quoter.placeQuotePair(request({ bidPrice: 0.52 }));
        expect(logs.messages(LogLevel.WARN)).toEqual(["Quote placement failed on every side"]);
        return placed;
      });

      expect(pair).toBeNull();
      const failure = quoter.getLastQuoteFailure();
      expect(failure?.bidError?.type).toBe("post_only_cross");
      expect(failure?.askError?.type).toBe("insufficient_balance");
    });

    test("should skip sides that are not wanted", async () => {
      const quoter = new Quoter(createVenue(), { postOnly: true });

      const pair = await quoter.placeQuotePair(request({ placeAsk: false }));

      expect(pair?.bidState).toBe("LIVE");
      expect(pair?.askOrderId).toBeNull();
      expect(pair?.askState).toBe("CANCELLED");
    });
  });

  describe("cancelQuotePair", () => {
    test("should cancel both open sides", async () => {
      const venue = createVenue();
      const quoter = new Quoter(venue, { postOnly: true });
      const pair = await quotedPair(quoter);

      const cancelled = await quoter.cancelQuotePair(pair);

      expect(cancelled).toBe(true);
      expect(pair.isTerminal).toBe(true);
      expect(venue.getOrder("paper_1")?.status).toBe("CANCELED");
    });

    test("should treat an order the venue no longer knows as cancelled", async () => {
      const venue = createVenue();
      const quoter = new Quoter(venue, { postOnly: true });
      const pair = await quotedPair(quoter);
      venue.failNext("cancelOrder", { type: "not_found", message: "gone" });

      expect(await quoter.cancelQuotePair(pair)).toBe(true);
      expect(pair.bidState).toBe("CANCELLED");
    });

    test("should leave a side open when its cancel fails", async () => {
      const venue = createVenue();
      const quoter = new Quoter(venue, { postOnly: true });
      const pair = await quotedPair(quoter);
      venue.failNext("cancelOrder", { type: "network", message: "timeout" });

      const cancelled = await withCapturedLogs(() => quoter.cancelQuotePair(pair));

      expect(cancelled).toBe(false);
      expect(pair.bidState).toBe("LIVE");
      expect(pair.askState).toBe("CANCELLED");
    });
  });

  describe("reconcileQuote", () => {
    test("should mark partial fills and report the fill once complete", async () => {
      const venue = createVenue();
      const quoter = new Quoter(venue, { postOnly: true });
      const pair = await quotedPair(quoter);

      venue.fillOrder("paper_1", 4);
      expect(await quoter.reconcileQuote(pair)).toEqual([]);
      expect(pair.bidState).toBe("PARTIAL");

      venue.fillOrder("paper_1");
      const fills = await quoter.reconcileQuote(pair);

      expect(fills).toEqual([{ side: "buy", orderId: "paper_1", price: 0.47, size: 10, fee: 0 }]);
      expect(pair.bidState).toBe("FILLED");
      expect(pair.askState).toBe("LIVE");
    });

    test("should not report the same fill twice", async () => {
      const venue = createVenue();
      const quoter = new Quoter(venue, { postOnly: true });
      const pair = await quotedPair(quoter);
      venue.fillOrder("paper_2");

      expect(await quoter.reconcileQuote(pair)).toHaveLength(1);
      expect(await quoter.reconcileQuote(pair)).toEqual([]);
      expect(await quoter.harvestLateFills(pair)).toEqual([]);
    });
  });

  describe("harvestLateFills", () => {
    test("should report size matched after a cancel, only once", async () => {
      const venue = createVenue();
      const quoter = new Quoter(venue, { postOnly: true });
      const pair = await quotedPair(quoter);
      await quoter.cancelQuotePair(pair);

      venue.fillOrder("paper_1", 3);
      const fills = await withCapturedLogs(() => quoter.harvestLateFills(pair));

      expect(fills).toEqual([{ side: "buy", orderId: "paper_1", price: 0.47, size: 3, fee: 0 }]);
      expect(pair.bidState).toBe("CANCELLED");
      expect(await quoter.harvestLateFills(pair)).toEqual([]);
    });
  });

  describe("requotePreservingHanging", () => {
    test("should keep a side whose price barely moved and reprice the other", async () => {
      const venue = createVenue();
      const quoter = new Quoter(venue, { postOnly: true });
      const pair = await quotedPair(quoter);

      const next = await quoter.requotePreservingHanging(pair, request({ bidPrice: 0.472, askPrice: 0.55 }));

      expect(next?.bidOrderId).toBe("paper_1");
      expect(next?.bidPrice).toBe(0.47);
      expect(next?.askOrderId).toBe("paper_3");
      expect(next?.askPrice).toBe(0.55);
      expect(venue.getOrder("paper_2")?.status).toBe("CANCELED");
    });

    test("should keep a partially filled side even when the target moved", async () => {
      const venue = createVenue();
      const quoter = new Quoter(venue, { postOnly: true });
      const pair = await quotedPair(quoter);
      venue.fillOrder("paper_1", 4);
      await quoter.reconcileQuote(pair);

      const next = await quoter.requotePreservingHanging(pair, request({ bidPrice: 0.4 }));

      expect(next?.bidOrderId).toBe("paper_1");
      expect(next?.bidState).toBe("PARTIAL");
      expect(next?.bidPrice).toBe(0.47);
    });
  });

  describe("failed cancels during a requote", () => {
    test("should carry a side whose cancel failed instead of placing a replacement", async () => {
      const venue = createVenue();
      const quoter = new Quoter(venue, { postOnly: true });
      const pair = await quotedPair(quoter);
      venue.failNext("cancelOrder", { type: "network", message: "timeout" });

      const next = await withCapturedLogs(() => quoter.requotePreservingHanging(pair, request({ bidPrice: 0.44 })));

      expect(next?.bidOrderId).toBe("paper_1");
      expect(next?.bidPrice).toBe(0.47);
      expect(next?.askOrderId).toBe("paper_2");
      expect(venue.getOrder("paper_1")?.status).toBe("LIVE");

      const openBuys = (await venue.getOpenOrders())._unsafeUnwrap().filter(o => o.side === "buy");
      expect(openBuys.map(o => o.orderId)).toEqual(["paper_1"]);
    });

    test("should still report fills on the carried order", async () => {
      const venue = createVenue();
      const quoter = new Quoter(venue, { postOnly: true });
      const pair = await quotedPair(quoter);
      venue.failNext("cancelOrder", { type: "network", message: "timeout" });
      const next = await withCapturedLogs(() => quoter.requotePreservingHanging(pair, request({ bidPrice: 0.44 })));
      if (!next) throw new Error("expected a pair");

      venue.fillOrder("paper_1");
      const fills = await quoter.reconcileQuote(next);

      expect(fills).toEqual([{ side: "buy", orderId: "paper_1", price: 0.47, size: 10, fee: 0 }]);
    });

    test("should carry the failed side on a plain requote and replace the other", async () => {
      const venue = createVenue();
      const quoter = new Quoter(venue, { postOnly: true });
      const pair = await quotedPair(quoter);
      venue.failNext("cancelOrder", { type: "network", message: "timeout" });

      const next = await withCapturedLogs(() => quoter.requote(pair, request({ bidPrice: 0.44, askPrice: 0.56 })));

      expect(next?.bidOrderId).toBe("paper_1");
      expect(next?.bidPrice).toBe(0.47);
      expect(next?.askOrderId).toBe("paper_3");
      expect(next?.askPrice).toBe(0.56);
      expect(venue.getOrder("paper_2")?.status).toBe("CANCELED");
    });
  });

  describe("release", () => {
    test("should forget a filled order once the fill is reported", async () => {
      const venue = createVenue();
      const quoter = new Quoter(venue, { postOnly: true });
      const pair = await quotedPair(quoter);
      venue.fillOrder("paper_2");

      await quoter.reconcileQuote(pair);

      expect(quoter.trackedOrderCount()).toBe(0);
    });

    test("should drop partial fill bookkeeping when the pair is released", async () => {
      const venue = createVenue();
      const quoter = new Quoter(venue, { postOnly: true });
      const pair = await quotedPair(quoter);
      venue.fillOrder("paper_1", 4);
      await quoter.cancelQuotePair(pair);

      expect(await withCapturedLogs(() => quoter.harvestLateFills(pair))).toHaveLength(1);
      expect(quoter.trackedOrderCount()).toBe(1);

      quoter.release(pair);

      expect(quoter.trackedOrderCount()).toBe(0);
    });

    test("should keep bookkeeping for orders carried into the next pair", async () => {
      const venue = createVenue();
      const quoter = new Quoter(venue, { postOnly: true });
      const pair = await quotedPair(quoter);
      venue.fillOrder("paper_1", 4);
      await quoter.cancelQuotePair(pair);
      await withCapturedLogs(() => quoter.harvestLateFills(pair));

      quoter.release(pair, pair);

      expect(quoter.trackedOrderCount()).toBe(1);
    });
  });

  describe("rebuildActiveQuotes", () => {
    const record = (overrides: Partial<QuoteRecord>): QuoteRecord => ({
      id: 1,
      marketId: "m1",
      tokenId: "yes-1",
      noTokenId: "no-1",
      conditionId: "cond-1",
      bidPrice: 0.47,
      askPrice: 0.53,
      bidSize: 10,
      askSize: 10,
      bidOrderId: null,
      askOrderId: null,
      midPrice: 0.5,
      status: "active",
      levels: 1,
      createdAt: new Date(0),
      updatedAt: new Date(0),
      ...overrides,
    });

    test("should restore open orders, close stale rows and cancel orphans", async () => {
      const venue = createVenue();
      const quoter = new Quoter(venue, { postOnly: true });
      await quotedPair(quoter);
      await venue.placeLimitOrder({ tokenId: "yes-1", side: "buy", price: 0.3, size: 5, orderType: "GTC", postOnly: true });
      venue.fillOrder("paper_1", 2);

      const restarted = new Quoter(venue, { postOnly: true });
      const result = await withCapturedLogs(() =>
        restarted.rebuildActiveQuotes([
          record({ id: 7, bidOrderId: "paper_1", askOrderId: "paper_2" }),
          record({ id: 8, marketId: "m2", bidOrderId: "gone-1" }),
        ]),
      );

      const outcome = result._unsafeUnwrap();
      const pair = outcome.pairs.get("m1");
      expect(pair?.dbId).toBe(7);
      expect(pair?.bidState).toBe("PARTIAL");
      expect(pair?.askState).toBe("LIVE");
      expect(outcome.staleQuoteIds).toEqual([8]);
      expect(outcome.orphansCancelled).toBe(1);
      expect(venue.getOrder("paper_3")?.status).toBe("CANCELED");
    });

    test("should fail when open orders cannot be listed", async () => {
      const venue = createVenue();
      venue.failNext("getOpenOrders", { type: "network", message: "down" });
      const quoter = new Quoter(venue, { postOnly: true });

      const result = await quoter.rebuildActiveQuotes([record({ bidOrderId: "paper_1" })]);

      expect(result._unsafeUnwrapErr().type).toBe("network");
    });
  });
});

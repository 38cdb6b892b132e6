/**
 * Quote Calculator Unit Tests
 */

import { describe, expect, test } from "vitest";

import {
  computeBidAsk,
  computeDynamicDelta,
  computeQuoteSize,
  computeSkew,
  computeWeightedMid,
  roundToTick,
  shouldRequote,
} from "../src/quote-calculator";

describe("roundToTick", () => {
  test("should round half up to 0.01", () => {
    expect(roundToTick(0.555)).toBe(0.56);
    expect(roundToTick(0.554)).toBe(0.55);
    expect(roundToTick(0.5)).toBe(0.5);
  });
});

describe("computeWeightedMid", () => {
  test("should pull mid toward the ask when bid depth is heavier", () => {
    // wBid = 100/400, wAsk = 300/400 -> 0.25 * 0.4 + 0.75 * 0.6
    const mid = computeWeightedMid({ bestBid: 0.4, bestAsk: 0.6, bidDepth: 300, askDepth: 100 });
    expect(mid).toBeCloseTo(0.55, 10);
  });

  test("should fall back to simple mid when depths are zero", () => {
    expect(computeWeightedMid({ bestBid: 0.4, bestAsk: 0.6, bidDepth: 0, askDepth: 0 })).toBe(0.5);
  });

  test("should return null for an empty or crossed book", () => {
    expect(computeWeightedMid({ bestBid: 0, bestAsk: 0.6, bidDepth: 10, askDepth: 10 })).toBeNull();
    expect(computeWeightedMid({ bestBid: 0.6, bestAsk: 0.6, bidDepth: 10, askDepth: 10 })).toBeNull();
    expect(computeWeightedMid({ bestBid: 0.7, bestAsk: 0.6, bidDepth: 10, askDepth: 10 })).toBeNull();
  });
});

describe("computeDynamicDelta", () => {
  test("should combine vol, imbalance, staleness and fee buffer", () => {
    // 0.3 * 10 + 0.2 * 0.5 * 10 + 0.3 * 1 * 5 + 0.2 * 1 = 3 + 1 + 1.5 + 0.2
    const delta = computeDynamicDelta({ volShort: 10, bookImbalance: -0.5, staleRisk: 1 });
    expect(delta).toBeCloseTo(5.7, 10);
  });

  test("should clamp to deltaMin for a calm book", () => {
    // 0.3 * 2 + 0.2 = 0.8 -> 1.5
    expect(computeDynamicDelta({ volShort: 2, bookImbalance: 0, staleRisk: 0 })).toBe(1.5);
  });

  test("should clamp to deltaMax", () => {
    expect(computeDynamicDelta({ volShort: 100, bookImbalance: 1, staleRisk: 1 })).toBe(8);
    expect(
      computeDynamicDelta({ volShort: 100, bookImbalance: 1, staleRisk: 1, deltaMin: 2, deltaMax: 6, trackedVol: 50 }),
    ).toBe(6);
  });

  test("should prefer tracked vol when positive", () => {
    // 0.3 * 20 + 0.2 = 6.2
    expect(computeDynamicDelta({ volShort: 2, bookImbalance: 0, staleRisk: 0, trackedVol: 20 })).toBeCloseTo(6.2, 10);
    expect(computeDynamicDelta({ volShort: 10, bookImbalance: 0, staleRisk: 0, trackedVol: 0 })).toBeCloseTo(3.2, 10);
  });
});

describe("computeSkew", () => {
  test("should be zero without inventory or capacity", () => {
    expect(computeSkew(0, 100)).toBe(0);
    expect(computeSkew(50, 0)).toBe(0);
  });

  test("should shift quotes down when long", () => {
    // r = 0.5: -0.25 - 0.25 * 0.3
    expect(computeSkew(50, 100)).toBeCloseTo(-0.325, 10);
  });

  test("should be symmetric for short inventory", () => {
    expect(computeSkew(-50, 100)).toBeCloseTo(0.325, 10);
  });

  test("should clamp the ratio to [-1, 1]", () => {
    expect(computeSkew(200, 100)).toBeCloseTo(-0.8, 10);
    expect(computeSkew(200, 100)).toBeCloseTo(computeSkew(100, 100), 10);
  });
});

describe("computeBidAsk", () => {
  test("should place quotes delta points around mid", () => {
    expect(computeBidAsk(0.5, 2)).toEqual({ bid: 0.48, ask: 0.52 });
  });

  test("should shift both quotes by skew", () => {
    expect(computeBidAsk(0.5, 2, -1)).toEqual({ bid: 0.47, ask: 0.51 });
  });

  test("should re-separate quotes that collapse after rounding", () => {
    // 0.498 and 0.502 both round to 0.50
    expect(computeBidAsk(0.5, 0.2)).toEqual({ bid: 0.49, ask: 0.51 });
  });

  test("should clamp to the valid price range", () => {
    expect(computeBidAsk(0.99, 2)).toEqual({ bid: 0.97, ask: 0.99 });
  });
});

describe("computeQuoteSize", () => {
  test("should take the smallest constraint", () => {
    expect(
      computeQuoteSize({ capital: 100, maxPerMarket: 20, currentInventoryUsdc: 0, maxInventory: 20, baseSizeUsd: 5 }),
    ).toBe(5);
    // 10% of capital
    expect(
      computeQuoteSize({ capital: 30, maxPerMarket: 20, currentInventoryUsdc: 0, maxInventory: 20, baseSizeUsd: 5 }),
    ).toBe(3);
  });

  test("should return 0 at capacity", () => {
    expect(computeQuoteSize({ capital: 100, maxPerMarket: 20, currentInventoryUsdc: 20, maxInventory: 20 })).toBe(0);
  });
});

describe("shouldRequote", () => {
  test("should requote when there is no current quote", () => {
    expect(shouldRequote(null, 0.5)).toBe(true);
  });

  test("should compare against the quoted mid", () => {
    const pair = { quotedMid: 0.5, mid: 0.6 };
    expect(shouldRequote(pair, 0.504)).toBe(false);
    expect(shouldRequote(pair, 0.506)).toBe(true);
  });

  test("should fall back to the pair mid when quotedMid is unset", () => {
    expect(shouldRequote({ quotedMid: 0, mid: 0.6 }, 0.5)).toBe(true);
    expect(shouldRequote({ quotedMid: 0, mid: 0.5 }, 0.502)).toBe(false);
  });
});

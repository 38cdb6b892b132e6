/**
 * Market catalog Unit Tests
 */

import { fileURLToPath } from "node:url";

import { describe, expect, test } from "vitest";

import { loadMarketCatalog, parseMarketCatalog, toBookSummary, toCandidate } from "../../src/market-catalog";

const EXAMPLE_FILE = fileURLToPath(new URL("../../config/markets.example.json", import.meta.url));

describe("parseMarketCatalog", () => {
  test("should accept markets with and without books", () => {
    const catalog = parseMarketCatalog({
      markets: [
        { marketId: "m1", tokenId: "yes-1", book: { bestBid: 0.4, bestAsk: 0.46 } },
        { marketId: "m2", tokenId: "yes-2", noTokenId: "no-2", conditionId: "cond-2" },
      ],
    })._unsafeUnwrap();

    expect(catalog.markets).toHaveLength(2);
    expect(catalog.markets[0]?.book).toEqual({ bestBid: 0.4, bestAsk: 0.46, bidDepth: 100, askDepth: 100 });
  });

  test("should reject a crossed book", () => {
    const result = parseMarketCatalog({
      markets: [{ marketId: "m1", tokenId: "yes-1", book: { bestBid: 0.5, bestAsk: 0.5 } }],
    });

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "INVALID_CATALOG",
      message: "markets.0.book: bestBid must be below bestAsk",
    });
  });

  test("should reject duplicate market ids", () => {
    const result = parseMarketCatalog({
      markets: [
        { marketId: "m1", tokenId: "yes-1" },
        { marketId: "m1", tokenId: "yes-2" },
      ],
    });

    expect(result._unsafeUnwrapErr().message).toBe("duplicate marketId m1");
  });
});

describe("toBookSummary", () => {
  test("should derive mid, spread and imbalance", () => {
    expect(toBookSummary({ bestBid: 0.41, bestAsk: 0.47, bidDepth: 300, askDepth: 100 })).toEqual({
      bestBid: 0.41,
      bestAsk: 0.47,
      bidDepth: 300,
      askDepth: 100,
      mid: 0.44,
      spread: 0.06,
      imbalance: 0.5,
      minOrderSize: undefined,
    });
  });
});

describe("loadMarketCatalog", () => {
  test("should load the example catalog", async () => {
    const catalog = (await loadMarketCatalog(EXAMPLE_FILE))._unsafeUnwrap();
    const first = catalog.markets[0];

    expect(catalog.markets).toHaveLength(3);
    expect(first && toCandidate(first)).toEqual({
      marketId: "rain-in-lisbon-next-monday",
      tokenId: "yes-rain-lisbon",
      noTokenId: "no-rain-lisbon",
      conditionId: "cond-rain-lisbon",
      daysToResolution: 6,
      question: "Will it rain in Lisbon next Monday?",
    });
  });

  test("should report a missing file", async () => {
    const result = await loadMarketCatalog("/nonexistent/markets.json");

    expect(result._unsafeUnwrapErr().type).toBe("READ_FAILED");
  });
});

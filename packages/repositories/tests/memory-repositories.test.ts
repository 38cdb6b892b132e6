/**
 * In-memory Repository Unit Tests
 */

import { describe, expect, it } from "vitest";

import { createInMemoryRepositories, type FillRecord, type NewQuoteRecord } from "../src";

const quote = (overrides: Partial<NewQuoteRecord> = {}): NewQuoteRecord => ({
  marketId: "m1",
  tokenId: "yes-1",
  noTokenId: "no-1",
  conditionId: "c1",
  bidPrice: 0.48,
  askPrice: 0.52,
  bidSize: 10,
  askSize: 10,
  bidOrderId: "b1",
  askOrderId: "a1",
  midPrice: 0.5,
  status: "active",
  levels: 1,
  ...overrides,
});

const fill = (overrides: Partial<FillRecord> = {}): FillRecord => ({
  ts: new Date("2026-01-01T10:00:00Z"),
  quoteId: 1,
  marketId: "m1",
  tokenId: "yes-1",
  orderId: "o1",
  leg: "yes",
  side: "buy",
  price: 0.48,
  size: 10,
  fee: 0,
  midAtFill: 0.5,
  realizedPnl: null,
  ...overrides,
});

describe("QuoteRepository (memory)", () => {
  it("should assign increasing ids and list only active quotes", async () => {
    const repos = createInMemoryRepositories();

    const first = (await repos.quotes.insertQuote(quote()))._unsafeUnwrap();
    const second = (await repos.quotes.insertQuote(quote({ marketId: "m2" })))._unsafeUnwrap();
    expect([first, second]).toEqual([1, 2]);

    await repos.quotes.updateQuoteStatus(first, "replaced");

    const active = (await repos.quotes.getActiveQuotes())._unsafeUnwrap();
    expect(active.map(q => q.id)).toEqual([2]);
  });

  it("should look quotes up by id", async () => {
    const repos = createInMemoryRepositories();
    await repos.quotes.insertQuote(quote());
    await repos.quotes.insertQuote(quote({ bidPrice: 0.4 }));

    const found = (await repos.quotes.getQuotesByIds([2, 99]))._unsafeUnwrap();
    expect(found).toHaveLength(1);
    expect(found[0]?.bidPrice).toBe(0.4);
  });
});

describe("FillRepository (memory)", () => {
  it("should ignore a second insert with the same order id", async () => {
    const repos = createInMemoryRepositories();
    await repos.fills.insertFill(fill());
    await repos.fills.insertFill(fill({ size: 99 }));

    const fills = (
      await repos.fills.listFillsBetween(new Date("2026-01-01T00:00:00Z"), new Date("2026-01-02T00:00:00Z"))
    )._unsafeUnwrap();
    expect(fills).toHaveLength(1);
    expect(fills[0]?.size).toBe(10);
  });

  it("should list fills in [from, to) oldest first", async () => {
    const repos = createInMemoryRepositories();
    await repos.fills.insertFill(fill({ orderId: "late", ts: new Date("2026-01-01T12:00:00Z") }));
    await repos.fills.insertFill(fill({ orderId: "early", ts: new Date("2026-01-01T08:00:00Z") }));
    await repos.fills.insertFill(fill({ orderId: "next-day", ts: new Date("2026-01-02T00:00:00Z") }));

    const fills = (
      await repos.fills.listFillsBetween(new Date("2026-01-01T00:00:00Z"), new Date("2026-01-02T00:00:00Z"))
    )._unsafeUnwrap();
    expect(fills.map(f => f.orderId)).toEqual(["early", "late"]);
  });
});

describe("InventoryRepository (memory)", () => {
  it("should keep one row per market and token", async () => {
    const repos = createInMemoryRepositories();
    const row = { marketId: "m1", tokenId: "yes-1", leg: "yes" as const, position: 10, avgEntry: 0.5, realizedPnl: 0 };
    await repos.inventory.upsertInventory(row);
    await repos.inventory.upsertInventory({ ...row, position: 4 });
    await repos.inventory.upsertInventory({ ...row, tokenId: "no-1", leg: "no", position: 2 });

    const rows = (await repos.inventory.listInventory())._unsafeUnwrap();
    expect(rows.map(r => [r.tokenId, r.position])).toEqual([
      ["yes-1", 4],
      ["no-1", 2],
    ]);
  });
});

describe("HighWaterMarkRepository (memory)", () => {
  it("should be null until set", async () => {
    const repos = createInMemoryRepositories();
    expect((await repos.highWaterMark.getHighWaterMark())._unsafeUnwrap()).toBeNull();

    await repos.highWaterMark.setHighWaterMark(1250);
    expect((await repos.highWaterMark.getHighWaterMark())._unsafeUnwrap()).toBe(1250);
  });
});

describe("DailyMetricsRepository (memory)", () => {
  it("should upsert per date and list newest first", async () => {
    const repos = createInMemoryRepositories();
    const day = {
      date: "2026-01-01",
      fillsCount: 2,
      roundTrips: 1,
      grossPnl: 1,
      netPnl: 0.9,
      totalFees: 0.1,
      spreadCaptureRate: 0.5,
      avgFillQualityBps: null,
      portfolioValue: 1000,
      dailyReturnPct: null,
      sharpe: null,
      profitFactor: null,
    };
    await repos.dailyMetrics.upsertDailyMetrics(day);
    await repos.dailyMetrics.upsertDailyMetrics({ ...day, date: "2026-01-03" });
    await repos.dailyMetrics.upsertDailyMetrics({ ...day, date: "2026-01-02" });
    await repos.dailyMetrics.upsertDailyMetrics({ ...day, fillsCount: 5 });

    const recent = (await repos.dailyMetrics.listRecentDailyMetrics(2))._unsafeUnwrap();
    expect(recent.map(d => d.date)).toEqual(["2026-01-03", "2026-01-02"]);

    const all = (await repos.dailyMetrics.listRecentDailyMetrics(10))._unsafeUnwrap();
    expect(all.find(d => d.date === "2026-01-01")?.fillsCount).toBe(5);
  });
});

describe("BotStatusRepository (memory)", () => {
  it("should store and overwrite keys", async () => {
    const repos = createInMemoryRepositories();
    await repos.botStatus.setStatus({ risk_mode: "ok", active_markets: "3" });
    await repos.botStatus.setStatus({ risk_mode: "reduce" });

    expect((await repos.botStatus.getStatus("risk_mode"))._unsafeUnwrap()).toBe("reduce");
    expect((await repos.botStatus.getStatus("active_markets"))._unsafeUnwrap()).toBe("3");
    expect((await repos.botStatus.getStatus("missing"))._unsafeUnwrap()).toBeNull();
  });
});

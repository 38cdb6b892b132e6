/**
 * Inventory Math Unit Tests
 */

import { describe, expect, test } from "vitest";

import {
  applyFill,
  applyInventoryFill,
  applyMerge,
  applySplit,
  createEmptyInventory,
  inventoryExposure,
  mergeablePairs,
  positionAgeHours,
  toSnapshot,
  type LegState,
} from "../src/inventory-math";

const flat = (): LegState => ({ position: 0, avgEntry: 0, realizedPnl: 0 });

describe("applyFill", () => {
  test("should open a long at the fill price", () => {
    expect(applyFill(flat(), "buy", 0.5, 10)).toEqual({ position: 10, avgEntry: 0.5, realizedPnl: 0 });
  });

  test("should re-average cost when adding to a long", () => {
    const leg = applyFill(applyFill(flat(), "buy", 0.5, 10), "buy", 0.7, 10);
    expect(leg).toEqual({ position: 20, avgEntry: 0.6, realizedPnl: 0 });
  });

  test("should realize P&L on a round trip", () => {
    const leg = applyFill(applyFill(flat(), "buy", 0.5, 10), "sell", 0.6, 10);

    expect(leg.position).toBe(0);
    expect(leg.realizedPnl).toBe(1);
  });

  test("should realize a loss on a partial close", () => {
    const leg = applyFill(applyFill(flat(), "buy", 0.6, 10), "sell", 0.45, 4);
    expect(leg).toEqual({ position: 6, avgEntry: 0.6, realizedPnl: -0.6 });
  });

  test("should average into a short", () => {
    const leg = applyFill(applyFill(flat(), "sell", 0.6, 10), "sell", 0.4, 10);
    expect(leg).toEqual({ position: -20, avgEntry: 0.5, realizedPnl: 0 });
  });

  test("should realize (avg - price) when covering a short", () => {
    const leg = applyFill(applyFill(flat(), "sell", 0.6, 10), "buy", 0.5, 10);
    expect(leg.position).toBe(0);
    expect(leg.realizedPnl).toBe(1);
  });

  test("should re-base the average when crossing zero", () => {
    // closes 10 long at +0.1 each, opens 5 short at 0.6
    const leg = applyFill(applyFill(flat(), "buy", 0.5, 10), "sell", 0.6, 15);
    expect(leg).toEqual({ position: -5, avgEntry: 0.6, realizedPnl: 1 });
  });

  test("should re-base on re-entry after going flat", () => {
    let leg = applyFill(flat(), "buy", 0.5, 10);
    leg = applyFill(leg, "sell", 0.6, 10);
    leg = applyFill(leg, "buy", 0.3, 5);

    expect(leg).toEqual({ position: 5, avgEntry: 0.3, realizedPnl: 1 });
  });
});

describe("applyInventoryFill", () => {
  test("should update only the filled leg and record the token", () => {
    const inv = applyInventoryFill(
      createEmptyInventory("m1", 0),
      { tokenId: "no-1", side: "buy", price: 0.4, size: 10, leg: "no" },
      1_000,
    );

    expect(inv.noTokenId).toBe("no-1");
    expect(inv.noPosition).toBe(10);
    expect(inv.noAvgEntry).toBe(0.4);
    expect(inv.yesPosition).toBe(0);
    expect(inv.updatedAtMs).toBe(1_000);
  });

  test("should set openedAt on the first buy and clear it when flat", () => {
    let inv = createEmptyInventory("m1", 0);
    inv = applyInventoryFill(inv, { tokenId: "yes-1", side: "buy", price: 0.5, size: 10, leg: "yes" }, 1_000);
    expect(inv.openedAtMs).toBe(1_000);

    inv = applyInventoryFill(inv, { tokenId: "yes-1", side: "buy", price: 0.5, size: 10, leg: "yes" }, 2_000);
    expect(inv.openedAtMs).toBe(1_000);

    inv = applyInventoryFill(inv, { tokenId: "yes-1", side: "sell", price: 0.5, size: 20, leg: "yes" }, 3_000);
    expect(inv.openedAtMs).toBeNull();
  });

  test("should leave the input untouched", () => {
    const inv = createEmptyInventory("m1", 0);
    applyInventoryFill(inv, { tokenId: "yes-1", side: "buy", price: 0.5, size: 10, leg: "yes" }, 1_000);
    expect(inv.yesPosition).toBe(0);
  });
});

describe("merge and split", () => {
  test("should split into both legs with a 0.50 basis", () => {
    const inv = applySplit(createEmptyInventory("m1", 0), 20, "yes-1", "no-1", 1_000);

    expect(inv.yesPosition).toBe(20);
    expect(inv.noPosition).toBe(20);
    expect(inv.yesAvgEntry).toBe(0.5);
    expect(inv.noAvgEntry).toBe(0.5);
    expect(mergeablePairs(inv)).toBe(20);
  });

  test("should keep an existing basis on split", () => {
    const bought = applyInventoryFill(
      createEmptyInventory("m1", 0),
      { tokenId: "yes-1", side: "buy", price: 0.7, size: 10, leg: "yes" },
      0,
    );
    const inv = applySplit(bought, 5, "yes-1", "no-1", 0);

    expect(inv.yesAvgEntry).toBe(0.7);
    expect(inv.noAvgEntry).toBe(0.5);
  });

  test("should merge when both legs cover the amount", () => {
    const inv = applySplit(createEmptyInventory("m1", 0), 20, "yes-1", "no-1", 0);
    const merged = applyMerge(inv, 15, 1_000);

    expect(merged.isOk()).toBe(true);
    merged.map(m => {
      expect(m.yesPosition).toBe(5);
      expect(m.noPosition).toBe(5);
    });
  });

  test("should fail without side effects when a leg is short", () => {
    const inv = applySplit(createEmptyInventory("m1", 0), 10, "yes-1", "no-1", 0);
    const merged = applyMerge(inv, 15, 1_000);

    expect(merged.isErr()).toBe(true);
    merged.mapErr(e => {
      expect(e.type).toBe("INSUFFICIENT_PAIRS");
      expect(e.requested).toBe(15);
    });
    expect(inv.yesPosition).toBe(10);
  });

  test("should report no mergeable pairs unless both legs are long", () => {
    expect(mergeablePairs({ yesPosition: 10, noPosition: 0 })).toBe(0);
    expect(mergeablePairs({ yesPosition: -5, noPosition: 10 })).toBe(0);
    expect(mergeablePairs({ yesPosition: 7, noPosition: 10 })).toBe(7);
  });
});

describe("reporting helpers", () => {
  test("should compute position age in hours", () => {
    const inv = applyInventoryFill(
      createEmptyInventory("m1", 0),
      { tokenId: "yes-1", side: "buy", price: 0.5, size: 10, leg: "yes" },
      0,
    );
    expect(positionAgeHours(inv, 7_200_000)).toBe(2);
    expect(positionAgeHours(createEmptyInventory("m2", 0), 7_200_000)).toBe(0);
  });

  test("should value exposure at average entry", () => {
    const inv = applySplit(createEmptyInventory("m1", 0), 10, "yes-1", "no-1", 0);
    expect(inventoryExposure(inv)).toBe(10);
  });

  test("should sum both legs' realized P&L in the snapshot", () => {
    let inv = createEmptyInventory("m1", 0);
    inv = applyInventoryFill(inv, { tokenId: "yes-1", side: "buy", price: 0.5, size: 10, leg: "yes" }, 0);
    inv = applyInventoryFill(inv, { tokenId: "yes-1", side: "sell", price: 0.6, size: 10, leg: "yes" }, 0);
    inv = applyInventoryFill(inv, { tokenId: "no-1", side: "buy", price: 0.4, size: 5, leg: "no" }, 0);
    inv = applyInventoryFill(inv, { tokenId: "no-1", side: "sell", price: 0.5, size: 5, leg: "no" }, 0);

    expect(toSnapshot(inv)).toEqual({
      marketId: "m1",
      yesTokenId: "yes-1",
      noTokenId: "no-1",
      yesPosition: 0,
      noPosition: 0,
      yesAvgEntry: 0.5,
      noAvgEntry: 0.4,
      realizedPnl: 1.5,
      mergeablePairs: 0,
    });
  });
});

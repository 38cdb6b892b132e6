/**
 * Inventory Ledger - In-memory YES/NO inventory per market
 *
 * - Fills, merges and splits update memory through the pure inventory math in core
 * - The persisted store is the source of truth: `reconcileWithStore` corrects
 *   memory towards it and reports every divergence
 *
 * Owned by the market-making cycle; not safe to mutate from two loops.
 */

import type { Result } from "neverthrow";

import {
  applyInventoryFill,
  applyMerge,
  applySplit,
  createEmptyInventory,
  getLeg,
  inventoryExposure,
  isFlat,
  mergeablePairs,
  positionAgeHours,
  toSnapshot,
  type InventoryError,
  type InventorySnapshot,
  type Leg,
  type MarketInventory,
  type Ms,
  type Price,
  type Shares,
  type Side,
  type Usdc,
} from "@outcome-mm/core";
import type { InventoryRecord } from "@outcome-mm/repositories";
import { logger } from "@outcome-mm/utils";

/** Position differences at or below this are not divergences */
export const RECONCILE_TOLERANCE: Shares = 0.1;

export interface InventoryDivergence {
  marketId: string;
  tokenId: string;
  leg: Leg;
  memoryPosition: Shares;
  storePosition: Shares;
}

export interface InventoryLedgerOptions {
  /** Share of the per-market budget above which `needsUnwind` fires */
  unwindThreshold: number;
  clock?: () => Ms;
}

export class InventoryLedger {
  private readonly inventories = new Map<string, MarketInventory>();
  private readonly unwindThreshold: number;
  private readonly clock: () => Ms;

  constructor(options: InventoryLedgerOptions) {
    this.unwindThreshold = options.unwindThreshold;
    this.clock = options.clock ?? Date.now;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Mutations
  // ───────────────────────────────────────────────────────────────────────────

  processFill(marketId: string, tokenId: string, side: Side, price: Price, size: Shares, leg: Leg = "yes"): MarketInventory {
    const next = applyInventoryFill(this.get(marketId), { tokenId, side, price, size, leg }, this.clock());
    this.inventories.set(marketId, next);

    logger.debug("Inventory fill", {
      marketId,
      leg,
      side,
      price,
      size,
      position: getLeg(next, leg).position,
    });
    return next;
  }

  processMerge(marketId: string, amount: Shares): Result<MarketInventory, InventoryError> {
    return applyMerge(this.get(marketId), amount, this.clock()).map(next => {
      this.inventories.set(marketId, next);
      logger.info("Inventory merge", { marketId, amount, yes: next.yesPosition, no: next.noPosition });
      return next;
    });
  }

  processSplit(marketId: string, amount: Usdc, yesTokenId: string, noTokenId: string): MarketInventory {
    const next = applySplit(this.get(marketId), amount, yesTokenId, noTokenId, this.clock());
    this.inventories.set(marketId, next);

    logger.info("Inventory split", { marketId, amount, yes: next.yesPosition, no: next.noPosition });
    return next;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Inventory of a market; an unknown market starts empty
   */
  get(marketId: string): MarketInventory {
    const existing = this.inventories.get(marketId);
    if (existing) return existing;

    const created = createEmptyInventory(marketId, this.clock());
    this.inventories.set(marketId, created);
    return created;
  }

  has(marketId: string): boolean {
    return this.inventories.has(marketId);
  }

  getTotalExposure(): Usdc {
    let total = 0;
    for (const inv of this.inventories.values()) {
      total += inventoryExposure(inv);
    }
    return total;
  }

  getTotalRealizedPnl(): Usdc {
    let total = 0;
    for (const inv of this.inventories.values()) {
      total += inv.yesRealizedPnl + inv.noRealizedPnl;
    }
    return total;
  }

  /**
   * 0 for a fresh position, rising linearly to 1 at `maxHours`
   */
  getUnwindUrgency(marketId: string, maxHours = 24): number {
    const inv = this.inventories.get(marketId);
    if (!inv || maxHours <= 0) return 0;
    return Math.min(positionAgeHours(inv, this.clock()) / maxHours, 1);
  }

  needsUnwind(marketId: string, maxPerMarket: Usdc): boolean {
    return Math.abs(this.get(marketId).yesPosition) > maxPerMarket * this.unwindThreshold;
  }

  /**
   * Both legs valued at average entry (mid / 1 - mid when a leg has none)
   */
  isAtCapacity(marketId: string, maxPerMarket: Usdc, mid: Price = 0): boolean {
    const inv = this.get(marketId);
    const yesPrice = inv.yesAvgEntry > 0 ? inv.yesAvgEntry : mid;
    const noPrice = inv.noAvgEntry > 0 ? inv.noAvgEntry : mid > 0 ? 1 - mid : 0;
    const totalUsdc = Math.abs(inv.yesPosition) * yesPrice + Math.abs(inv.noPosition) * noPrice;
    return totalUsdc >= maxPerMarket;
  }

  /**
   * (YES value - NO value) / maxPerMarket; positive = long YES
   */
  getSkewDirection(marketId: string, maxPerMarket: Usdc): number {
    if (maxPerMarket <= 0) return 0;

    const inv = this.get(marketId);
    const yesValue = inv.yesPosition * (inv.yesAvgEntry > 0 ? inv.yesAvgEntry : 0.5);
    const noValue = inv.noPosition * (inv.noAvgEntry > 0 ? inv.noAvgEntry : 0.5);
    return (yesValue - noValue) / maxPerMarket;
  }

  getMergeAmount(marketId: string): Shares {
    return mergeablePairs(this.get(marketId));
  }

  /**
   * Snapshots of every market holding a position
   */
  getAllPositions(): InventorySnapshot[] {
    return [...this.inventories.values()].filter(inv => !isFlat(inv)).map(toSnapshot);
  }

  /**
   * Store rows for both legs of a market (a leg without a token id is skipped)
   */
  toRecords(marketId: string): InventoryRecord[] {
    const inv = this.get(marketId);
    const records: InventoryRecord[] = [];
    if (inv.yesTokenId !== "") {
      records.push({
        marketId,
        tokenId: inv.yesTokenId,
        leg: "yes",
        position: inv.yesPosition,
        avgEntry: inv.yesAvgEntry,
        realizedPnl: inv.yesRealizedPnl,
      });
    }
    if (inv.noTokenId !== "") {
      records.push({
        marketId,
        tokenId: inv.noTokenId,
        leg: "no",
        position: inv.noPosition,
        avgEntry: inv.noAvgEntry,
        realizedPnl: inv.noRealizedPnl,
      });
    }
    return records;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Store sync
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Replace memory with the stored rows, grouped by market
   */
  loadFromStore(records: readonly InventoryRecord[]): void {
    const nowMs = this.clock();
    const byMarket = new Map<string, MarketInventory>();

    for (const rec of records) {
      const inv = byMarket.get(rec.marketId) ?? createEmptyInventory(rec.marketId, nowMs);
      byMarket.set(rec.marketId, withStoredLeg(inv, rec));
    }

    for (const [marketId, inv] of byMarket) {
      const opened = inv.yesPosition > 0 || inv.noPosition > 0 ? nowMs : null;
      this.inventories.set(marketId, { ...inv, openedAtMs: opened });
    }

    logger.info("Loaded inventory from store", { markets: byMarket.size, records: records.length });
  }

  /**
   * Correct memory towards the store and report what differed
   *
   * A leg differs when |memory - store| > RECONCILE_TOLERANCE; the stored
   * position, average entry and realized P&L then replace the leg in memory.
   */
  reconcileWithStore(records: readonly InventoryRecord[]): InventoryDivergence[] {
    const divergences: InventoryDivergence[] = [];

    for (const rec of records) {
      const inv = this.get(rec.marketId);
      const memoryPosition = getLeg(inv, rec.leg).position;
      if (Math.abs(memoryPosition - rec.position) <= RECONCILE_TOLERANCE) continue;

      divergences.push({
        marketId: rec.marketId,
        tokenId: rec.tokenId,
        leg: rec.leg,
        memoryPosition,
        storePosition: rec.position,
      });
      this.inventories.set(rec.marketId, { ...withStoredLeg(inv, rec), updatedAtMs: this.clock() });

      logger.warn("Inventory divergence corrected", {
        marketId: rec.marketId,
        leg: rec.leg,
        memory: memoryPosition,
        store: rec.position,
      });
    }

    return divergences;
  }
}

function withStoredLeg(inv: MarketInventory, rec: InventoryRecord): MarketInventory {
  return rec.leg === "yes" ?
      {
        ...inv,
        yesTokenId: rec.tokenId,
        yesPosition: rec.position,
        yesAvgEntry: rec.avgEntry,
        yesRealizedPnl: rec.realizedPnl,
      }
    : {
        ...inv,
        noTokenId: rec.tokenId,
        noPosition: rec.position,
        noAvgEntry: rec.avgEntry,
        noRealizedPnl: rec.realizedPnl,
      };
}

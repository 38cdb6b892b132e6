/**
 * Inventory Math - weighted-average cost and realized P&L per leg
 *
 * Each leg (YES, NO) is a single signed position with one average entry:
 * - buy while flat/long: re-average cost
 * - sell while long: realize closed * (price - avg)
 * - sell while flat/short: average into the short
 * - buy while short: realize covered * (avg - price)
 * A fill that crosses through zero opens the remainder at the fill price.
 *
 * Arithmetic runs through decimal.js so realized P&L does not drift.
 * This module is pure (no I/O, no throw).
 */

import { Decimal } from "decimal.js";
import { err, ok, type Result } from "neverthrow";

import type { InventorySnapshot, Leg, MarketInventory, Ms, Price, Shares, Side, Usdc } from "./types";

/** Cost basis per token after splitting 1 USDC into a YES+NO pair */
export const SPLIT_COST_BASIS = 0.5;

/** Positions below this are treated as flat when reporting */
const REPORTING_EPSILON = 0.001;

export interface LegState {
  position: Shares;
  avgEntry: Price;
  realizedPnl: Usdc;
}

export interface InventoryError {
  type: "INSUFFICIENT_PAIRS";
  marketId: string;
  requested: Shares;
  yesPosition: Shares;
  noPosition: Shares;
  message: string;
}

export interface InventoryFill {
  tokenId: string;
  side: Side;
  price: Price;
  size: Shares;
  leg: Leg;
}

export function createEmptyInventory(marketId: string, nowMs: Ms, yesTokenId = "", noTokenId = ""): MarketInventory {
  return {
    marketId,
    yesTokenId,
    yesPosition: 0,
    yesAvgEntry: 0,
    yesRealizedPnl: 0,
    noTokenId,
    noPosition: 0,
    noAvgEntry: 0,
    noRealizedPnl: 0,
    openedAtMs: null,
    updatedAtMs: nowMs,
  };
}

/**
 * Apply one fill to a single leg
 */
export function applyFill(leg: LegState, side: Side, price: Price, size: Shares): LegState {
  const oldPos = new Decimal(leg.position);
  const fill = new Decimal(size);
  const px = new Decimal(price);
  const delta = side === "buy" ? fill : fill.negated();
  const newPos = oldPos.plus(delta);

  let avg = new Decimal(leg.avgEntry);
  let realized = new Decimal(leg.realizedPnl);

  if (delta.isPositive() && oldPos.gte(0)) {
    if (newPos.gt(0)) {
      avg = avg.times(oldPos).plus(px.times(delta)).div(newPos);
    }
  } else if (delta.isNegative() && oldPos.gt(0)) {
    const closed = Decimal.min(delta.abs(), oldPos);
    realized = realized.plus(closed.times(px.minus(avg)));
    if (newPos.lt(0)) avg = px;
  } else if (delta.isNegative() && oldPos.lte(0)) {
    if (newPos.lt(0)) {
      avg = avg.times(oldPos.abs()).plus(px.times(delta.abs())).div(newPos.abs());
    }
  } else if (delta.isPositive() && oldPos.lt(0)) {
    const covered = Decimal.min(delta, oldPos.abs());
    realized = realized.plus(covered.times(avg.minus(px)));
    if (newPos.gt(0)) avg = px;
  }

  return {
    position: newPos.toNumber(),
    avgEntry: avg.toNumber(),
    realizedPnl: realized.toNumber(),
  };
}

export function getLeg(inventory: MarketInventory, leg: Leg): LegState {
  return leg === "yes"
    ? { position: inventory.yesPosition, avgEntry: inventory.yesAvgEntry, realizedPnl: inventory.yesRealizedPnl }
    : { position: inventory.noPosition, avgEntry: inventory.noAvgEntry, realizedPnl: inventory.noRealizedPnl };
}

function withLeg(inventory: MarketInventory, leg: Leg, state: LegState): MarketInventory {
  return leg === "yes"
    ? { ...inventory, yesPosition: state.position, yesAvgEntry: state.avgEntry, yesRealizedPnl: state.realizedPnl }
    : { ...inventory, noPosition: state.position, noAvgEntry: state.avgEntry, noRealizedPnl: state.realizedPnl };
}

/**
 * Apply a fill to a market's inventory
 *
 * openedAt is set by the first buy that leaves the filled leg long, and
 * cleared once both legs are flat.
 */
export function applyInventoryFill(inventory: MarketInventory, fill: InventoryFill, nowMs: Ms): MarketInventory {
  const withToken: MarketInventory =
    fill.leg === "yes" ? { ...inventory, yesTokenId: fill.tokenId } : { ...inventory, noTokenId: fill.tokenId };

  const nextLeg = applyFill(getLeg(withToken, fill.leg), fill.side, fill.price, fill.size);
  const next = { ...withLeg(withToken, fill.leg, nextLeg), updatedAtMs: nowMs };

  if (fill.side === "buy" && nextLeg.position > 0 && next.openedAtMs === null) {
    next.openedAtMs = nowMs;
  }
  if (next.yesPosition === 0 && next.noPosition === 0) {
    next.openedAtMs = null;
  }
  return next;
}

/**
 * YES+NO pairs redeemable for 1 USDC each
 */
export function mergeablePairs(inventory: Pick<MarketInventory, "yesPosition" | "noPosition">): Shares {
  if (inventory.yesPosition > 0 && inventory.noPosition > 0) {
    return Math.min(inventory.yesPosition, inventory.noPosition);
  }
  return 0;
}

/**
 * Remove `amount` pairs from both legs; both must hold at least `amount`
 */
export function applyMerge(inventory: MarketInventory, amount: Shares, nowMs: Ms): Result<MarketInventory, InventoryError> {
  if (inventory.yesPosition < amount || inventory.noPosition < amount) {
    return err({
      type: "INSUFFICIENT_PAIRS",
      marketId: inventory.marketId,
      requested: amount,
      yesPosition: inventory.yesPosition,
      noPosition: inventory.noPosition,
      message: `Cannot merge ${amount} pairs: YES=${inventory.yesPosition}, NO=${inventory.noPosition}`,
    });
  }

  return ok({
    ...inventory,
    yesPosition: new Decimal(inventory.yesPosition).minus(amount).toNumber(),
    noPosition: new Decimal(inventory.noPosition).minus(amount).toNumber(),
    updatedAtMs: nowMs,
  });
}

/**
 * Add `amount` to both legs (1 USDC -> 1 YES + 1 NO)
 *
 * A leg without a cost basis gets 0.50.
 */
export function applySplit(
  inventory: MarketInventory,
  amount: Shares,
  yesTokenId: string,
  noTokenId: string,
  nowMs: Ms,
): MarketInventory {
  return {
    ...inventory,
    yesTokenId,
    noTokenId,
    yesPosition: new Decimal(inventory.yesPosition).plus(amount).toNumber(),
    noPosition: new Decimal(inventory.noPosition).plus(amount).toNumber(),
    yesAvgEntry: inventory.yesAvgEntry === 0 ? SPLIT_COST_BASIS : inventory.yesAvgEntry,
    noAvgEntry: inventory.noAvgEntry === 0 ? SPLIT_COST_BASIS : inventory.noAvgEntry,
    updatedAtMs: nowMs,
  };
}

export function positionAgeHours(inventory: MarketInventory, nowMs: Ms): number {
  if (inventory.openedAtMs === null || (inventory.yesPosition === 0 && inventory.noPosition === 0)) {
    return 0;
  }
  return (nowMs - inventory.openedAtMs) / 3_600_000;
}

/**
 * Absolute exposure at average entry, both legs
 */
export function inventoryExposure(inventory: MarketInventory): Usdc {
  const yes = inventory.yesAvgEntry > 0 ? Math.abs(inventory.yesPosition) * inventory.yesAvgEntry : 0;
  const no = inventory.noAvgEntry > 0 ? Math.abs(inventory.noPosition) * inventory.noAvgEntry : 0;
  return yes + no;
}

export function isFlat(inventory: MarketInventory): boolean {
  return Math.abs(inventory.yesPosition) <= REPORTING_EPSILON && Math.abs(inventory.noPosition) <= REPORTING_EPSILON;
}

function round4(value: number): number {
  return new Decimal(value).toDecimalPlaces(4).toNumber();
}

export function toSnapshot(inventory: MarketInventory): InventorySnapshot {
  return {
    marketId: inventory.marketId,
    yesTokenId: inventory.yesTokenId,
    noTokenId: inventory.noTokenId,
    yesPosition: round4(inventory.yesPosition),
    noPosition: round4(inventory.noPosition),
    yesAvgEntry: round4(inventory.yesAvgEntry),
    noAvgEntry: round4(inventory.noAvgEntry),
    realizedPnl: round4(inventory.yesRealizedPnl + inventory.noRealizedPnl),
    mergeablePairs: round4(mergeablePairs(inventory)),
  };
}

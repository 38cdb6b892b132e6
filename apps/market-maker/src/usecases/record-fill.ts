/**
 * Record Fill - externalize one detected fill
 *
 * ledger update -> fill row -> inventory rows -> kappa sample.
 * Store failures are logged; the in-memory ledger stays updated and the next
 * store reconciliation settles any gap.
 */

import type { DetectedFill, KappaEstimator, Ms, QuotePair } from "@outcome-mm/core";
import type { FillRepository, InventoryRepository } from "@outcome-mm/repositories";
import { logger } from "@outcome-mm/utils";

import type { InventoryLedger } from "../services/inventory-ledger";

export interface RecordFillDeps {
  ledger: InventoryLedger;
  fills: FillRepository;
  inventory: InventoryRepository;
  kappa: KappaEstimator;
  clock: () => Ms;
}

export async function recordFill(deps: RecordFillDeps, pair: QuotePair, fill: DetectedFill): Promise<void> {
  const { ledger, clock } = deps;
  const nowMs = clock();

  const before = ledger.get(pair.marketId).yesRealizedPnl;
  const after = ledger.processFill(pair.marketId, pair.tokenId, fill.side, fill.price, fill.size, "yes");
  const realized = after.yesRealizedPnl - before;

  const inserted = await deps.fills.insertFill({
    ts: new Date(nowMs),
    quoteId: pair.dbId,
    marketId: pair.marketId,
    tokenId: pair.tokenId,
    orderId: fill.orderId,
    leg: "yes",
    side: fill.side,
    price: fill.price,
    size: fill.size,
    fee: fill.fee,
    midAtFill: pair.quotedMid > 0 ? pair.quotedMid : null,
    realizedPnl: realized !== 0 ? realized : null,
  });
  if (inserted.isErr()) {
    logger.warn("Failed to persist fill", { orderId: fill.orderId, error: inserted.error.message });
  }

  await persistInventory(deps, pair.marketId);
  deps.kappa.recordFill(pair.marketId, nowMs);

  logger.info("MM fill", {
    marketId: pair.marketId,
    side: fill.side,
    size: fill.size,
    price: fill.price.toFixed(2),
    position: after.yesPosition,
  });
}

/**
 * Upsert both legs of a market from the ledger
 */
export async function persistInventory(
  deps: Pick<RecordFillDeps, "ledger" | "inventory">,
  marketId: string,
): Promise<void> {
  for (const record of deps.ledger.toRecords(marketId)) {
    const saved = await deps.inventory.upsertInventory(record);
    if (saved.isErr()) {
      logger.warn("Failed to persist inventory", { marketId, leg: record.leg, error: saved.error.message });
    }
  }
}

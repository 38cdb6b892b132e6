/**
 * Restore State - rebuild in-memory state after a restart
 *
 * inventory rows -> ledger; active quote rows + venue open orders -> live pairs.
 * Active rows with nothing left on the venue are closed as cancelled, and
 * venue orders no row references are cancelled by the quoter.
 */

import { err, ok, type Result } from "neverthrow";

import { describeVenueError } from "@outcome-mm/adapters";
import type { Repositories } from "@outcome-mm/repositories";
import { logger } from "@outcome-mm/utils";

import type { InventoryLedger } from "../services/inventory-ledger";
import type { MarketStateRegistry } from "../services/market-state";
import type { Quoter } from "../services/quoter";

export interface RestoreStateDeps {
  repositories: Pick<Repositories, "quotes" | "inventory">;
  ledger: InventoryLedger;
  quoter: Quoter;
  registry: MarketStateRegistry;
}

export type RestoreError =
  | { type: "STORE_UNAVAILABLE"; message: string }
  | { type: "VENUE_UNAVAILABLE"; message: string };

export interface RestoreOutcome {
  positions: number;
  quotes: number;
  staleQuotes: number;
  orphansCancelled: number;
}

export async function restoreState(deps: RestoreStateDeps): Promise<Result<RestoreOutcome, RestoreError>> {
  const { repositories, ledger, quoter, registry } = deps;

  const inventory = await repositories.inventory.listInventory();
  if (inventory.isErr()) {
    return err({ type: "STORE_UNAVAILABLE", message: inventory.error.message });
  }
  ledger.loadFromStore(inventory.value);

  const active = await repositories.quotes.getActiveQuotes();
  if (active.isErr()) {
    return err({ type: "STORE_UNAVAILABLE", message: active.error.message });
  }

  const rebuilt = await quoter.rebuildActiveQuotes(active.value);
  if (rebuilt.isErr()) {
    return err({ type: "VENUE_UNAVAILABLE", message: describeVenueError(rebuilt.error) });
  }

  for (const quoteId of rebuilt.value.staleQuoteIds) {
    const updated = await repositories.quotes.updateQuoteStatus(quoteId, "cancelled");
    if (updated.isErr()) {
      logger.warn("Failed to close stale quote", { quoteId, error: updated.error.message });
    }
  }

  for (const [marketId, pair] of rebuilt.value.pairs) {
    registry.activeQuotes.set(marketId, pair);
  }

  const outcome: RestoreOutcome = {
    positions: ledger.getAllPositions().length,
    quotes: rebuilt.value.pairs.size,
    staleQuotes: rebuilt.value.staleQuoteIds.length,
    orphansCancelled: rebuilt.value.orphansCancelled,
  };
  logger.info("State restored", { ...outcome });
  return ok(outcome);
}

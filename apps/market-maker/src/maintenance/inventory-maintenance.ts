/**
 * Inventory maintenance - runs every cycle, paused or not
 *
 * - Merge: YES+NO pairs at or above the threshold go back to collateral
 * - Store reconciliation: persisted inventory wins over memory
 * - Phantom orders: LIVE sides the venue no longer lists are reported
 * - Bot status: dashboard fields
 */

import type { MarketCandidate, MmConfig, Ms, QuotePair } from "@outcome-mm/core";
import { describeVenueError, type VenuePort } from "@outcome-mm/adapters";
import type { BotStatusRepository, InventoryRepository } from "@outcome-mm/repositories";
import { logger } from "@outcome-mm/utils";

import type { InventoryDivergence, InventoryLedger } from "../services/inventory-ledger";
import type { RiskManager } from "../services/risk-manager";
import { persistInventory } from "../usecases/record-fill";

export interface InventoryMaintenanceDeps {
  config: Pick<MmConfig, "useSplitMerge" | "mergeThreshold" | "mergeEveryCycles" | "reconcileEveryCycles">;
  venue: VenuePort;
  ledger: InventoryLedger;
  risk: RiskManager;
  inventory: InventoryRepository;
  botStatus: BotStatusRepository;
  clock: () => Ms;
}

export interface MaintenanceInput {
  cycle: number;
  knownMarkets: ReadonlyMap<string, MarketCandidate>;
  activeQuotes: ReadonlyMap<string, QuotePair>;
}

export interface MaintenanceOutcome {
  merged: { marketId: string; amount: number }[];
  divergences: InventoryDivergence[];
  phantomOrderIds: string[];
}

export async function runInventoryMaintenance(
  deps: InventoryMaintenanceDeps,
  input: MaintenanceInput,
): Promise<MaintenanceOutcome> {
  const { config } = deps;
  const outcome: MaintenanceOutcome = { merged: [], divergences: [], phantomOrderIds: [] };

  if (config.useSplitMerge && isDue(input.cycle, config.mergeEveryCycles)) {
    outcome.merged = await mergePairs(deps, input.knownMarkets);
  }

  if (isDue(input.cycle, config.reconcileEveryCycles)) {
    outcome.divergences = await reconcileInventory(deps);
    outcome.phantomOrderIds = await findPhantomOrders(deps.venue, input.activeQuotes);
  }

  await writeBotStatus(deps, input);
  return outcome;
}

const isDue = (cycle: number, every: number): boolean => every > 0 && cycle % every === 0;

async function mergePairs(
  deps: InventoryMaintenanceDeps,
  knownMarkets: ReadonlyMap<string, MarketCandidate>,
): Promise<{ marketId: string; amount: number }[]> {
  const merged: { marketId: string; amount: number }[] = [];

  for (const [marketId, candidate] of knownMarkets) {
    const amount = deps.ledger.getMergeAmount(marketId);
    if (amount < deps.config.mergeThreshold || !candidate.conditionId) continue;

    logger.info("Merging YES+NO pairs", { marketId, amount });
    const result = await deps.venue.mergePositions(candidate.conditionId, amount);
    if (result.isErr()) {
      logger.warn("Merge failed", { marketId, amount, error: describeVenueError(result.error) });
      continue;
    }

    const applied = deps.ledger.processMerge(marketId, amount);
    if (applied.isErr()) {
      logger.warn("Merge not applied to ledger", { marketId, error: applied.error.message });
      continue;
    }

    await persistInventory(deps, marketId);
    merged.push({ marketId, amount });
  }

  return merged;
}

async function reconcileInventory(deps: InventoryMaintenanceDeps): Promise<InventoryDivergence[]> {
  const stored = await deps.inventory.listInventory();
  if (stored.isErr()) {
    logger.warn("Inventory reconciliation skipped", { error: stored.error.message });
    return [];
  }

  const divergences = deps.ledger.reconcileWithStore(stored.value);
  if (divergences.length > 0) {
    logger.warn("Reconciliation corrected divergences", { count: divergences.length });
  }
  return divergences;
}

async function findPhantomOrders(venue: VenuePort, activeQuotes: ReadonlyMap<string, QuotePair>): Promise<string[]> {
  const open = await venue.getOpenOrders();
  if (open.isErr()) {
    logger.warn("Phantom order check skipped", { error: describeVenueError(open.error) });
    return [];
  }

  const liveIds = new Set(open.value.map(o => o.orderId));
  const phantoms: string[] = [];

  for (const [marketId, pair] of activeQuotes) {
    if (pair.bidOrderId !== null && pair.bidState === "LIVE" && !liveIds.has(pair.bidOrderId)) {
      logger.warn("Phantom bid", { marketId, orderId: pair.bidOrderId });
      phantoms.push(pair.bidOrderId);
    }
    if (pair.askOrderId !== null && pair.askState === "LIVE" && !liveIds.has(pair.askOrderId)) {
      logger.warn("Phantom ask", { marketId, orderId: pair.askOrderId });
      phantoms.push(pair.askOrderId);
    }
  }

  return phantoms;
}

async function writeBotStatus(deps: InventoryMaintenanceDeps, input: MaintenanceInput): Promise<void> {
  const { ledger, risk } = deps;

  const saved = await deps.botStatus.setStatus({
    mm_cycle: String(input.cycle),
    mm_active_markets: String(input.activeQuotes.size),
    mm_total_exposure: ledger.getTotalExposure().toFixed(2),
    mm_realized_pnl: ledger.getTotalRealizedPnl().toFixed(4),
    mm_last_cycle: new Date(deps.clock()).toISOString(),
    risk_mode: risk.riskMode,
    paused: String(risk.isPaused),
  });
  if (saved.isErr()) {
    logger.warn("Failed to update bot status", { error: saved.error.message });
  }
}

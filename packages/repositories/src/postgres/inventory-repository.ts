/**
 * Postgres Inventory Repository
 *
 * - Upsert mm_inventory per (market, token)
 */

import { ResultAsync } from "neverthrow";

import { mmInventory, type Db } from "@outcome-mm/db";

import type { InventoryRepository } from "../interfaces/inventory-repository";
import { parseLeg, toRepositoryError } from "../types";

/**
 * Create a Postgres inventory repository
 */
export function createPostgresInventoryRepository(db: Db): InventoryRepository {
  return {
    upsertInventory(record) {
      const now = new Date();
      const values = {
        leg: record.leg,
        position: String(record.position),
        avgEntry: String(record.avgEntry),
        realizedPnl: String(record.realizedPnl),
        updatedAt: now,
      };
      return ResultAsync.fromPromise(
        db
          .insert(mmInventory)
          .values({ marketId: record.marketId, tokenId: record.tokenId, ...values })
          .onConflictDoUpdate({
            target: [mmInventory.marketId, mmInventory.tokenId],
            set: values,
          }),
        toRepositoryError,
      ).map(() => undefined);
    },

    listInventory() {
      return ResultAsync.fromPromise(db.select().from(mmInventory), toRepositoryError).map(rows =>
        rows.map(row => ({
          marketId: row.marketId,
          tokenId: row.tokenId,
          leg: parseLeg(row.leg),
          position: Number(row.position),
          avgEntry: Number(row.avgEntry),
          realizedPnl: Number(row.realizedPnl),
        })),
      );
    },
  };
}

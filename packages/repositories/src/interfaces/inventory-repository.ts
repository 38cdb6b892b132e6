/**
 * Inventory Repository Interface
 *
 * Maintain mm_inventory (1 row per (market, token))
 */

import type { ResultAsync } from "neverthrow";

import type { InventoryRecord, RepositoryError } from "../types";

export interface InventoryRepository {
  upsertInventory(record: InventoryRecord): ResultAsync<void, RepositoryError>;

  listInventory(): ResultAsync<InventoryRecord[], RepositoryError>;
}

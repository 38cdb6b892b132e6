/**
 * Fill Repository Interface
 *
 * Inserts are idempotent on order id: reconciling the same fill twice
 * leaves one row.
 */

import type { ResultAsync } from "neverthrow";

import type { FillRecord, RepositoryError } from "../types";

export interface FillRepository {
  insertFill(fill: FillRecord): ResultAsync<void, RepositoryError>;

  /** Fills with from <= ts < to, oldest first */
  listFillsBetween(from: Date, to: Date): ResultAsync<FillRecord[], RepositoryError>;
}

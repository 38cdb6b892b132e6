/**
 * High-Water-Mark Repository Interface
 */

import type { ResultAsync } from "neverthrow";

import type { RepositoryError } from "../types";

export interface HighWaterMarkRepository {
  /** null until the first value is stored */
  getHighWaterMark(): ResultAsync<number | null, RepositoryError>;

  setHighWaterMark(value: number): ResultAsync<void, RepositoryError>;
}

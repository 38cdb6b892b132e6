/**
 * Daily Metrics Repository Interface
 */

import type { ResultAsync } from "neverthrow";

import type { DailyMetricsRecord, RepositoryError } from "../types";

export interface DailyMetricsRepository {
  upsertDailyMetrics(record: DailyMetricsRecord): ResultAsync<void, RepositoryError>;

  /** Most recent days first */
  listRecentDailyMetrics(limit: number): ResultAsync<DailyMetricsRecord[], RepositoryError>;
}

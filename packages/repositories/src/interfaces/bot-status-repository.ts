/**
 * Bot Status Repository Interface
 *
 * Key/value fields read by dashboards (risk mode, active markets, balances).
 */

import type { ResultAsync } from "neverthrow";

import type { RepositoryError } from "../types";

export interface BotStatusRepository {
  setStatus(entries: Record<string, string>): ResultAsync<void, RepositoryError>;

  getStatus(key: string): ResultAsync<string | null, RepositoryError>;
}

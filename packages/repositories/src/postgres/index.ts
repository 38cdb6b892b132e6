import type { Db } from "@outcome-mm/db";

import type { Repositories } from "../interfaces";
import { createPostgresBotStatusRepository } from "./bot-status-repository";
import { createPostgresDailyMetricsRepository } from "./daily-metrics-repository";
import { createPostgresFillRepository } from "./fill-repository";
import { createPostgresHighWaterMarkRepository } from "./high-water-mark-repository";
import { createPostgresInventoryRepository } from "./inventory-repository";
import { createPostgresQuoteRepository } from "./quote-repository";

export {
  createPostgresBotStatusRepository,
  createPostgresDailyMetricsRepository,
  createPostgresFillRepository,
  createPostgresHighWaterMarkRepository,
  createPostgresInventoryRepository,
  createPostgresQuoteRepository,
};

export function createPostgresRepositories(db: Db): Repositories {
  return {
    quotes: createPostgresQuoteRepository(db),
    fills: createPostgresFillRepository(db),
    inventory: createPostgresInventoryRepository(db),
    highWaterMark: createPostgresHighWaterMarkRepository(db),
    dailyMetrics: createPostgresDailyMetricsRepository(db),
    botStatus: createPostgresBotStatusRepository(db),
  };
}

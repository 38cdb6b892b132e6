export * from "./quote-repository";
export * from "./fill-repository";
export * from "./inventory-repository";
export * from "./high-water-mark-repository";
export * from "./daily-metrics-repository";
export * from "./bot-status-repository";

import type { BotStatusRepository } from "./bot-status-repository";
import type { DailyMetricsRepository } from "./daily-metrics-repository";
import type { FillRepository } from "./fill-repository";
import type { HighWaterMarkRepository } from "./high-water-mark-repository";
import type { InventoryRepository } from "./inventory-repository";
import type { QuoteRepository } from "./quote-repository";

/**
 * Everything the market maker persists, injected as one bundle
 */
export interface Repositories {
  quotes: QuoteRepository;
  fills: FillRepository;
  inventory: InventoryRepository;
  highWaterMark: HighWaterMarkRepository;
  dailyMetrics: DailyMetricsRepository;
  botStatus: BotStatusRepository;
}

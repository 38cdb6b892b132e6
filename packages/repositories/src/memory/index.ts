/**
 * In-memory repositories
 *
 * Same contracts as the Postgres repositories, backed by maps. Used by paper
 * trading without a database and by tests.
 */

import { okAsync } from "neverthrow";

import type {
  BotStatusRepository,
  DailyMetricsRepository,
  FillRepository,
  HighWaterMarkRepository,
  InventoryRepository,
  QuoteRepository,
  Repositories,
} from "../interfaces";
import type { DailyMetricsRecord, FillRecord, InventoryRecord, QuoteRecord } from "../types";

export function createInMemoryQuoteRepository(now: () => Date = () => new Date()): QuoteRepository {
  const quotes = new Map<number, QuoteRecord>();
  let nextId = 1;

  return {
    insertQuote(quote) {
      const id = nextId++;
      const ts = now();
      quotes.set(id, { ...quote, id, createdAt: ts, updatedAt: ts });
      return okAsync(id);
    },

    updateQuoteStatus(id, status) {
      const quote = quotes.get(id);
      if (quote) {
        quotes.set(id, { ...quote, status, updatedAt: now() });
      }
      return okAsync(undefined);
    },

    getActiveQuotes() {
      const active = [...quotes.values()]
        .filter(q => q.status === "active")
        .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id);
      return okAsync(active);
    },

    getQuotesByIds(ids) {
      const wanted = new Set(ids);
      return okAsync([...quotes.values()].filter(q => wanted.has(q.id)));
    },
  };
}

export function createInMemoryFillRepository(): FillRepository {
  const fills = new Map<string, FillRecord>();

  return {
    insertFill(fill) {
      if (!fills.has(fill.orderId)) {
        fills.set(fill.orderId, { ...fill });
      }
      return okAsync(undefined);
    },

    listFillsBetween(from, to) {
      const inRange = [...fills.values()]
        .filter(f => f.ts.getTime() >= from.getTime() && f.ts.getTime() < to.getTime())
        .sort((a, b) => a.ts.getTime() - b.ts.getTime());
      return okAsync(inRange);
    },
  };
}

export function createInMemoryInventoryRepository(): InventoryRepository {
  const rows = new Map<string, InventoryRecord>();

  return {
    upsertInventory(record) {
      rows.set(`${record.marketId}:${record.tokenId}`, { ...record });
      return okAsync(undefined);
    },

    listInventory() {
      return okAsync([...rows.values()].map(r => ({ ...r })));
    },
  };
}

export function createInMemoryHighWaterMarkRepository(): HighWaterMarkRepository {
  let value: number | null = null;

  return {
    getHighWaterMark: () => okAsync(value),
    setHighWaterMark(next) {
      value = next;
      return okAsync(undefined);
    },
  };
}

export function createInMemoryDailyMetricsRepository(): DailyMetricsRepository {
  const days = new Map<string, DailyMetricsRecord>();

  return {
    upsertDailyMetrics(record) {
      days.set(record.date, { ...record });
      return okAsync(undefined);
    },

    listRecentDailyMetrics(limit) {
      const recent = [...days.values()].sort((a, b) => b.date.localeCompare(a.date)).slice(0, limit);
      return okAsync(recent);
    },
  };
}

export function createInMemoryBotStatusRepository(): BotStatusRepository {
  const status = new Map<string, string>();

  return {
    setStatus(entries) {
      for (const [key, value] of Object.entries(entries)) {
        status.set(key, value);
      }
      return okAsync(undefined);
    },

    getStatus: key => okAsync(status.get(key) ?? null),
  };
}

export function createInMemoryRepositories(now?: () => Date): Repositories {
  return {
    quotes: createInMemoryQuoteRepository(now),
    fills: createInMemoryFillRepository(),
    inventory: createInMemoryInventoryRepository(),
    highWaterMark: createInMemoryHighWaterMarkRepository(),
    dailyMetrics: createInMemoryDailyMetricsRepository(),
    botStatus: createInMemoryBotStatusRepository(),
  };
}

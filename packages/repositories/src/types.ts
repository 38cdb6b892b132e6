/**
 * Repository Types
 *
 * Records exchanged with the store. drizzle hands numeric columns back as
 * strings; repositories parse them to numbers at the boundary.
 */

import type { Leg, Side } from "@outcome-mm/core";

export type RepositoryError = {
  type: "DB_ERROR";
  message: string;
};

export const toRepositoryError = (e: unknown): RepositoryError => ({
  type: "DB_ERROR",
  message: e instanceof Error ? e.message : "Unknown error",
});

// ─────────────────────────────────────────────────────────────────────────────
// Quotes
// ─────────────────────────────────────────────────────────────────────────────

export const QUOTE_STATUSES = ["active", "filled", "cancelled", "replaced", "killed"] as const;

export type QuoteStatus = (typeof QUOTE_STATUSES)[number];

export interface QuoteRecord {
  id: number;
  marketId: string;
  tokenId: string;
  noTokenId: string | null;
  conditionId: string | null;
  bidPrice: number;
  askPrice: number;
  bidSize: number;
  askSize: number;
  bidOrderId: string | null;
  askOrderId: string | null;
  /** Mid observed when the quote was placed */
  midPrice: number;
  status: QuoteStatus;
  levels: number;
  createdAt: Date;
  updatedAt: Date;
}

export type NewQuoteRecord = Omit<QuoteRecord, "id" | "createdAt" | "updatedAt">;

// ─────────────────────────────────────────────────────────────────────────────
// Fills
// ─────────────────────────────────────────────────────────────────────────────

export interface FillRecord {
  ts: Date;
  quoteId: number | null;
  marketId: string;
  tokenId: string;
  orderId: string;
  leg: Leg;
  side: Side;
  price: number;
  size: number;
  fee: number;
  midAtFill: number | null;
  realizedPnl: number | null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Inventory
// ─────────────────────────────────────────────────────────────────────────────

export interface InventoryRecord {
  marketId: string;
  tokenId: string;
  leg: Leg;
  position: number;
  avgEntry: number;
  realizedPnl: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Daily metrics
// ─────────────────────────────────────────────────────────────────────────────

export interface DailyMetricsRecord {
  /** YYYY-MM-DD (UTC) */
  date: string;
  fillsCount: number;
  roundTrips: number;
  grossPnl: number;
  netPnl: number;
  totalFees: number;
  spreadCaptureRate: number;
  avgFillQualityBps: number | null;
  portfolioValue: number | null;
  dailyReturnPct: number | null;
  sharpe: number | null;
  profitFactor: number | null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Text column parsing
// ─────────────────────────────────────────────────────────────────────────────

const QUOTE_STATUS_SET: ReadonlySet<string> = new Set(QUOTE_STATUSES);

export const isQuoteStatus = (value: string): value is QuoteStatus => QUOTE_STATUS_SET.has(value);

/** Unrecognized statuses read as cancelled so they never count as live */
export const parseQuoteStatus = (value: string): QuoteStatus => (isQuoteStatus(value) ? value : "cancelled");

export const parseLeg = (value: string): Leg => (value === "no" ? "no" : "yes");

export const parseSide = (value: string): Side => (value === "sell" ? "sell" : "buy");

export const parseNullableNumeric = (value: string | null): number | null => (value === null ? null : Number(value));

export const toNullableNumeric = (value: number | null): string | null => (value === null ? null : String(value));

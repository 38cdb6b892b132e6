/**
 * Venue Port - Interface for the outcome-token order book venue
 *
 * - Adapters implement this port (paper adapter in-process, live CLOB adapters outside this repo)
 * - Every call returns ResultAsync; venue rejections are errors, never throws
 */

import type { ResultAsync } from "neverthrow";

import type { BookSummary, Price, Shares, Side, Usdc } from "@outcome-mm/core";

/**
 * Time-in-force
 */
export type OrderType = "GTC" | "GTD" | "FOK";

/**
 * Place limit order request
 */
export interface PlaceLimitOrderRequest {
  tokenId: string;
  side: Side;
  price: Price;
  size: Shares;
  orderType: OrderType;
  postOnly: boolean;
}

/**
 * Accepted order
 */
export interface PlacedOrder {
  orderId: string;
  /** Raw venue status string (LIVE, MATCHED, ...) */
  status: string;
}

/**
 * Point-in-time status of one order
 */
export interface OrderStatusReport {
  orderId: string;
  /** Raw venue status string; map with `parseVenueStatus` */
  status: string;
  originalSize: Shares;
  sizeMatched: Shares;
  /** null until something matched */
  avgFillPrice: Price | null;
  feesPaid: Usdc;
}

/**
 * Resting order as listed by the venue
 */
export interface VenueOpenOrder {
  orderId: string;
  tokenId: string;
  side: Side;
  price: Price;
  originalSize: Shares;
  sizeMatched: Shares;
}

/**
 * Venue errors
 */
export type VenueError =
  | { type: "post_only_cross"; message: string }
  | { type: "invalid_order"; message: string }
  | { type: "insufficient_balance"; message: string }
  | { type: "not_found"; message: string }
  | { type: "rate_limit"; message: string; retryAfterMs?: number }
  | { type: "network"; message: string }
  | { type: "venue_error"; message: string; code?: string }
  | { type: "unknown"; message: string };

export type VenueErrorType = VenueError["type"];

/**
 * Venue Port interface
 */
export interface VenuePort {
  placeLimitOrder(request: PlaceLimitOrderRequest): ResultAsync<PlacedOrder, VenueError>;

  cancelOrder(orderId: string): ResultAsync<void, VenueError>;

  getOrderStatus(orderId: string): ResultAsync<OrderStatusReport, VenueError>;

  getBookSummary(tokenId: string): ResultAsync<BookSummary, VenueError>;

  getOpenOrders(): ResultAsync<VenueOpenOrder[], VenueError>;

  /** Free collateral (USDC) including funds reserved by resting bids */
  getCollateralBalance(): ResultAsync<Usdc, VenueError>;

  /** Burn `amount` YES+NO pairs for `amount` USDC */
  mergePositions(conditionId: string, amount: Shares): ResultAsync<void, VenueError>;

  /** Convert `amount` USDC into `amount` YES+NO pairs */
  splitPosition(conditionId: string, amount: Usdc): ResultAsync<void, VenueError>;
}

/**
 * A report counts as filled once the venue says MATCHED or the full size matched
 */
export const isOrderFilled = (report: Pick<OrderStatusReport, "status" | "originalSize" | "sizeMatched">): boolean =>
  report.status.toUpperCase() === "MATCHED" || (report.originalSize > 0 && report.sizeMatched >= report.originalSize);

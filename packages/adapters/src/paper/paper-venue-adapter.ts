/**
 * Paper Venue Adapter - in-process stand-in for the order book venue
 *
 * Keeps orders, token positions and collateral in memory. Books are set from
 * the outside (`setBook`) and fills are driven explicitly:
 * - `applyTrade(tokenId, px)`: touch fill, BUY fills when px <= bid, SELL when px >= ask
 * - `fillOrder(orderId, size)`: match part or all of one order at its price
 *
 * Fills happen at the order price (maker). A cancelled order can still be
 * filled through `fillOrder` to reproduce a fill racing a cancel.
 */

import Decimal from "decimal.js";
import { err, errAsync, ok, okAsync, type Result, type ResultAsync } from "neverthrow";

import { MAX_PRICE, MIN_PRICE, type BookSummary, type Price, type Shares, type Side, type Usdc } from "@outcome-mm/core";

import type {
  OrderStatusReport,
  PlaceLimitOrderRequest,
  PlacedOrder,
  VenueError,
  VenueOpenOrder,
  VenuePort,
} from "../ports";

export type PaperOperation = keyof VenuePort;

export type PaperOrderStatus = "LIVE" | "MATCHED" | "CANCELED";

export interface PaperOrder {
  orderId: string;
  tokenId: string;
  side: Side;
  price: Price;
  originalSize: Shares;
  sizeMatched: Shares;
  feesPaid: Usdc;
  status: PaperOrderStatus;
}

export interface PaperFill {
  orderId: string;
  tokenId: string;
  side: Side;
  price: Price;
  size: Shares;
  fee: Usdc;
}

export interface PaperMarket {
  conditionId: string;
  yesTokenId: string;
  noTokenId: string;
}

export interface PaperVenueOptions {
  initialBalance: Usdc;
  /** Fraction of fill notional charged as fee */
  feeRate?: number;
  /** @default 5 */
  minOrderSize?: Shares;
}

const DEFAULT_MIN_ORDER_SIZE = 5;

export class PaperVenueAdapter implements VenuePort {
  private cash: Decimal;
  private readonly feeRate: number;
  private readonly minOrderSize: Shares;

  private readonly orders = new Map<string, PaperOrder>();
  private readonly books = new Map<string, BookSummary>();
  private readonly positions = new Map<string, Decimal>();
  private readonly markets = new Map<string, PaperMarket>();
  private readonly failures = new Map<PaperOperation, VenueError[]>();

  private orderIdCounter = 0;

  constructor(options: PaperVenueOptions) {
    this.cash = new Decimal(options.initialBalance);
    this.feeRate = options.feeRate ?? 0;
    this.minOrderSize = options.minOrderSize ?? DEFAULT_MIN_ORDER_SIZE;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Setup / simulation hooks
  // ───────────────────────────────────────────────────────────────────────────

  registerMarket(market: PaperMarket): void {
    this.markets.set(market.conditionId, market);
  }

  setBook(tokenId: string, book: BookSummary): void {
    this.books.set(tokenId, book);
  }

  /** Credit tokens directly (e.g. a position carried over from elsewhere) */
  setPosition(tokenId: string, size: Shares): void {
    this.positions.set(tokenId, new Decimal(size));
  }

  /** Make the next call to `operation` fail with `error` */
  failNext(operation: PaperOperation, error: VenueError): void {
    const queue = this.failures.get(operation) ?? [];
    queue.push(error);
    this.failures.set(operation, queue);
  }

  /**
   * Touch fill against a trade print
   */
  applyTrade(tokenId: string, tradePrice: Price): PaperFill[] {
    const fills: PaperFill[] = [];

    for (const order of this.orders.values()) {
      if (order.tokenId !== tokenId || order.status !== "LIVE") continue;

      const touched = order.side === "buy" ? tradePrice <= order.price : tradePrice >= order.price;
      if (touched) {
        fills.push(this.match(order, order.originalSize - order.sizeMatched));
      }
    }

    return fills;
  }

  /**
   * Match `size` (default: the remainder) of one order
   */
  fillOrder(orderId: string, size?: Shares): Result<PaperFill, VenueError> {
    const order = this.orders.get(orderId);
    if (!order) {
      return err({ type: "not_found", message: `Order ${orderId} not found` });
    }
    if (order.status === "MATCHED") {
      return err({ type: "invalid_order", message: `Order ${orderId} already matched` });
    }

    const remaining = order.originalSize - order.sizeMatched;
    return ok(this.match(order, Math.min(size ?? remaining, remaining)));
  }

  getOrder(orderId: string): PaperOrder | undefined {
    const order = this.orders.get(orderId);
    return order ? { ...order } : undefined;
  }

  positionOf(tokenId: string): Shares {
    return this.position(tokenId).toNumber();
  }

  cashBalance(): Usdc {
    return this.cash.toNumber();
  }

  // ───────────────────────────────────────────────────────────────────────────
  // VenuePort
  // ───────────────────────────────────────────────────────────────────────────

  placeLimitOrder(request: PlaceLimitOrderRequest): ResultAsync<PlacedOrder, VenueError> {
    const injected = this.takeFailure("placeLimitOrder");
    if (injected) return errAsync(injected);

    const { tokenId, side, price, size, postOnly } = request;

    if (!Number.isFinite(price) || price < MIN_PRICE || price > MAX_PRICE) {
      return errAsync({ type: "invalid_order", message: `Invalid price: ${price}` });
    }
    if (!Number.isFinite(size) || size < this.minOrderSize) {
      return errAsync({ type: "invalid_order", message: `Size ${size} below minimum ${this.minOrderSize}` });
    }

    const book = this.books.get(tokenId);
    if (postOnly && book) {
      const crosses = side === "buy" ? book.bestAsk > 0 && price >= book.bestAsk : book.bestBid > 0 && price <= book.bestBid;
      if (crosses) {
        return errAsync({
          type: "post_only_cross",
          message: `post-only order crosses book: ${side} ${price} vs bid ${book.bestBid} / ask ${book.bestAsk}`,
        });
      }
    }

    if (side === "buy") {
      const free = this.cash.minus(this.reservedCollateral());
      if (free.lt(new Decimal(price).mul(size))) {
        return errAsync({
          type: "insufficient_balance",
          message: `Insufficient collateral: need ${new Decimal(price).mul(size).toFixed(2)}, free ${free.toFixed(2)}`,
        });
      }
    } else {
      const available = this.position(tokenId).minus(this.reservedTokens(tokenId));
      if (available.lt(size)) {
        return errAsync({
          type: "insufficient_balance",
          message: `Insufficient ${tokenId} balance: need ${size}, available ${available.toString()}`,
        });
      }
    }

    this.orderIdCounter++;
    const order: PaperOrder = {
      orderId: `paper_${String(this.orderIdCounter)}`,
      tokenId,
      side,
      price,
      originalSize: size,
      sizeMatched: 0,
      feesPaid: 0,
      status: "LIVE",
    };
    this.orders.set(order.orderId, order);

    return okAsync({ orderId: order.orderId, status: order.status });
  }

  cancelOrder(orderId: string): ResultAsync<void, VenueError> {
    const injected = this.takeFailure("cancelOrder");
    if (injected) return errAsync(injected);

    const order = this.orders.get(orderId);
    if (!order) {
      return errAsync({ type: "not_found", message: `Order ${orderId} not found` });
    }
    if (order.status === "MATCHED") {
      return errAsync({ type: "invalid_order", message: `Order ${orderId} already matched` });
    }

    order.status = "CANCELED";
    return okAsync(undefined);
  }

  getOrderStatus(orderId: string): ResultAsync<OrderStatusReport, VenueError> {
    const injected = this.takeFailure("getOrderStatus");
    if (injected) return errAsync(injected);

    const order = this.orders.get(orderId);
    if (!order) {
      return errAsync({ type: "not_found", message: `Order ${orderId} not found` });
    }

    return okAsync({
      orderId,
      status: order.status,
      originalSize: order.originalSize,
      sizeMatched: order.sizeMatched,
      avgFillPrice: order.sizeMatched > 0 ? order.price : null,
      feesPaid: order.feesPaid,
    });
  }

  getBookSummary(tokenId: string): ResultAsync<BookSummary, VenueError> {
    const injected = this.takeFailure("getBookSummary");
    if (injected) return errAsync(injected);

    const book = this.books.get(tokenId);
    if (!book) {
      return errAsync({ type: "not_found", message: `No book for ${tokenId}` });
    }
    return okAsync({ ...book, minOrderSize: book.minOrderSize ?? this.minOrderSize });
  }

  getOpenOrders(): ResultAsync<VenueOpenOrder[], VenueError> {
    const injected = this.takeFailure("getOpenOrders");
    if (injected) return errAsync(injected);

    const open: VenueOpenOrder[] = [];
    for (const o of this.orders.values()) {
      if (o.status !== "LIVE") continue;
      open.push({
        orderId: o.orderId,
        tokenId: o.tokenId,
        side: o.side,
        price: o.price,
        originalSize: o.originalSize,
        sizeMatched: o.sizeMatched,
      });
    }
    return okAsync(open);
  }

  getCollateralBalance(): ResultAsync<Usdc, VenueError> {
    const injected = this.takeFailure("getCollateralBalance");
    if (injected) return errAsync(injected);

    return okAsync(this.cash.toNumber());
  }

  mergePositions(conditionId: string, amount: Shares): ResultAsync<void, VenueError> {
    const injected = this.takeFailure("mergePositions");
    if (injected) return errAsync(injected);

    const market = this.markets.get(conditionId);
    if (!market) {
      return errAsync({ type: "not_found", message: `Unknown condition ${conditionId}` });
    }

    const yes = this.position(market.yesTokenId);
    const no = this.position(market.noTokenId);
    if (yes.lt(amount) || no.lt(amount)) {
      return errAsync({
        type: "insufficient_balance",
        message: `Cannot merge ${amount}: YES=${yes.toString()}, NO=${no.toString()}`,
      });
    }

    this.positions.set(market.yesTokenId, yes.minus(amount));
    this.positions.set(market.noTokenId, no.minus(amount));
    this.cash = this.cash.plus(amount);
    return okAsync(undefined);
  }

  splitPosition(conditionId: string, amount: Usdc): ResultAsync<void, VenueError> {
    const injected = this.takeFailure("splitPosition");
    if (injected) return errAsync(injected);

    const market = this.markets.get(conditionId);
    if (!market) {
      return errAsync({ type: "not_found", message: `Unknown condition ${conditionId}` });
    }

    const free = this.cash.minus(this.reservedCollateral());
    if (free.lt(amount)) {
      return errAsync({
        type: "insufficient_balance",
        message: `Cannot split ${amount}: free collateral ${free.toFixed(2)}`,
      });
    }

    this.cash = this.cash.minus(amount);
    this.positions.set(market.yesTokenId, this.position(market.yesTokenId).plus(amount));
    this.positions.set(market.noTokenId, this.position(market.noTokenId).plus(amount));
    return okAsync(undefined);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────────

  private takeFailure(operation: PaperOperation): VenueError | undefined {
    return this.failures.get(operation)?.shift();
  }

  private position(tokenId: string): Decimal {
    return this.positions.get(tokenId) ?? new Decimal(0);
  }

  private reservedCollateral(): Decimal {
    let reserved = new Decimal(0);
    for (const o of this.orders.values()) {
      if (o.status === "LIVE" && o.side === "buy") {
        reserved = reserved.plus(new Decimal(o.price).mul(o.originalSize - o.sizeMatched));
      }
    }
    return reserved;
  }

  private reservedTokens(tokenId: string): Decimal {
    let reserved = new Decimal(0);
    for (const o of this.orders.values()) {
      if (o.status === "LIVE" && o.side === "sell" && o.tokenId === tokenId) {
        reserved = reserved.plus(o.originalSize - o.sizeMatched);
      }
    }
    return reserved;
  }

  private match(order: PaperOrder, size: Shares): PaperFill {
    const notional = new Decimal(order.price).mul(size);
    const fee = notional.mul(this.feeRate);

    if (order.side === "buy") {
      this.cash = this.cash.minus(notional).minus(fee);
      this.positions.set(order.tokenId, this.position(order.tokenId).plus(size));
    } else {
      this.cash = this.cash.plus(notional).minus(fee);
      this.positions.set(order.tokenId, this.position(order.tokenId).minus(size));
    }

    order.sizeMatched = new Decimal(order.sizeMatched).plus(size).toNumber();
    order.feesPaid = new Decimal(order.feesPaid).plus(fee).toNumber();
    if (order.sizeMatched >= order.originalSize) {
      order.status = "MATCHED";
    }

    return {
      orderId: order.orderId,
      tokenId: order.tokenId,
      side: order.side,
      price: order.price,
      size,
      fee: fee.toNumber(),
    };
  }
}

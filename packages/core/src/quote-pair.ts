/**
 * QuotePair - one bid + one ask order on a single market token
 *
 * Owned by the quoter of its market. Side states only move through
 * `updateBidState` / `updateAskState`, which enforce the order state machine.
 */

import type { Result } from "neverthrow";

import { isDoneState, isOpenState, transition, type OrderTransitionError, type TransitionOutcome } from "./order-state";
import type { Ms, OrderState, Price, Shares } from "./types";

export interface QuotePairInit {
  marketId: string;
  tokenId: string;
  bidPrice: Price;
  askPrice: Price;
  /** Shared size; used for a side whose own size is not given */
  size: Shares;
  bidSize?: Shares;
  askSize?: Shares;
  noTokenId?: string | null;
  conditionId?: string | null;
  bidOrderId?: string | null;
  askOrderId?: string | null;
  bidState?: OrderState;
  askState?: OrderState;
  quotedMid?: Price;
  dbId?: number | null;
  nowMs?: Ms;
}

export class QuotePair {
  readonly marketId: string;
  readonly tokenId: string;
  noTokenId: string | null;
  conditionId: string | null;
  bidPrice: Price;
  askPrice: Price;
  size: Shares;
  bidSize: Shares;
  askSize: Shares;
  bidOrderId: string | null;
  askOrderId: string | null;
  /** Persisted quote row id */
  dbId: number | null;
  /** Market mid observed when the quote was made; (bid+ask)/2 is meaningless for one-sided quotes */
  quotedMid: Price;
  readonly createdAtMs: Ms;
  updatedAtMs: Ms;

  private _bidState: OrderState;
  private _askState: OrderState;

  constructor(init: QuotePairInit) {
    const nowMs = init.nowMs ?? Date.now();
    this.marketId = init.marketId;
    this.tokenId = init.tokenId;
    this.noTokenId = init.noTokenId ?? null;
    this.conditionId = init.conditionId ?? null;
    this.bidPrice = init.bidPrice;
    this.askPrice = init.askPrice;
    this.size = init.size;
    this.bidSize = init.bidSize !== undefined && init.bidSize > 0 ? init.bidSize : init.size;
    this.askSize = init.askSize !== undefined && init.askSize > 0 ? init.askSize : init.size;
    this.bidOrderId = init.bidOrderId ?? null;
    this.askOrderId = init.askOrderId ?? null;
    this._bidState = init.bidState ?? "NEW";
    this._askState = init.askState ?? "NEW";
    this.quotedMid = init.quotedMid ?? 0;
    this.dbId = init.dbId ?? null;
    this.createdAtMs = nowMs;
    this.updatedAtMs = nowMs;
  }

  get bidState(): OrderState {
    return this._bidState;
  }

  get askState(): OrderState {
    return this._askState;
  }

  get spread(): Price {
    return this.askPrice - this.bidPrice;
  }

  get mid(): Price {
    return (this.bidPrice + this.askPrice) / 2;
  }

  /** Either side may still rest on the book */
  get isActive(): boolean {
    return isOpenState(this._bidState) || isOpenState(this._askState);
  }

  get isFullyFilled(): boolean {
    return this._bidState === "FILLED" && this._askState === "FILLED";
  }

  get isTerminal(): boolean {
    return isDoneState(this._bidState) && isDoneState(this._askState);
  }

  hasOpenBid(): boolean {
    return this.bidOrderId !== null && isOpenState(this._bidState);
  }

  hasOpenAsk(): boolean {
    return this.askOrderId !== null && isOpenState(this._askState);
  }

  ageSeconds(nowMs: Ms = Date.now()): number {
    return (nowMs - this.createdAtMs) / 1000;
  }

  updateBidState(next: OrderState, nowMs: Ms = Date.now()): Result<TransitionOutcome, OrderTransitionError> {
    return transition(this._bidState, next).map(outcome => {
      if (outcome === "changed") {
        this._bidState = next;
        this.updatedAtMs = nowMs;
      }
      return outcome;
    });
  }

  updateAskState(next: OrderState, nowMs: Ms = Date.now()): Result<TransitionOutcome, OrderTransitionError> {
    return transition(this._askState, next).map(outcome => {
      if (outcome === "changed") {
        this._askState = next;
        this.updatedAtMs = nowMs;
      }
      return outcome;
    });
  }
}

/**
 * Concurrency-limited venue
 *
 * Wraps a VenuePort so that at most N calls are in flight at once.
 * An adapter that throws instead of returning an error is mapped through `toVenueError`.
 */

import { err, ResultAsync, type Result } from "neverthrow";

import { createConcurrencyLimiter, type ConcurrencyLimiter } from "@outcome-mm/utils";

import type { VenueError, VenuePort } from "../ports";
import { toVenueError } from "./venue-errors";

export function withConcurrencyLimit(venue: VenuePort, maxConcurrent: number): VenuePort {
  const limit: ConcurrencyLimiter = createConcurrencyLimiter(maxConcurrent);

  const limited = <T>(call: () => ResultAsync<T, VenueError>): ResultAsync<T, VenueError> =>
    new ResultAsync(
      limit(async (): Promise<Result<T, VenueError>> => {
        try {
          return await call();
        } catch (error) {
          return err(toVenueError(error));
        }
      }),
    );

  return {
    placeLimitOrder: request => limited(() => venue.placeLimitOrder(request)),
    cancelOrder: orderId => limited(() => venue.cancelOrder(orderId)),
    getOrderStatus: orderId => limited(() => venue.getOrderStatus(orderId)),
    getBookSummary: tokenId => limited(() => venue.getBookSummary(tokenId)),
    getOpenOrders: () => limited(() => venue.getOpenOrders()),
    getCollateralBalance: () => limited(() => venue.getCollateralBalance()),
    mergePositions: (conditionId, amount) => limited(() => venue.mergePositions(conditionId, amount)),
    splitPosition: (conditionId, amount) => limited(() => venue.splitPosition(conditionId, amount)),
  };
}

/**
 * Port interfaces for adapters
 */

export type {
  OrderStatusReport,
  OrderType,
  PlaceLimitOrderRequest,
  PlacedOrder,
  VenueError,
  VenueErrorType,
  VenueOpenOrder,
  VenuePort,
} from "./venue-port";
export { isOrderFilled } from "./venue-port";

export type {
  AdvisoryError,
  EventAssessment,
  EventGuard,
  MarketScore,
  MarketScorer,
  RiskOfficer,
  RiskReviewRequest,
  RiskVerdict,
} from "./advisory-port";

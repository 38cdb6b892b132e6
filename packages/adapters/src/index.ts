/**
 * packages/adapters - Venue and advisory adapters
 *
 * - Port interfaces for the order book venue and the advisory oracles
 * - In-process paper venue
 * - Concurrency limiting and error mapping for venue calls
 */

// Port interfaces
export * from "./ports";

// Venue helpers
export { withConcurrencyLimit } from "./venue/limited-venue";
export { toVenueError, describeVenueError } from "./venue/venue-errors";

// Paper venue
export * from "./paper";

// Advisory fallbacks
export type { AdvisoryClient, AdvisoryClientOptions } from "./advisory/advisory-client";
export {
  createAdvisoryClient,
  withAdvisoryFallback,
  withTimeout,
  FALLBACK_SIZE_FACTOR,
  NEUTRAL_SCORE,
} from "./advisory/advisory-client";

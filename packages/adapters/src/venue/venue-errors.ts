/**
 * Map thrown venue/client errors onto VenueError
 */

import type { VenueError } from "../ports";

const messageOf = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export function toVenueError(error: unknown): VenueError {
  const message = messageOf(error);
  const lower = message.toLowerCase();

  if (lower.includes("post-only") && lower.includes("crosses book")) {
    return { type: "post_only_cross", message };
  }
  if (lower.includes("rate limit") || lower.includes("too many requests")) {
    return { type: "rate_limit", message };
  }
  if (lower.includes("insufficient") || lower.includes("not enough balance")) {
    return { type: "insufficient_balance", message };
  }
  if (lower.includes("timeout") || lower.includes("econnreset") || lower.includes("fetch failed")) {
    return { type: "network", message };
  }
  return { type: "unknown", message };
}

/** Short `type: message` form for logs and quote-failure diagnostics */
export const describeVenueError = (error: VenueError): string => `${error.type}: ${error.message}`;

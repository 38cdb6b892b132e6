/**
 * Order State Machine
 *
 * Explicit adjacency table for per-side order states.
 * A fill may race a cancel, so CANCELLED -> FILLED stays legal.
 *
 * This module is pure (no I/O, no throw).
 */

import { err, ok, type Result } from "neverthrow";

import type { OrderState } from "./types";

export const ORDER_STATES: readonly OrderState[] = ["NEW", "LIVE", "PARTIAL", "FILLED", "CANCELLED", "UNKNOWN"];

/**
 * Allowed transitions: current -> next
 */
export const ORDER_TRANSITIONS: Readonly<Record<OrderState, readonly OrderState[]>> = {
  NEW: ["LIVE", "FILLED", "CANCELLED", "UNKNOWN"],
  LIVE: ["PARTIAL", "FILLED", "CANCELLED", "UNKNOWN"],
  PARTIAL: ["FILLED", "CANCELLED", "UNKNOWN"],
  FILLED: [],
  CANCELLED: ["FILLED"],
  UNKNOWN: ["LIVE", "PARTIAL", "FILLED", "CANCELLED"],
};

/** States in which an order may still rest on the book */
export const OPEN_STATES: readonly OrderState[] = ["NEW", "LIVE", "PARTIAL"];

export type TransitionOutcome = "changed" | "unchanged";

export interface OrderTransitionError {
  type: "INVALID_TRANSITION";
  from: OrderState;
  to: OrderState;
  message: string;
}

export function canTransition(current: OrderState, target: OrderState): boolean {
  return ORDER_TRANSITIONS[current].includes(target);
}

export function isOpenState(state: OrderState): boolean {
  return OPEN_STATES.includes(state);
}

export function isDoneState(state: OrderState): boolean {
  return state === "FILLED" || state === "CANCELLED";
}

/**
 * Validate a transition
 *
 * Same-state requests are idempotent and report "unchanged".
 */
export function transition(current: OrderState, target: OrderState): Result<TransitionOutcome, OrderTransitionError> {
  if (current === target) {
    return ok("unchanged");
  }
  if (canTransition(current, target)) {
    return ok("changed");
  }
  return err({
    type: "INVALID_TRANSITION",
    from: current,
    to: target,
    message: `Invalid transition ${current} -> ${target}`,
  });
}

const VENUE_STATUS_MAP: Readonly<Record<string, OrderState>> = {
  LIVE: "LIVE",
  ACTIVE: "LIVE",
  OPEN: "LIVE",
  MATCHED: "FILLED",
  FILLED: "FILLED",
  CANCELLED: "CANCELLED",
  CANCELED: "CANCELLED",
  EXPIRED: "CANCELLED",
};

/**
 * Map a venue status string to an order state (unmapped -> UNKNOWN)
 */
export function parseVenueStatus(status: string): OrderState {
  return VENUE_STATUS_MAP[status.trim().toUpperCase()] ?? "UNKNOWN";
}

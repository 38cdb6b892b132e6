/**
 * Order State Machine + QuotePair Unit Tests
 */

import { describe, expect, test } from "vitest";

import { ORDER_STATES, canTransition, isOpenState, parseVenueStatus, transition } from "../src/order-state";
import { QuotePair } from "../src/quote-pair";

const createDefaultPair = (overrides: Partial<ConstructorParameters<typeof QuotePair>[0]> = {}) =>
  new QuotePair({
    marketId: "m1",
    tokenId: "yes-1",
    bidPrice: 0.48,
    askPrice: 0.52,
    size: 10,
    nowMs: 1_000,
    ...overrides,
  });

describe("transition", () => {
  test("should report unchanged for same-state requests", () => {
    for (const state of ORDER_STATES) {
      expect(transition(state, state)._unsafeUnwrap()).toBe("unchanged");
    }
  });

  test("should allow the normal lifecycle", () => {
    expect(transition("NEW", "LIVE")._unsafeUnwrap()).toBe("changed");
    expect(transition("LIVE", "PARTIAL")._unsafeUnwrap()).toBe("changed");
    expect(transition("PARTIAL", "FILLED")._unsafeUnwrap()).toBe("changed");
  });

  test("should allow a late fill after cancel", () => {
    expect(canTransition("CANCELLED", "FILLED")).toBe(true);
  });

  test("should keep FILLED terminal", () => {
    const result = transition("FILLED", "LIVE");

    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr()).toEqual({
      type: "INVALID_TRANSITION",
      from: "FILLED",
      to: "LIVE",
      message: "Invalid transition FILLED -> LIVE",
    });
  });

  test("should reject going back from PARTIAL to LIVE", () => {
    expect(canTransition("PARTIAL", "LIVE")).toBe(false);
  });
});

describe("parseVenueStatus", () => {
  test("should map venue vocabulary case-insensitively", () => {
    expect(parseVenueStatus("live")).toBe("LIVE");
    expect(parseVenueStatus(" OPEN ")).toBe("LIVE");
    expect(parseVenueStatus("matched")).toBe("FILLED");
    expect(parseVenueStatus("canceled")).toBe("CANCELLED");
    expect(parseVenueStatus("EXPIRED")).toBe("CANCELLED");
  });

  test("should map anything else to UNKNOWN", () => {
    expect(parseVenueStatus("delayed")).toBe("UNKNOWN");
    expect(parseVenueStatus("")).toBe("UNKNOWN");
  });
});

describe("isOpenState", () => {
  test("should treat NEW, LIVE and PARTIAL as open", () => {
    expect(ORDER_STATES.filter(isOpenState)).toEqual(["NEW", "LIVE", "PARTIAL"]);
  });
});

describe("QuotePair", () => {
  test("should derive spread and mid", () => {
    const pair = createDefaultPair();

    expect(pair.spread).toBeCloseTo(0.04, 10);
    expect(pair.mid).toBe(0.5);
    expect(pair.bidSize).toBe(10);
    expect(pair.askSize).toBe(10);
  });

  test("should size sides independently when given", () => {
    const pair = createDefaultPair({ bidSize: 12, askSize: 0 });
    expect(pair.bidSize).toBe(12);
    expect(pair.askSize).toBe(10);
  });

  test("should apply valid transitions and keep state on invalid ones", () => {
    const pair = createDefaultPair();

    expect(pair.updateBidState("FILLED", 2_000).isOk()).toBe(true);
    expect(pair.bidState).toBe("FILLED");
    expect(pair.updatedAtMs).toBe(2_000);

    const rejected = pair.updateBidState("LIVE", 3_000);
    expect(rejected.isErr()).toBe(true);
    expect(pair.bidState).toBe("FILLED");
    expect(pair.updatedAtMs).toBe(2_000);
  });

  test("should be active while either side is open", () => {
    const pair = createDefaultPair();
    pair.updateBidState("CANCELLED");
    expect(pair.isActive).toBe(true);

    pair.updateAskState("CANCELLED");
    expect(pair.isActive).toBe(false);
    expect(pair.isTerminal).toBe(true);
    expect(pair.isFullyFilled).toBe(false);
  });

  test("should be fully filled only when both sides filled", () => {
    const pair = createDefaultPair();
    pair.updateBidState("FILLED");
    expect(pair.isFullyFilled).toBe(false);

    pair.updateAskState("FILLED");
    expect(pair.isFullyFilled).toBe(true);
  });

  test("should report open sides only with an order id", () => {
    const pair = createDefaultPair({ bidOrderId: "b-1" });

    expect(pair.hasOpenBid()).toBe(true);
    expect(pair.hasOpenAsk()).toBe(false);
  });

  test("should measure age from creation", () => {
    expect(createDefaultPair().ageSeconds(31_000)).toBe(30);
  });
});

/**
 * Advisory fallbacks Unit Tests
 */

import { errAsync, okAsync, ResultAsync } from "neverthrow";
import { afterEach, describe, expect, test } from "vitest";

import type { MarketCandidate } from "@outcome-mm/core";
import { LogLevel } from "@outcome-mm/utils";
import { captureLogs, type LogCapture } from "@outcome-mm/utils/testing";

import { createAdvisoryClient } from "../src/advisory/advisory-client";
import type { AdvisoryError, EventAssessment } from "../src/ports";

const CANDIDATE: MarketCandidate = { marketId: "m1", tokenId: "yes-1" };
const REVIEW = { marketId: "m1", proposedSizeUsd: 5, netExposureUsd: 20 };

describe("createAdvisoryClient", () => {
  let capture: LogCapture | undefined;

  afterEach(() => {
    capture?.restore();
    capture = undefined;
  });

  test("should answer neutrally when oracles are disabled", async () => {
    const client = createAdvisoryClient({ minScore: 20 });

    expect(await client.review(REVIEW)).toEqual({
      approve: true,
      sizeFactor: 1,
      reason: "risk officer disabled",
      fallback: false,
    });
    expect(await client.score(CANDIDATE)).toEqual({ marketId: "m1", score: 50, fallback: false });
    expect((await client.assess(CANDIDATE)).warning).toBe(false);
  });

  test("should pass oracle answers through", async () => {
    const client = createAdvisoryClient({
      minScore: 20,
      scorer: { score: c => okAsync({ marketId: c.marketId, score: 87, fallback: false }) },
    });

    expect((await client.score(CANDIDATE)).score).toBe(87);
  });

  test("should approve at half size when the risk officer fails", async () => {
    capture = captureLogs();
    const client = createAdvisoryClient({
      minScore: 20,
      riskOfficer: { review: () => errAsync({ type: "invalid_response", message: "no JSON" }) },
    });

    expect(await client.review(REVIEW)).toEqual({
      approve: true,
      sizeFactor: 0.5,
      reason: "fallback (invalid_response)",
      fallback: true,
    });
    expect(capture.messages(LogLevel.WARN)).toEqual(["risk officer advisory failed, using fallback"]);
  });

  test("should keep the market at the minimum score when the scorer fails", async () => {
    capture = captureLogs();
    const client = createAdvisoryClient({
      minScore: 20,
      scorer: {
        score: () => {
          throw new Error("scorer crashed");
        },
      },
    });

    expect(await client.score(CANDIDATE)).toEqual({ marketId: "m1", score: 20, fallback: true });
  });

  test("should raise a warning without killing when the guard times out", async () => {
    capture = captureLogs();
    const never = new ResultAsync<EventAssessment, AdvisoryError>(new Promise(() => undefined));
    const client = createAdvisoryClient({ minScore: 20, timeoutMs: 20, eventGuard: { assess: () => never } });

    expect(await client.assess(CANDIDATE)).toEqual({
      marketId: "m1",
      warning: true,
      kill: false,
      reason: "fallback (timeout)",
      fallback: true,
    });
  });

  test("should treat a rejected oracle promise as unavailable", async () => {
    capture = captureLogs();
    const rejected = new ResultAsync<EventAssessment, AdvisoryError>(Promise.reject(new Error("socket closed")));
    const client = createAdvisoryClient({ minScore: 20, eventGuard: { assess: () => rejected } });

    expect((await client.assess(CANDIDATE)).reason).toBe("fallback (unavailable)");
  });
});

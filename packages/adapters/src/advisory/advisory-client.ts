/**
 * Advisory client - fallbacks around the optional oracles
 *
 * An oracle left out at construction is disabled and answers neutrally:
 * approve at full size, `NEUTRAL_SCORE`, no event warning.
 * An oracle that errors or times out gets the conservative answer:
 * - risk officer: approve with size factor 0.5
 * - scorer: `minScore`, market kept, flagged as fallback
 * - event guard: warning raised (spreads widen), market not killed
 *
 * None of the returned promises reject.
 */

import { errAsync, ResultAsync } from "neverthrow";

import type { MarketCandidate } from "@outcome-mm/core";
import { logger } from "@outcome-mm/utils";

import type {
  AdvisoryError,
  EventAssessment,
  EventGuard,
  MarketScore,
  MarketScorer,
  RiskOfficer,
  RiskReviewRequest,
  RiskVerdict,
} from "../ports";

export const FALLBACK_SIZE_FACTOR = 0.5;
export const NEUTRAL_SCORE = 50;

export interface AdvisoryClientOptions {
  riskOfficer?: RiskOfficer;
  scorer?: MarketScorer;
  eventGuard?: EventGuard;
  /** Score reported when the scorer fails */
  minScore: number;
  /** @default 10000 */
  timeoutMs?: number;
}

export interface AdvisoryClient {
  review(request: RiskReviewRequest): Promise<RiskVerdict>;
  score(candidate: MarketCandidate): Promise<MarketScore>;
  assess(candidate: MarketCandidate): Promise<EventAssessment>;
}

class AdvisoryTimeoutError extends Error {}

/**
 * Fail with `timeout` unless `call` settles within `timeoutMs`
 */
export function withTimeout<T>(call: ResultAsync<T, AdvisoryError>, timeoutMs: number): ResultAsync<T, AdvisoryError> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new AdvisoryTimeoutError(`advisory call timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  return ResultAsync.fromPromise(
    Promise.race([call, timeout]).finally(() => clearTimeout(timer)),
    (error): AdvisoryError => ({
      type: error instanceof AdvisoryTimeoutError ? "timeout" : "unavailable",
      message: error instanceof Error ? error.message : String(error),
    }),
  ).andThen(result => result);
}

/**
 * Resolve an advisory call to its value, or to `fallback(error)` on failure
 */
export async function withAdvisoryFallback<T>(
  name: string,
  call: ResultAsync<T, AdvisoryError>,
  fallback: (error: AdvisoryError) => T,
): Promise<T> {
  const result = await call;
  if (result.isOk()) return result.value;

  logger.warn(`${name} advisory failed, using fallback`, { error: result.error.type, message: result.error.message });
  return fallback(result.error);
}

export function createAdvisoryClient(options: AdvisoryClientOptions): AdvisoryClient {
  const { riskOfficer, scorer, eventGuard, minScore } = options;
  const timeoutMs = options.timeoutMs ?? 10_000;

  const guarded = <T>(call: () => ResultAsync<T, AdvisoryError>): ResultAsync<T, AdvisoryError> => {
    try {
      return withTimeout(call(), timeoutMs);
    } catch (error) {
      return errAsync<T, AdvisoryError>({ type: "unavailable", message: error instanceof Error ? error.message : String(error) });
    }
  };

  return {
    review: request => {
      if (!riskOfficer) {
        return Promise.resolve({ approve: true, sizeFactor: 1, reason: "risk officer disabled", fallback: false });
      }
      return withAdvisoryFallback(
        "risk officer",
        guarded(() => riskOfficer.review(request)),
        error => ({
          approve: true,
          sizeFactor: FALLBACK_SIZE_FACTOR,
          reason: `fallback (${error.type})`,
          fallback: true,
        }),
      );
    },

    score: candidate => {
      if (!scorer) {
        return Promise.resolve({ marketId: candidate.marketId, score: NEUTRAL_SCORE, fallback: false });
      }
      return withAdvisoryFallback(
        "market scorer",
        guarded(() => scorer.score(candidate)),
        () => ({ marketId: candidate.marketId, score: minScore, fallback: true }),
      );
    },

    assess: candidate => {
      if (!eventGuard) {
        return Promise.resolve({
          marketId: candidate.marketId,
          warning: false,
          kill: false,
          reason: "event guard disabled",
          fallback: false,
        });
      }
      return withAdvisoryFallback(
        "event guard",
        guarded(() => eventGuard.assess(candidate)),
        error => ({
          marketId: candidate.marketId,
          warning: true,
          kill: false,
          reason: `fallback (${error.type})`,
          fallback: true,
        }),
      );
    },
  };
}

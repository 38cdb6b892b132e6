/**
 * Market Maker Main Entry Point
 *
 * Composition root:
 * - env -> MmConfig
 * - paper venue seeded from the market catalog, behind the concurrency limiter
 * - Postgres repositories when DATABASE_URL is set, in-memory otherwise
 * - restore ledger and live quotes, then run the quoting cycle and the daily
 *   metrics job on their own interval workers
 */

import { KappaEstimator, StaleTracker, VolTracker, type Usdc } from "@outcome-mm/core";
import { PaperVenueAdapter, createAdvisoryClient, withConcurrencyLimit } from "@outcome-mm/adapters";
import { getDb, type DbConnection } from "@outcome-mm/db";
import { createInMemoryRepositories, createPostgresRepositories, type Repositories } from "@outcome-mm/repositories";
import { createIntervalWorker, logger } from "@outcome-mm/utils";

import { buildMmConfig } from "./config";
import { env } from "./env";
import { runDailyMetrics } from "./maintenance/daily-metrics";
import { loadMarketCatalog, toBookSummary, toCandidate } from "./market-catalog";
import { InventoryLedger, MarketStateRegistry, Quoter, RiskManager } from "./services";
import { createMarketMakingCycle } from "./usecases/market-making-cycle";
import { restoreState } from "./usecases/restore-state";

async function main(): Promise<void> {
  const configResult = buildMmConfig(env);
  if (configResult.isErr()) {
    throw new Error(configResult.error.message);
  }
  const config = configResult.value;

  logger.info("Starting market maker", {
    appEnv: env.APP_ENV,
    venue: env.MM_VENUE,
    pricing: config.pricingEngine,
    persistence: env.DATABASE_URL ? "postgres" : "memory",
  });

  // ───────────────────────────────────────────────────────────────────────────
  // Venue + catalog
  // ───────────────────────────────────────────────────────────────────────────

  const catalog = await loadMarketCatalog(env.MM_MARKETS_FILE);
  if (catalog.isErr()) {
    throw new Error(`Market catalog ${env.MM_MARKETS_FILE}: ${catalog.error.message}`);
  }

  const paper = new PaperVenueAdapter({ initialBalance: env.MM_PAPER_BALANCE_USD });
  for (const market of catalog.value.markets) {
    if (market.conditionId && market.noTokenId) {
      paper.registerMarket({ conditionId: market.conditionId, yesTokenId: market.tokenId, noTokenId: market.noTokenId });
    }
    if (market.book) {
      paper.setBook(market.tokenId, toBookSummary(market.book));
    }
  }
  const venue = withConcurrencyLimit(paper, config.venueConcurrency);
  const candidates = catalog.value.markets.map(toCandidate);

  logger.info("Market catalog loaded", { markets: candidates.length, file: env.MM_MARKETS_FILE });

  // ───────────────────────────────────────────────────────────────────────────
  // Persistence
  // ───────────────────────────────────────────────────────────────────────────

  let connection: DbConnection | null = null;
  let repositories: Repositories;
  if (env.DATABASE_URL) {
    connection = getDb(env.DATABASE_URL);
    repositories = createPostgresRepositories(connection.db);
  } else {
    logger.warn("DATABASE_URL not set, state is kept in memory only");
    repositories = createInMemoryRepositories();
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Services
  // ───────────────────────────────────────────────────────────────────────────

  const ledger = new InventoryLedger({ unwindThreshold: config.unwindThreshold });
  const quoter = new Quoter(venue, { postOnly: config.postOnly });
  const risk = new RiskManager(repositories.highWaterMark, {
    reducePct: config.ddReducePct,
    killPct: config.ddKillPct,
    resumePct: config.ddResumePct,
    cooldownMinutes: config.ddCooldownMinutes,
    maxRecoveriesPerDay: config.ddMaxRecoveriesPerDay,
  });
  const registry = new MarketStateRegistry({
    crossRejectThreshold: config.crossRejectThreshold,
    crossCooldownSeconds: config.crossCooldownSeconds,
    crossCooldownMaxSeconds: config.crossCooldownMaxSeconds,
    circuitBreakerThreshold: config.circuitBreakerThreshold,
    circuitBreakerCooldownSeconds: config.circuitBreakerCooldownSeconds,
  });
  const advisory = createAdvisoryClient({
    minScore: env.MM_SCORER_MIN_SCORE,
    timeoutMs: env.MM_ADVISORY_TIMEOUT_MS,
  });
  const trackers = {
    vol: new VolTracker(),
    stale: new StaleTracker(config.staleThresholdSeconds),
    kappa: new KappaEstimator(config.asKappaWindowMinutes, config.asKappaDefault),
  };

  const restored = await restoreState({ repositories, ledger, quoter, registry });
  if (restored.isErr()) {
    throw new Error(`State restore failed (${restored.error.type}): ${restored.error.message}`);
  }

  const cycle = createMarketMakingCycle({
    config,
    venue,
    quoter,
    ledger,
    risk,
    registry,
    repositories,
    advisory,
    trackers,
    getCandidates: () => Promise.resolve(candidates),
    minMarketScore: env.MM_SCORER_MIN_SCORE,
  });

  const getPortfolioValue = async (): Promise<Usdc | null> => {
    const balance = await venue.getCollateralBalance();
    return balance.isOk() ? balance.value + ledger.getTotalExposure() : null;
  };

  // ───────────────────────────────────────────────────────────────────────────
  // Workers
  // ───────────────────────────────────────────────────────────────────────────

  const quotingWorker = createIntervalWorker({
    name: "market-making cycle",
    intervalMs: config.cycleSeconds * 1000,
    handleSignals: false,
    startupMetadata: { cycleSeconds: config.cycleSeconds, maxMarkets: config.maxMarkets },
    runOnce: async () => {
      await cycle.runOnce();
    },
  });

  const metricsWorker = createIntervalWorker({
    name: "daily metrics",
    intervalMs: env.MM_METRICS_INTERVAL_MINUTES * 60_000,
    handleSignals: false,
    runOnce: async () => {
      await runDailyMetrics({ repositories, getPortfolioValue });
    },
  });

  // Graceful shutdown
  const shutdown = async (): Promise<void> => {
    await Promise.all([quotingWorker.stop(), metricsWorker.stop()]);

    const resting = [
      ...[...registry.activeQuotes.values()].map(pair => ({ pair, status: "cancelled" as const })),
      ...[...registry.retiringQuotes].map(([pair, status]) => ({ pair, status })),
    ];
    for (const { pair, status } of resting) {
      const cancelled = await quoter.cancelQuotePair(pair);
      if (!cancelled) {
        logger.warn("Quote left resting on shutdown", { marketId: pair.marketId, bid: pair.bidOrderId, ask: pair.askOrderId });
      } else if (pair.dbId !== null) {
        const updated = await repositories.quotes.updateQuoteStatus(pair.dbId, status);
        if (updated.isErr()) {
          logger.warn("Failed to close quote on shutdown", { marketId: pair.marketId, error: updated.error.message });
        }
      }
    }

    if (connection) {
      await connection.close();
    }
    logger.info("Shutdown complete");
  };

  const onSignal = (signal: NodeJS.Signals): void => {
    logger.info(`Received ${signal}`);
    shutdown().then(
      () => {
        process.exitCode = 0;
      },
      (error: unknown) => {
        logger.error("Shutdown failed", { error });
        process.exitCode = 1;
      },
    );
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  logger.info("Market maker running");
}

main().catch((error: unknown) => {
  logger.error("Fatal error", error);
  process.exitCode = 1;
});

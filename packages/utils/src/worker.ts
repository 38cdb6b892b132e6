/**
 * Interval worker
 *
 * Runs `runOnce` immediately and then every `intervalMs`. An iteration that is
 * still running when the next tick fires causes that tick to be skipped, so
 * iterations never overlap. Errors thrown by an iteration are logged and the
 * worker keeps going.
 */

import { logger } from "./logger";

export interface WorkerOptions {
  name: string;
  intervalMs: number;
  runOnce: () => Promise<void>;
  /** Runs once on shutdown, after the in-flight iteration settles (or times out) */
  cleanup?: () => Promise<void> | void;
  startupMetadata?: Record<string, unknown>;
  /**
   * Install SIGINT/SIGTERM handlers that stop the worker and exit the process.
   * @default true
   */
  handleSignals?: boolean;
  /** @default 5000 */
  shutdownTimeoutMs?: number;
}

export interface IntervalWorker {
  /** Stop scheduling, wait for the in-flight iteration, run cleanup. Idempotent. */
  stop: () => Promise<void>;
  /** Number of iterations started so far */
  iterations: () => number;
  /** Number of ticks skipped because the previous iteration was still running */
  skippedTicks: () => number;
}

export function createIntervalWorker(options: WorkerOptions): IntervalWorker {
  const { name, intervalMs, runOnce, cleanup, startupMetadata } = options;
  const handleSignals = options.handleSignals ?? true;
  const shutdownTimeoutMs = options.shutdownTimeoutMs ?? 5000;

  logger.info(`Starting ${name}`, startupMetadata ?? {});

  let runningPromise: Promise<void> | null = null;
  let iterations = 0;
  let skipped = 0;

  const runOnceSafely = (): void => {
    if (runningPromise) {
      skipped++;
      logger.debug(`${name} tick skipped, previous iteration still running`);
      return;
    }

    iterations++;
    runningPromise = runOnce()
      .catch((error: unknown) => {
        logger.error(`${name} iteration failed`, { error });
      })
      .finally(() => {
        runningPromise = null;
      });
  };

  runOnceSafely();
  const interval = setInterval(runOnceSafely, intervalMs);

  let stopPromise: Promise<void> | null = null;

  const waitForRunning = async (): Promise<void> => {
    if (!runningPromise) return;

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<void>(resolve => {
      timer = setTimeout(() => {
        logger.warn(`${name} in-flight iteration did not finish within ${shutdownTimeoutMs}ms`);
        resolve();
      }, shutdownTimeoutMs);
    });

    try {
      await Promise.race([runningPromise, timeout]);
    } finally {
      clearTimeout(timer);
    }
  };

  const stop = (): Promise<void> => {
    if (stopPromise) return stopPromise;

    stopPromise = (async () => {
      logger.info(`Shutting down ${name}...`);
      clearInterval(interval);
      await waitForRunning();

      if (cleanup) {
        await cleanup();
      }
      logger.info(`${name} shutdown complete`);
    })();

    return stopPromise;
  };

  if (handleSignals) {
    const onSignal = (signal: NodeJS.Signals): void => {
      logger.info(`${name} received ${signal}`);
      stop().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error(`${name} shutdown failed`, { error });
          process.exit(1);
        },
      );
    };
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);
  }

  logger.info(`${name} running`);

  return {
    stop,
    iterations: () => iterations,
    skippedTicks: () => skipped,
  };
}
